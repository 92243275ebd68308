/**
 * Random Material — weighted choice from a fixed material list.
 */

import { z } from 'zod'
import { TemplateNode } from '../../graph/Node.js'
import { defineNodeKind } from '../../graph/registry.js'
import { nameSetting } from '../../graph/settings.js'
import type { BuildContext, ValidationPass } from '../../graph/context.js'
import type { PlacementRequest } from '../../graph/PlacementRequest.js'
import { weightedIndex } from '../../math/random.js'

const RandomMaterialSettingsSchema = z.object({
    materials: z.array(z.object({
        name: z.string().min(1),
        weight: z.number().min(0),
    })).default([]),
    /** Material to replace */
    targetMaterial: nameSetting,
})

export type RandomMaterialSettings = z.infer<typeof RandomMaterialSettingsSchema>

export class RandomMaterialNode extends TemplateNode<RandomMaterialSettings> {
    protected checkSettings(ctx: ValidationPass): boolean {
        const { materials, targetMaterial } = this.settings
        let ok = this.requireText(ctx, 'targetMaterial', targetMaterial)

        if (materials.length === 0) {
            ctx.report(this, 'material list is empty')
            return false
        }
        if (materials.reduce((sum, m) => sum + m.weight, 0) <= 0) {
            ctx.report(this, 'material weights sum to zero')
            ok = false
        }
        for (const material of materials) {
            ok = this.requireMaterial(ctx, material.name) && ok
        }
        return ok
    }

    protected apply(request: PlacementRequest, ctx: BuildContext): void {
        const { materials, targetMaterial } = this.settings
        const index = weightedIndex(materials.map(m => m.weight), ctx.rng)
        request.materials.set(targetMaterial, materials[index].name)
        this.forward(request, ctx)
    }
}

export const randomMaterialKind = defineNodeKind({
    type: 'random-material',
    family: 'placement',
    description: 'Pick a replacement material by weight',
    settings: RandomMaterialSettingsSchema,
    create: init => new RandomMaterialNode(init),
})

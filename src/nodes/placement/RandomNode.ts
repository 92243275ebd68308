/**
 * Random — turns the request about its local Z axis and scales it by a
 * random amount. Optionally swaps a material for a random scene material
 * whose name starts with a prefix.
 */

import * as THREE from 'three'
import { z } from 'zod'
import { TemplateNode } from '../../graph/Node.js'
import { defineNodeKind } from '../../graph/registry.js'
import { nameSetting } from '../../graph/settings.js'
import type { BuildContext, ValidationPass } from '../../graph/context.js'
import type { PlacementRequest } from '../../graph/PlacementRequest.js'
import { choice, uniform } from '../../math/random.js'
import { rotateAboutLocalZ } from '../../math/transform.js'

const RandomSettingsSchema = z.object({
    /** Degrees */
    minRandRot: z.number().default(-10),
    maxRandRot: z.number().default(10),
    minRandSz: z.number().min(0).default(1),
    maxRandSz: z.number().min(0).default(1),
    randMat: z.boolean().default(false),
    randMatPrefix: nameSetting,
    /** Material to replace */
    targetMaterial: nameSetting,
})

export type RandomSettings = z.infer<typeof RandomSettingsSchema>

export class RandomNode extends TemplateNode<RandomSettings> {
    protected checkSettings(ctx: ValidationPass): boolean {
        if (!this.settings.randMat) return true
        return this.requireText(ctx, 'targetMaterial', this.settings.targetMaterial)
    }

    protected apply(request: PlacementRequest, ctx: BuildContext): void {
        const { minRandRot, maxRandRot, minRandSz, maxRandSz } = this.settings

        const angle = THREE.MathUtils.degToRad(uniform(ctx.rng, minRandRot, maxRandRot))
        request.rotation.copy(rotateAboutLocalZ(request.rotation, angle))
        request.scale *= uniform(ctx.rng, minRandSz, maxRandSz)

        if (this.settings.randMat) {
            const material = this.pickMaterial(ctx)
            if (material !== undefined) {
                request.materials.set(this.settings.targetMaterial, material)
            }
        }

        this.forward(request, ctx)
    }

    /** No prefix or no match is not fatal: warn and leave materials alone */
    private pickMaterial(ctx: BuildContext): string | undefined {
        const prefix = this.settings.randMatPrefix
        if (prefix === '') {
            ctx.logger.warn(`${this.label}: random material requested but no prefix set`)
            return undefined
        }

        const matches = ctx.call(this, 'list materials', backend => backend.listMaterials())
            .filter(name => name.startsWith(prefix))
        if (matches.length === 0) {
            ctx.logger.warn(`${this.label}: no material starts with "${prefix}"`)
            return undefined
        }

        return choice(matches, ctx.rng)
    }
}

export const randomKind = defineNodeKind({
    type: 'random',
    family: 'placement',
    description: 'Randomise rotation, scale and optionally material',
    settings: RandomSettingsSchema,
    create: init => new RandomNode(init),
})

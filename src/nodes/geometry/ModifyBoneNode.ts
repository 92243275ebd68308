/**
 * Modify Bone — records that a bone attribute should follow an agent tag.
 * Nothing is sent to the backend here; the record rides on the result.
 */

import { z } from 'zod'
import { GeometryNode, type SlotSpec } from '../../graph/Node.js'
import { defineNodeKind } from '../../graph/registry.js'
import { nameSetting } from '../../graph/settings.js'
import type { BuildContext, ValidationPass } from '../../graph/context.js'
import type { GeometryRequest } from '../../graph/PlacementRequest.js'
import type { GeometryResult } from '../../types/index.js'

const ModifyBoneSettingsSchema = z.object({
    boneName: nameSetting,
    attribute: nameSetting,
    tagName: nameSetting,
})

export type ModifyBoneSettings = z.infer<typeof ModifyBoneSettingsSchema>

export class ModifyBoneNode extends GeometryNode<ModifyBoneSettings> {
    protected get slots(): readonly SlotSpec[] {
        return [{ name: 'Objects', family: 'geometry' }]
    }

    protected checkSettings(ctx: ValidationPass): boolean {
        let ok = this.requireText(ctx, 'boneName', this.settings.boneName)
        ok = this.requireText(ctx, 'attribute', this.settings.attribute) && ok
        ok = this.requireText(ctx, 'tagName', this.settings.tagName) && ok
        return ok
    }

    protected apply(request: GeometryRequest, ctx: BuildContext): GeometryResult {
        const { boneName, attribute, tagName } = this.settings
        const child = this.geometryInput('Objects').evaluate(request, ctx)

        return {
            ...child,
            boneModifications: {
                ...child.boneModifications,
                [boneName]: { ...child.boneModifications[boneName], [attribute]: tagName },
            },
        }
    }
}

export const modifyBoneKind = defineNodeKind({
    type: 'modify-bone',
    family: 'geometry',
    description: 'Drive a bone attribute from an agent tag',
    settings: ModifyBoneSettingsSchema,
    create: init => new ModifyBoneNode(init),
})

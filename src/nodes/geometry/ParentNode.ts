/**
 * Parent — builds both inputs and pins the child to a bone of the parent.
 * The parent's result is what flows on.
 */

import { z } from 'zod'
import { GeometryNode, type SlotSpec } from '../../graph/Node.js'
import { defineNodeKind } from '../../graph/registry.js'
import { nameSetting } from '../../graph/settings.js'
import type { BuildContext, ValidationPass } from '../../graph/context.js'
import { forkGeometryRequest, type GeometryRequest } from '../../graph/PlacementRequest.js'
import type { GeometryResult } from '../../types/index.js'

const ParentSettingsSchema = z.object({
    /** Bone on the parent's armature */
    parentTo: nameSetting,
})

export type ParentSettings = z.infer<typeof ParentSettingsSchema>

export class ParentNode extends GeometryNode<ParentSettings> {
    protected get slots(): readonly SlotSpec[] {
        return [
            { name: 'Parent Group', family: 'geometry' },
            { name: 'Child Object', family: 'geometry' },
        ]
    }

    protected checkSettings(ctx: ValidationPass): boolean {
        return this.requireText(ctx, 'parentTo', this.settings.parentTo)
    }

    protected apply(request: GeometryRequest, ctx: BuildContext): GeometryResult {
        const parent = this.geometryInput('Parent Group').evaluate(forkGeometryRequest(request), ctx)
        const child = this.geometryInput('Child Object').evaluate(forkGeometryRequest(request), ctx)

        ctx.call(this, 'attach to bone', backend =>
            backend.attachToBone(child.geometry, parent.geometry, this.settings.parentTo))
        return parent
    }
}

export const parentKind = defineNodeKind({
    type: 'parent',
    family: 'geometry',
    description: 'Attach one object to a bone of another',
    settings: ParentSettingsSchema,
    create: init => new ParentNode(init),
})

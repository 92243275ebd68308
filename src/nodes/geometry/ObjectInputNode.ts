/**
 * Object Input — geometry leaf that duplicates one scene object.
 */

import { z } from 'zod'
import { GeometryNode } from '../../graph/Node.js'
import { defineNodeKind } from '../../graph/registry.js'
import { nameSetting } from '../../graph/settings.js'
import type { BuildContext, ValidationPass } from '../../graph/context.js'
import { geometryResult, type GeometryRequest } from '../../graph/PlacementRequest.js'
import type { GeometryResult } from '../../types/index.js'

const ObjectInputSettingsSchema = z.object({
    inputObject: nameSetting,
})

export type ObjectInputSettings = z.infer<typeof ObjectInputSettingsSchema>

export class ObjectInputNode extends GeometryNode<ObjectInputSettings> {
    protected checkSettings(ctx: ValidationPass): boolean {
        return this.requireObject(ctx, 'inputObject', this.settings.inputObject)
    }

    protected apply(request: GeometryRequest, ctx: BuildContext): GeometryResult {
        const name = this.settings.inputObject
        if (request.deferred) {
            return geometryResult({ kind: 'deferred', source: 'object', objectName: name })
        }

        const handle = ctx.call(this, 'duplicate object', backend => backend.duplicateObject(name))
        const { materials } = request.placement
        if (materials.size > 0) {
            ctx.call(this, 'apply materials', backend => backend.applyMaterials(handle, new Map(materials)))
        }
        return geometryResult({ kind: 'instance', handle })
    }
}

export const objectInputKind = defineNodeKind({
    type: 'object-input',
    family: 'geometry',
    description: 'Duplicate a scene object',
    settings: ObjectInputSettingsSchema,
    create: init => new ObjectInputNode(init),
})

/**
 * Offset — moves and turns the request by a fixed amount, optionally
 * relative to a reference object instead of the incoming transform.
 */

import * as THREE from 'three'
import { z } from 'zod'
import { TemplateNode } from '../../graph/Node.js'
import { defineNodeKind } from '../../graph/registry.js'
import { nameSetting, vec3Setting } from '../../graph/settings.js'
import type { BuildContext, ValidationPass } from '../../graph/context.js'
import type { PlacementRequest } from '../../graph/PlacementRequest.js'
import { degreesToRadians, vec3 } from '../../math/transform.js'

const OffsetSettingsSchema = z.object({
    /** Start from zero instead of the incoming position and rotation */
    overwrite: z.boolean().default(false),
    referenceObject: nameSetting,
    locationOffset: vec3Setting.default([0, 0, 0]),
    /** Degrees */
    rotationOffset: vec3Setting.default([0, 0, 0]),
})

export type OffsetSettings = z.infer<typeof OffsetSettingsSchema>

export class OffsetNode extends TemplateNode<OffsetSettings> {
    protected checkSettings(ctx: ValidationPass): boolean {
        const ref = this.settings.referenceObject
        return ref === '' || this.requireObject(ctx, 'referenceObject', ref)
    }

    protected apply(request: PlacementRequest, ctx: BuildContext): void {
        const { overwrite, referenceObject, locationOffset, rotationOffset } = this.settings
        const position = overwrite ? new THREE.Vector3() : request.position.clone()
        const rotation = overwrite ? new THREE.Vector3() : request.rotation.clone()

        if (referenceObject !== '') {
            const ref = ctx.call(this, 'read reference object', backend => backend.getObject(referenceObject))
            position.add(vec3(ref.location))
            rotation.add(vec3(ref.rotation))
        }

        position.add(vec3(locationOffset))
        rotation.add(degreesToRadians(rotationOffset))

        request.position.copy(position)
        request.rotation.copy(rotation)
        this.forward(request, ctx)
    }
}

export const offsetKind = defineNodeKind({
    type: 'offset',
    family: 'placement',
    description: 'Offset the position and rotation of the request',
    settings: OffsetSettingsSchema,
    create: init => new OffsetNode(init),
})

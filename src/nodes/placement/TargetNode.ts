/**
 * Target — one copy of the request per object in a group, or per vertex
 * of a mesh.
 *
 * With overwritePosition the targets' world placement replaces the request
 * transform. Otherwise targets are read in local space and carried into the
 * request's frame (rotated, then scaled, then offset).
 */

import * as THREE from 'three'
import { z } from 'zod'
import { TemplateNode } from '../../graph/Node.js'
import { defineNodeKind } from '../../graph/registry.js'
import { nameSetting } from '../../graph/settings.js'
import type { BuildContext, ValidationPass } from '../../graph/context.js'
import type { PlacementRequest } from '../../graph/PlacementRequest.js'
import { objectMatrix, rotateBy, vec3 } from '../../math/transform.js'
import { meshVertices } from '../../spatial/mesh.js'

const TargetSettingsSchema = z.object({
    targetType: z.enum(['object', 'vertex']).default('object'),
    targetGroup: nameSetting,
    targetObject: nameSetting,
    overwritePosition: z.boolean().default(true),
})

export type TargetSettings = z.infer<typeof TargetSettingsSchema>

interface TargetPlacement {
    position: THREE.Vector3
    rotation: THREE.Vector3
}

export class TargetNode extends TemplateNode<TargetSettings> {
    protected checkSettings(ctx: ValidationPass): boolean {
        return this.settings.targetType === 'object'
            ? this.requireGroup(ctx, 'targetGroup', this.settings.targetGroup)
            : this.requireMesh(ctx, 'targetObject', this.settings.targetObject)
    }

    protected apply(request: PlacementRequest, ctx: BuildContext): void {
        const targets = this.settings.targetType === 'object'
            ? this.objectTargets(request, ctx)
            : this.vertexTargets(request, ctx)

        for (const target of targets) {
            this.forward(request.at(target.position, target.rotation), ctx)
        }
    }

    private objectTargets(request: PlacementRequest, ctx: BuildContext): TargetPlacement[] {
        const objects = ctx.call(this, 'read target group', backend =>
            backend.getGroupObjects(this.settings.targetGroup))

        return objects.map(obj => this.settings.overwritePosition
            ? { position: vec3(obj.location), rotation: vec3(obj.rotation) }
            : {
                position: this.intoFrame(vec3(obj.location), request),
                rotation: request.rotation.clone().add(vec3(obj.rotation)),
            })
    }

    private vertexTargets(request: PlacementRequest, ctx: BuildContext): TargetPlacement[] {
        const name = this.settings.targetObject
        const obj = ctx.call(this, 'read target object', backend => backend.getObject(name))
        const vertices = meshVertices(ctx.call(this, 'read target mesh', backend => backend.getMesh(name)))

        if (this.settings.overwritePosition) {
            const world = objectMatrix(obj)
            return vertices.map(v => ({ position: v.applyMatrix4(world), rotation: vec3(obj.rotation) }))
        }
        return vertices.map(v => ({ position: this.intoFrame(v, request), rotation: request.rotation.clone() }))
    }

    private intoFrame(local: THREE.Vector3, request: PlacementRequest): THREE.Vector3 {
        return rotateBy(local, request.rotation).multiplyScalar(request.scale).add(request.position)
    }
}

export const targetKind = defineNodeKind({
    type: 'target',
    family: 'placement',
    description: 'Place at the objects of a group or the vertices of a mesh',
    settings: TargetSettingsSchema,
    create: init => new TargetNode(init),
})

/**
 * Mesh Positioning — scatters N copies of the request over a guide mesh.
 *
 * Samples are area-weighted. With overwritePosition they land on the guide
 * where it sits in the world; otherwise the guide's local shape is carried
 * into the request's frame. After relaxation each point is snapped back to
 * the closest point of the guide surface.
 *
 * A guide without surface area is a warning, not a drop: nothing is placed
 * and BuildStats.dropped is left alone.
 */

import * as THREE from 'three'
import { z } from 'zod'
import { TemplateNode } from '../../graph/Node.js'
import { OnceCell } from '../../graph/OnceCell.js'
import { defineNodeKind } from '../../graph/registry.js'
import { countSetting, nameSetting, relaxSettings } from '../../graph/settings.js'
import type { BuildContext, ValidationPass } from '../../graph/context.js'
import type { PlacementRequest } from '../../graph/PlacementRequest.js'
import { composeMatrix, objectMatrix } from '../../math/transform.js'
import { relax } from '../../spatial/relax.js'
import { SurfaceSampler } from '../../spatial/SurfaceSampler.js'
import { TriangleBVH } from '../../spatial/TriangleBVH.js'
import type { MeshData } from '../../types/index.js'

const MeshPositioningSettingsSchema = z.object({
    guideMesh: nameSetting,
    noToPlace: countSetting.default(1),
    overwritePosition: z.boolean().default(true),
    ...relaxSettings,
})

export type MeshPositioningSettings = z.infer<typeof MeshPositioningSettingsSchema>

export class MeshPositioningNode extends TemplateNode<MeshPositioningSettings> {
    private sampler = new OnceCell<SurfaceSampler>()
    private bvh = new OnceCell<TriangleBVH>()

    protected checkSettings(ctx: ValidationPass): boolean {
        return this.requireMesh(ctx, 'guideMesh', this.settings.guideMesh)
    }

    protected apply(request: PlacementRequest, ctx: BuildContext): void {
        const { guideMesh, noToPlace, overwritePosition } = this.settings
        const mesh = (): MeshData => ctx.call(this, 'read guide mesh', backend => backend.getMesh(guideMesh))

        const sampler = this.sampler.getOrInit(() => new SurfaceSampler(mesh()))
        if (sampler.totalArea <= 0) {
            ctx.logger.warn(`${this.label}: guide mesh "${guideMesh}" has no surface area`)
            return
        }

        const frame = overwritePosition
            ? objectMatrix(ctx.call(this, 'read guide', backend => backend.getObject(guideMesh)))
            : composeMatrix(request.position, request.rotation, new THREE.Vector3().setScalar(request.scale))

        let positions: THREE.Vector3[] = []
        for (let i = 0; i < noToPlace; i++) {
            const local = sampler.sample(ctx.rng)
            if (local) positions.push(local.applyMatrix4(frame))
        }

        if (this.settings.relax) {
            positions = relax(positions, {
                radius: this.settings.relaxRadius,
                iterations: this.settings.relaxIterations,
            })

            const bvh = this.bvh.getOrInit(() => new TriangleBVH(mesh()))
            const inverse = frame.clone().invert()
            positions = positions.map(p => {
                const hit = bvh.nearestPoint(p.clone().applyMatrix4(inverse))
                return hit ? hit.point.applyMatrix4(frame) : p
            })
        }

        for (const position of positions) {
            this.forward(request.at(position), ctx)
        }
    }
}

export const meshPositioningKind = defineNodeKind({
    type: 'mesh-positioning',
    family: 'placement',
    description: 'Place randomly on the surface of a guide mesh',
    settings: MeshPositioningSettingsSchema,
    create: init => new MeshPositioningNode(init),
})

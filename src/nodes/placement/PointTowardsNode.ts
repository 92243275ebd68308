/**
 * Point Towards — turns the request so its +Y axis faces an object's
 * origin, or the mesh vertex of that object closest to the request.
 *
 * The vertex KDTree is built on first use and kept for the node's
 * lifetime. It answers with the nearest vertex, not the nearest point on
 * the surface.
 */

import { z } from 'zod'
import { TemplateNode } from '../../graph/Node.js'
import { OnceCell } from '../../graph/OnceCell.js'
import { defineNodeKind } from '../../graph/registry.js'
import { nameSetting } from '../../graph/settings.js'
import type { BuildContext, ValidationPass } from '../../graph/context.js'
import type { PlacementRequest } from '../../graph/PlacementRequest.js'
import { objectMatrix, trackRotation, vec3 } from '../../math/transform.js'
import { KDTree } from '../../spatial/KDTree.js'
import { meshVertices } from '../../spatial/mesh.js'

const PointTowardsSettingsSchema = z.object({
    pointObject: nameSetting,
    pointType: z.enum(['object', 'mesh']).default('object'),
})

export type PointTowardsSettings = z.infer<typeof PointTowardsSettingsSchema>

export class PointTowardsNode extends TemplateNode<PointTowardsSettings> {
    private vertexTree = new OnceCell<KDTree>()

    protected checkSettings(ctx: ValidationPass): boolean {
        const { pointObject, pointType } = this.settings
        return pointType === 'mesh'
            ? this.requireMesh(ctx, 'pointObject', pointObject)
            : this.requireObject(ctx, 'pointObject', pointObject)
    }

    protected apply(request: PlacementRequest, ctx: BuildContext): void {
        const { pointObject, pointType } = this.settings
        const target = ctx.call(this, 'read target', backend => backend.getObject(pointObject))
        let point = vec3(target.location)

        if (pointType === 'mesh') {
            const tree = this.vertexTree.getOrInit(() =>
                new KDTree(meshVertices(ctx.call(this, 'read target mesh', backend => backend.getMesh(pointObject)))))
            const world = objectMatrix(target)
            const local = request.position.clone().applyMatrix4(world.clone().invert())
            const hit = tree.nearest(local)
            if (hit) point = hit.point.applyMatrix4(world)
        }

        const rotation = trackRotation(point.sub(request.position))
        if (rotation) request.rotation.copy(rotation)

        this.forward(request, ctx)
    }
}

export const pointTowardsKind = defineNodeKind({
    type: 'point-towards',
    family: 'placement',
    description: 'Rotate to face an object or the closest vertex of a mesh',
    settings: PointTowardsSettingsSchema,
    create: init => new PointTowardsNode(init),
})

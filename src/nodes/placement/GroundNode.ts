/**
 * Ground — drops the request onto a ground mesh.
 *
 * Casts straight down and straight up from the request, relative to the
 * ground's origin, and keeps the closer hit. A request with nothing above
 * or below it ends here.
 */

import * as THREE from 'three'
import { z } from 'zod'
import { TemplateNode } from '../../graph/Node.js'
import { OnceCell } from '../../graph/OnceCell.js'
import { defineNodeKind } from '../../graph/registry.js'
import { nameSetting } from '../../graph/settings.js'
import type { BuildContext, ValidationPass } from '../../graph/context.js'
import type { PlacementRequest } from '../../graph/PlacementRequest.js'
import { objectLinearMatrix, vec3 } from '../../math/transform.js'
import { TriangleBVH, type RayHit } from '../../spatial/TriangleBVH.js'

const GroundSettingsSchema = z.object({
    groundMesh: nameSetting,
})

export type GroundSettings = z.infer<typeof GroundSettingsSchema>

const DOWN = new THREE.Vector3(0, 0, -1)
const UP = new THREE.Vector3(0, 0, 1)

export class GroundNode extends TemplateNode<GroundSettings> {
    private bvh = new OnceCell<TriangleBVH>()

    protected checkSettings(ctx: ValidationPass): boolean {
        return this.requireMesh(ctx, 'groundMesh', this.settings.groundMesh)
    }

    protected apply(request: PlacementRequest, ctx: BuildContext): void {
        const name = this.settings.groundMesh
        const ground = ctx.call(this, 'read ground', backend => backend.getObject(name))
        // Rotation and scale are baked in; translation is handled per query
        const bvh = this.bvh.getOrInit(() =>
            new TriangleBVH(ctx.call(this, 'read ground mesh', backend => backend.getMesh(name)), objectLinearMatrix(ground)))

        const origin = vec3(ground.location)
        const local = request.position.clone().sub(origin)
        const hit = closer(bvh.rayCast(local, DOWN), bvh.rayCast(local, UP))

        if (hit === null) {
            ctx.drop(this, 'ground')
            return
        }

        request.position.copy(hit.point.add(origin))
        this.forward(request, ctx)
    }
}

function closer(down: RayHit | null, up: RayHit | null): RayHit | null {
    if (down && up) return down.distance <= up.distance ? down : up
    return down ?? up
}

export const groundKind = defineNodeKind({
    type: 'ground',
    family: 'placement',
    description: 'Project requests onto a ground mesh',
    settings: GroundSettingsSchema,
    create: init => new GroundNode(init),
})

/**
 * Obstacle — refuses requests that fall inside a padded volume around any
 * member of the obstacle group.
 */

import * as THREE from 'three'
import { z } from 'zod'
import { TemplateNode } from '../../graph/Node.js'
import { OnceCell } from '../../graph/OnceCell.js'
import { defineNodeKind } from '../../graph/registry.js'
import { nameSetting } from '../../graph/settings.js'
import type { BuildContext, ValidationPass } from '../../graph/context.js'
import type { PlacementRequest } from '../../graph/PlacementRequest.js'
import { vec3 } from '../../math/transform.js'
import { VolumeOctree, type Volume } from '../../spatial/VolumeOctree.js'
import type { SceneObject } from '../../types/index.js'

const ObstacleSettingsSchema = z.object({
    obstacleGroup: nameSetting,
    /** Padding added on every side */
    margin: z.number().min(0).default(0),
    volumeShape: z.enum(['box', 'sphere']).default('box'),
})

export type ObstacleSettings = z.infer<typeof ObstacleSettingsSchema>

export class ObstacleNode extends TemplateNode<ObstacleSettings> {
    private octree = new OnceCell<VolumeOctree<string>>()

    protected checkSettings(ctx: ValidationPass): boolean {
        return this.requireGroup(ctx, 'obstacleGroup', this.settings.obstacleGroup)
    }

    protected apply(request: PlacementRequest, ctx: BuildContext): void {
        const octree = this.octree.getOrInit(() => {
            const members = ctx.call(this, 'read obstacle group', backend =>
                backend.getGroupObjects(this.settings.obstacleGroup))
            return new VolumeOctree(members.map(obj => ({ volume: this.volumeFor(obj), value: obj.name })))
        })

        if (octree.query(request.position).length > 0) {
            ctx.drop(this, 'obstacle')
            return
        }

        this.forward(request, ctx)
    }

    /** Volume centred on the object's origin, grown by the margin */
    volumeFor(obj: SceneObject): Volume {
        const center = vec3(obj.location)
        const { margin, volumeShape } = this.settings

        if (volumeShape === 'sphere') {
            const radius = Math.max(...obj.dimensions) / 2 + margin
            return { kind: 'sphere', sphere: new THREE.Sphere(center, radius) }
        }

        const half = vec3(obj.dimensions).multiplyScalar(0.5).addScalar(margin)
        return {
            kind: 'box',
            box: new THREE.Box3(center.clone().sub(half), center.clone().add(half)),
        }
    }
}

export const obstacleKind = defineNodeKind({
    type: 'obstacle',
    family: 'placement',
    description: 'Refuse requests inside obstacle bounds',
    settings: ObstacleSettingsSchema,
    create: init => new ObstacleNode(init),
})

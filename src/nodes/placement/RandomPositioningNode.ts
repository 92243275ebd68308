/**
 * Random Positioning — scatters N copies of the request around its position.
 *
 * Distributions (offsets in the request's local XY plane):
 *   radius — uniform angle, radius = u1 + u2 folded back into [0, 1],
 *            which crowds points toward the centre
 *   sector — like radius, angle limited to direction ± angle/2
 *   area   — uniform over a maxX × maxY rectangle centred on the request
 *
 * Offsets are rotated by the request rotation, then optionally relaxed.
 */

import * as THREE from 'three'
import { z } from 'zod'
import { TemplateNode } from '../../graph/Node.js'
import { defineNodeKind } from '../../graph/registry.js'
import { countSetting, relaxSettings } from '../../graph/settings.js'
import type { BuildContext } from '../../graph/context.js'
import type { PlacementRequest } from '../../graph/PlacementRequest.js'
import { uniform, type Rng } from '../../math/random.js'
import { rotateBy } from '../../math/transform.js'
import { relax } from '../../spatial/relax.js'

const RandomPositioningSettingsSchema = z.object({
    noToPlace: countSetting.default(1),
    locationType: z.enum(['radius', 'area', 'sector']).default('radius'),
    radius: z.number().min(0).default(10),
    maxX: z.number().min(0).default(10),
    maxY: z.number().min(0).default(10),
    /** Degrees, measured from +Y toward +X */
    direction: z.number().default(0),
    /** Full sector width in degrees */
    angle: z.number().min(0).max(360).default(90),
    ...relaxSettings,
})

export type RandomPositioningSettings = z.infer<typeof RandomPositioningSettingsSchema>

export class RandomPositioningNode extends TemplateNode<RandomPositioningSettings> {
    protected apply(request: PlacementRequest, ctx: BuildContext): void {
        let positions: THREE.Vector3[] = []
        for (let i = 0; i < this.settings.noToPlace; i++) {
            const offset = rotateBy(this.drawOffset(ctx.rng), request.rotation)
            positions.push(offset.add(request.position))
        }

        if (this.settings.relax) {
            positions = relax(positions, {
                radius: this.settings.relaxRadius,
                iterations: this.settings.relaxIterations,
            })
        }

        for (const position of positions) {
            this.forward(request.at(position), ctx)
        }
    }

    /** One offset in the request's local frame */
    drawOffset(rng: Rng): THREE.Vector3 {
        const s = this.settings

        switch (s.locationType) {
            case 'radius': {
                const angle = uniform(rng, -Math.PI, Math.PI)
                return polar(angle, foldedLength(rng) * s.radius)
            }

            case 'sector': {
                const half = THREE.MathUtils.degToRad(s.angle) / 2
                const angle = THREE.MathUtils.degToRad(s.direction) + uniform(rng, -half, half)
                return polar(angle, foldedLength(rng) * s.radius)
            }

            case 'area':
                return new THREE.Vector3(
                    uniform(rng, -s.maxX / 2, s.maxX / 2),
                    uniform(rng, -s.maxY / 2, s.maxY / 2),
                    0
                )
        }
    }
}

/** Sum of two uniform draws folded back into [0, 1] */
function foldedLength(rng: Rng): number {
    const length = rng() + rng()
    return length > 1 ? 2 - length : length
}

function polar(angle: number, length: number): THREE.Vector3 {
    return new THREE.Vector3(Math.sin(angle) * length, Math.cos(angle) * length, 0)
}

export const randomPositioningKind = defineNodeKind({
    type: 'random-positioning',
    family: 'placement',
    description: 'Place randomly around the request',
    settings: RandomPositioningSettingsSchema,
    create: init => new RandomPositioningNode(init),
})

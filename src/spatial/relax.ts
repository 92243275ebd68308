/**
 * Relaxation — iterative local repulsion to declump sampled points.
 *
 * Each pass rebuilds a KDTree over the current positions, then moves every
 * point away from the neighbours within 2r. A neighbour at distance d
 * pushes with strength (2r - d) / d along the separating vector. The summed
 * push is divided by the size of the neighbourhood, the point itself
 * included. All points move from the same snapshot.
 *
 * Always runs exactly `iterations` passes; there is no convergence test.
 */

import * as THREE from 'three'
import { KDTree } from './KDTree.js'

export interface RelaxOptions {
    radius: number
    iterations: number
}

export function relax(
    points: readonly THREE.Vector3[],
    options: RelaxOptions
): THREE.Vector3[] {
    const { radius, iterations } = options
    let current = points.map(p => p.clone())
    const reach = radius * 2

    for (let pass = 0; pass < iterations; pass++) {
        const tree = new KDTree(current)

        current = current.map((p, n) => {
            const adjust = new THREE.Vector3()
            let neighbours = 0

            const hits = tree.withinRadius(p, reach)
            for (const hit of hits) {
                // Coincident points have no direction to push along
                if (hit.index === n || hit.distance === 0) continue
                const away = new THREE.Vector3().subVectors(p, hit.point)
                adjust.addScaledVector(away, (reach - hit.distance) / hit.distance)
                neighbours++
            }

            if (neighbours === 0) return p.clone()
            return p.clone().addScaledVector(adjust, 1 / hits.length)
        })
    }

    return current
}

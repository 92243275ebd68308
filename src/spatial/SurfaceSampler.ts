/**
 * SurfaceSampler — uniform random points on a triangle mesh.
 *
 * A triangle is chosen with probability proportional to its area through a
 * cumulative-area draw, then a point inside it is drawn from folded
 * barycentric coordinates.
 */

import * as THREE from 'three'
import type { MeshData } from '../types/index.js'
import type { Rng } from '../math/random.js'

export class SurfaceSampler {
    private triangles: THREE.Triangle[] = []
    private cumulative: number[] = []

    constructor(mesh: MeshData) {
        const { positions, indices } = mesh
        const vertex = (i: number) =>
            new THREE.Vector3(positions[i * 3], positions[i * 3 + 1], positions[i * 3 + 2])

        let total = 0
        for (let i = 0; i + 2 < indices.length; i += 3) {
            const tri = new THREE.Triangle(vertex(indices[i]), vertex(indices[i + 1]), vertex(indices[i + 2]))
            total += tri.getArea()
            this.triangles.push(tri)
            this.cumulative.push(total)
        }
    }

    get totalArea(): number {
        return this.cumulative.length > 0 ? this.cumulative[this.cumulative.length - 1] : 0
    }

    /** Index of the triangle covering `s` in [0, totalArea) */
    pickTriangle(s: number): number {
        let lo = 0
        let hi = this.cumulative.length - 1
        while (lo < hi) {
            const mid = (lo + hi) >> 1
            if (this.cumulative[mid] > s) hi = mid
            else lo = mid + 1
        }
        return lo
    }

    /** One point on the surface, or null for a mesh without area */
    sample(rng: Rng): THREE.Vector3 | null {
        if (this.totalArea <= 0) return null

        const tri = this.triangles[this.pickTriangle(rng() * this.totalArea)]
        let u = rng()
        let v = rng()
        if (u + v > 1) {
            u = 1 - u
            v = 1 - v
        }

        const ab = new THREE.Vector3().subVectors(tri.b, tri.a)
        const ac = new THREE.Vector3().subVectors(tri.c, tri.a)
        return tri.a.clone().addScaledVector(ab, u).addScaledVector(ac, v)
    }
}

/**
 * TriangleBVH — bounding-volume hierarchy over a triangulated mesh.
 *
 * Used for ray casts (ground projection) and closest-surface-point queries
 * (re-projecting relaxed samples). Built once; triangles are copied in,
 * optionally through a matrix, so later edits to the source mesh are not seen.
 *
 * Split strategy: median of triangle centroids along the longest axis of
 * the node's bounds, leaves of at most LEAF_SIZE triangles.
 */

import * as THREE from 'three'
import type { MeshData } from '../types/index.js'

const LEAF_SIZE = 4

export interface RayHit {
    point: THREE.Vector3
    normal: THREE.Vector3
    distance: number
    faceIndex: number
}

export interface SurfacePoint {
    point: THREE.Vector3
    distance: number
    faceIndex: number
}

interface BVHNode {
    box: THREE.Box3
    /** Range into `order` for leaves */
    start: number
    count: number
    left: BVHNode | null
    right: BVHNode | null
}

export class TriangleBVH {
    private triangles: THREE.Triangle[] = []
    private centroids: THREE.Vector3[] = []
    private order: number[] = []
    private root: BVHNode | null = null

    constructor(mesh: MeshData, matrix?: THREE.Matrix4) {
        const { positions, indices } = mesh
        const vertex = (i: number): THREE.Vector3 => {
            const v = new THREE.Vector3(positions[i * 3], positions[i * 3 + 1], positions[i * 3 + 2])
            return matrix ? v.applyMatrix4(matrix) : v
        }

        for (let i = 0; i + 2 < indices.length; i += 3) {
            const tri = new THREE.Triangle(vertex(indices[i]), vertex(indices[i + 1]), vertex(indices[i + 2]))
            this.triangles.push(tri)
            this.centroids.push(new THREE.Vector3().add(tri.a).add(tri.b).add(tri.c).divideScalar(3))
        }

        this.order = this.triangles.map((_, i) => i)
        if (this.triangles.length > 0) {
            this.root = this.build(0, this.triangles.length)
        }
    }

    get triangleCount(): number {
        return this.triangles.length
    }

    /**
     * Closest hit along a ray. `direction` need not be normalized.
     * Back faces count as hits.
     */
    rayCast(origin: THREE.Vector3, direction: THREE.Vector3): RayHit | null {
        if (this.root === null) return null

        const ray = new THREE.Ray(origin.clone(), direction.clone().normalize())
        const hitPoint = new THREE.Vector3()
        let best: RayHit | null = null

        const stack: BVHNode[] = [this.root]
        while (stack.length > 0) {
            const node = stack.pop()
            if (node === undefined || !ray.intersectsBox(node.box)) continue

            if (node.left !== null && node.right !== null) {
                stack.push(node.left, node.right)
                continue
            }

            for (let i = node.start; i < node.start + node.count; i++) {
                const faceIndex = this.order[i]
                const tri = this.triangles[faceIndex]
                const hit = ray.intersectTriangle(tri.a, tri.b, tri.c, false, hitPoint)
                if (hit === null) continue

                const distance = hit.distanceTo(ray.origin)
                if (best === null || distance < best.distance) {
                    best = {
                        point: hit.clone(),
                        normal: tri.getNormal(new THREE.Vector3()),
                        distance,
                        faceIndex,
                    }
                }
            }
        }

        return best
    }

    /** Closest point on the surface, or null for an empty mesh */
    nearestPoint(target: THREE.Vector3): SurfacePoint | null {
        if (this.root === null) return null

        const candidate = new THREE.Vector3()
        let best: SurfacePoint | null = null

        const visit = (node: BVHNode): void => {
            if (best !== null && node.box.distanceToPoint(target) > best.distance) return

            if (node.left !== null && node.right !== null) {
                // Nearer child first so the far one is more likely pruned
                const dl = node.left.box.distanceToPoint(target)
                const dr = node.right.box.distanceToPoint(target)
                const [first, second] = dl <= dr ? [node.left, node.right] : [node.right, node.left]
                visit(first)
                visit(second)
                return
            }

            for (let i = node.start; i < node.start + node.count; i++) {
                const faceIndex = this.order[i]
                this.triangles[faceIndex].closestPointToPoint(target, candidate)
                const distance = candidate.distanceTo(target)
                if (best === null || distance < best.distance) {
                    best = { point: candidate.clone(), distance, faceIndex }
                }
            }
        }

        visit(this.root)
        return best
    }

    private build(start: number, count: number): BVHNode {
        const box = new THREE.Box3()
        for (let i = start; i < start + count; i++) {
            const tri = this.triangles[this.order[i]]
            box.expandByPoint(tri.a).expandByPoint(tri.b).expandByPoint(tri.c)
        }

        if (count <= LEAF_SIZE) {
            return { box, start, count, left: null, right: null }
        }

        const size = box.getSize(new THREE.Vector3())
        const axis = size.x >= size.y && size.x >= size.z ? 0 : size.y >= size.z ? 1 : 2

        const sorted = this.order
            .slice(start, start + count)
            .sort((a, b) => this.centroids[a].getComponent(axis) - this.centroids[b].getComponent(axis))
        for (let i = 0; i < sorted.length; i++) {
            this.order[start + i] = sorted[i]
        }

        const half = count >> 1
        return {
            box,
            start,
            count,
            left: this.build(start, half),
            right: this.build(start + half, count - half),
        }
    }
}

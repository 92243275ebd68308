/**
 * KDTree — balanced 3-D point tree for nearest and range queries.
 *
 * Built once from a point list and never modified. The tree is implicit:
 * `order` holds point indices arranged so that every sub-range [lo, hi)
 * has its splitting point at the middle.
 */

import * as THREE from 'three'

export interface PointHit {
    /** Index into the point list the tree was built from */
    index: number
    point: THREE.Vector3
    distance: number
}

export class KDTree {
    private points: THREE.Vector3[]
    private order: number[]

    constructor(points: readonly THREE.Vector3[]) {
        this.points = points.map(p => p.clone())
        this.order = this.points.map((_, i) => i)
        this.build(0, this.order.length, 0)
    }

    get size(): number {
        return this.points.length
    }

    /** Closest point, or null when the tree is empty */
    nearest(target: THREE.Vector3): PointHit | null {
        const best = { index: -1, distSq: Infinity }

        const visit = (lo: number, hi: number, depth: number): void => {
            if (lo >= hi) return
            const mid = (lo + hi) >> 1
            const index = this.order[mid]
            const point = this.points[index]

            const distSq = point.distanceToSquared(target)
            if (distSq < best.distSq) {
                best.index = index
                best.distSq = distSq
            }

            const axis = depth % 3
            const diff = target.getComponent(axis) - point.getComponent(axis)
            if (diff < 0) {
                visit(lo, mid, depth + 1)
                if (diff * diff < best.distSq) visit(mid + 1, hi, depth + 1)
            } else {
                visit(mid + 1, hi, depth + 1)
                if (diff * diff < best.distSq) visit(lo, mid, depth + 1)
            }
        }

        visit(0, this.order.length, 0)

        if (best.index < 0) return null
        return {
            index: best.index,
            point: this.points[best.index].clone(),
            distance: Math.sqrt(best.distSq),
        }
    }

    /** Every point within `radius` of target (inclusive), unordered */
    withinRadius(target: THREE.Vector3, radius: number): PointHit[] {
        const hits: PointHit[] = []
        const radiusSq = radius * radius

        const visit = (lo: number, hi: number, depth: number): void => {
            if (lo >= hi) return
            const mid = (lo + hi) >> 1
            const index = this.order[mid]
            const point = this.points[index]

            const distSq = point.distanceToSquared(target)
            if (distSq <= radiusSq) {
                hits.push({ index, point: point.clone(), distance: Math.sqrt(distSq) })
            }

            const axis = depth % 3
            const diff = target.getComponent(axis) - point.getComponent(axis)
            if (diff - radius <= 0) visit(lo, mid, depth + 1)
            if (diff + radius >= 0) visit(mid + 1, hi, depth + 1)
        }

        visit(0, this.order.length, 0)
        return hits
    }

    private build(lo: number, hi: number, depth: number): void {
        if (hi - lo <= 1) return
        const axis = depth % 3

        const sorted = this.order
            .slice(lo, hi)
            .sort((a, b) => this.points[a].getComponent(axis) - this.points[b].getComponent(axis))
        for (let i = 0; i < sorted.length; i++) {
            this.order[lo + i] = sorted[i]
        }

        const mid = (lo + hi) >> 1
        this.build(lo, mid, depth + 1)
        this.build(mid + 1, hi, depth + 1)
    }
}

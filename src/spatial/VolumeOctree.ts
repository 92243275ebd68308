/**
 * VolumeOctree — octree over boxes and spheres for point containment.
 *
 * Each volume lives in the deepest octant that fully contains its bounds.
 * A point query descends only into octants containing the point and tests
 * the volumes stored along the way.
 */

import * as THREE from 'three'

export type Volume =
    | { kind: 'box'; box: THREE.Box3 }
    | { kind: 'sphere'; sphere: THREE.Sphere }

interface Entry<T> {
    volume: Volume
    bounds: THREE.Box3
    value: T
}

interface OctreeNode<T> {
    bounds: THREE.Box3
    entries: Entry<T>[]
    children: OctreeNode<T>[] | null
    depth: number
}

export interface OctreeOptions {
    /** Entries a node holds before it splits (default 8) */
    capacity?: number
    /** Maximum subdivision depth (default 8) */
    maxDepth?: number
}

export class VolumeOctree<T> {
    private root: OctreeNode<T> | null = null
    private capacity: number
    private maxDepth: number
    private _size = 0

    constructor(items: ReadonlyArray<{ volume: Volume; value: T }>, options: OctreeOptions = {}) {
        this.capacity = options.capacity ?? 8
        this.maxDepth = options.maxDepth ?? 8

        const entries = items.map(item => ({
            volume: item.volume,
            bounds: volumeBounds(item.volume),
            value: item.value,
        }))
        if (entries.length === 0) return

        const bounds = new THREE.Box3()
        for (const entry of entries) bounds.union(entry.bounds)
        this.root = { bounds, entries: [], children: null, depth: 0 }

        for (const entry of entries) {
            this.insert(this.root, entry)
        }
        this._size = entries.length
    }

    get size(): number {
        return this._size
    }

    /** Values of every volume containing the point (boundary inclusive) */
    query(point: THREE.Vector3): T[] {
        const found: T[] = []
        if (this.root === null) return found

        // A point on an octant face belongs to every octant sharing it
        const stack: OctreeNode<T>[] = [this.root]
        while (stack.length > 0) {
            const node = stack.pop()
            if (node === undefined || !node.bounds.containsPoint(point)) continue

            for (const entry of node.entries) {
                if (containsPoint(entry.volume, point)) found.push(entry.value)
            }
            if (node.children !== null) stack.push(...node.children)
        }

        return found
    }

    private insert(node: OctreeNode<T>, entry: Entry<T>): void {
        if (node.children !== null) {
            const child = node.children.find(c => c.bounds.containsBox(entry.bounds))
            if (child) {
                this.insert(child, entry)
                return
            }
            node.entries.push(entry)
            return
        }

        node.entries.push(entry)
        if (node.entries.length > this.capacity && node.depth < this.maxDepth) {
            this.split(node)
        }
    }

    private split(node: OctreeNode<T>): void {
        const { min, max } = node.bounds
        const center = node.bounds.getCenter(new THREE.Vector3())
        const children: OctreeNode<T>[] = []

        for (let i = 0; i < 8; i++) {
            const lo = new THREE.Vector3(
                i & 1 ? center.x : min.x,
                i & 2 ? center.y : min.y,
                i & 4 ? center.z : min.z
            )
            const hi = new THREE.Vector3(
                i & 1 ? max.x : center.x,
                i & 2 ? max.y : center.y,
                i & 4 ? max.z : center.z
            )
            children.push({ bounds: new THREE.Box3(lo, hi), entries: [], children: null, depth: node.depth + 1 })
        }

        const pending = node.entries
        node.entries = []
        node.children = children
        for (const entry of pending) {
            this.insert(node, entry)
        }
    }
}

function volumeBounds(volume: Volume): THREE.Box3 {
    return volume.kind === 'box'
        ? volume.box.clone()
        : volume.sphere.getBoundingBox(new THREE.Box3())
}

function containsPoint(volume: Volume, point: THREE.Vector3): boolean {
    return volume.kind === 'box'
        ? volume.box.containsPoint(point)
        : volume.sphere.containsPoint(point)
}

/**
 * PlacementRequest — the value threaded top-down through placement nodes.
 *
 * Single-child nodes may mutate the request they receive before passing it
 * on. Any node that hands a request to more than one child, or more than
 * once, hands out clones: a branch never sees another branch's edits.
 */

import * as THREE from 'three'
import type { GeometryRef, GeometryResult, TagValue } from '../types/index.js'
import { toEuler } from '../math/transform.js'

export const DEFAULT_GROUP = 'allAgents'

export interface PlacementRequestInit {
    position: THREE.Vector3
    rotation: THREE.Vector3
    scale: number
    tags: ReadonlyMap<string, TagValue>
    group: string
    materials: ReadonlyMap<string, string>
}

export class PlacementRequest {
    position: THREE.Vector3
    /** Euler angles in radians */
    rotation: THREE.Vector3
    scale: number
    tags: Map<string, TagValue>
    group: string
    /** original material name → replacement material name */
    materials: Map<string, string>

    constructor(init: Partial<PlacementRequestInit> = {}) {
        this.position = init.position?.clone() ?? new THREE.Vector3()
        this.rotation = init.rotation?.clone() ?? new THREE.Vector3()
        this.scale = init.scale ?? 1
        this.tags = new Map(init.tags ?? [])
        this.group = init.group ?? DEFAULT_GROUP
        this.materials = new Map(init.materials ?? [])
    }

    clone(): PlacementRequest {
        return new PlacementRequest(this)
    }

    /** Clone with a different position */
    at(position: THREE.Vector3, rotation?: THREE.Vector3): PlacementRequest {
        const fork = this.clone()
        fork.position.copy(position)
        if (rotation) fork.rotation.copy(rotation)
        return fork
    }

    euler(): THREE.Euler {
        return toEuler(this.rotation)
    }
}

export interface GeometryRequest {
    placement: PlacementRequest
    /** Return placeholders instead of duplicating geometry */
    deferred: boolean
}

export function forkGeometryRequest(request: GeometryRequest): GeometryRequest {
    return { placement: request.placement.clone(), deferred: request.deferred }
}

export function geometryResult(geometry: GeometryRef): GeometryResult {
    return {
        geometry,
        rigOverride: null,
        constrainBone: null,
        boneModifications: {},
    }
}

/**
 * SceneBackend — everything the graph needs from the host scene.
 *
 * The graph never owns objects, materials or meshes. It reads snapshots
 * through the lookup half of this interface while validating and sampling,
 * and asks the mutating half to duplicate, link, transform and register.
 *
 * All calls are synchronous. A call that throws aborts the build.
 */

import type * as THREE from 'three'
import type {
    AgentRegistration,
    GeometryHandle,
    GeometryRef,
    MeshData,
    SceneObject,
} from '../types/index.js'

export type PlacementGroupType = 'auto' | 'manual'

export interface DuplicatedGroup {
    /** Armature duplicate, or an anchor the backend synthesised */
    top: GeometryHandle
    members: GeometryHandle[]
}

export interface LinkedRig {
    object: GeometryHandle
    rig: GeometryHandle
}

/** Read-only queries. This is all validation may touch. */
export interface SceneLookup {
    hasObject(name: string): boolean
    hasGroup(name: string): boolean
    /** True when the object exists and carries mesh data */
    hasMesh(objectName: string): boolean
    hasMaterial(name: string): boolean
}

export interface SceneBackend extends SceneLookup {
    // ------------------------------------------------------------------
    // Snapshots
    // ------------------------------------------------------------------

    getObject(name: string): SceneObject
    getGroupObjects(groupName: string): SceneObject[]
    getMesh(objectName: string): MeshData
    listMaterials(): string[]

    // ------------------------------------------------------------------
    // Placement groups
    // ------------------------------------------------------------------

    groupExists(name: string): boolean
    isGroupFrozen(name: string): boolean
    getGroupType(name: string): PlacementGroupType
    resetGroup(name: string): void
    createGroup(name: string): void

    // ------------------------------------------------------------------
    // Geometry
    // ------------------------------------------------------------------

    duplicateObject(name: string): GeometryHandle
    duplicateGroupMembers(groupName: string): DuplicatedGroup
    /**
     * Link a rig from an external file and constrain `constrainBone` to
     * follow `target`'s location and rotation.
     */
    linkExternalGroup(
        sourcePath: string,
        groupName: string,
        rigObjectName: string,
        constrainBone: string,
        target: GeometryRef
    ): LinkedRig
    /** Child-of constraint to a bone, using the bone's inverse bind matrix */
    attachToBone(child: GeometryRef, parent: GeometryRef, boneName: string): void
    setTransform(handle: GeometryHandle, position: THREE.Vector3, rotation: THREE.Euler, scale: number): void
    applyMaterials(handle: GeometryHandle, substitutions: ReadonlyMap<string, string>): void

    // ------------------------------------------------------------------
    // Agents
    // ------------------------------------------------------------------

    registerAgent(agent: AgentRegistration): void
}

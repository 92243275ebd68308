/**
 * InMemoryScene — a SceneBackend that keeps everything in maps.
 *
 * Used by the unit tests and for trying graphs out without a host
 * application. Every mutating call is recorded so callers can inspect
 * what a build would have done.
 */

import type * as THREE from 'three'
import type {
    AgentRegistration,
    GeometryHandle,
    GeometryRef,
    MeshData,
    SceneObject,
    SceneObjectType,
    Vec3Tuple,
} from '../types/index.js'
import type { DuplicatedGroup, LinkedRig, PlacementGroupType, SceneBackend } from './SceneBackend.js'

export interface ObjectInit {
    type?: SceneObjectType
    location?: Vec3Tuple
    rotation?: Vec3Tuple
    scale?: Vec3Tuple
    dimensions?: Vec3Tuple
    mesh?: MeshData
}

interface PlacementGroup {
    type: PlacementGroupType
    frozen: boolean
}

export interface TransformRecord {
    handle: GeometryHandle
    position: Vec3Tuple
    rotation: Vec3Tuple
    scale: number
}

export interface AttachmentRecord {
    child: GeometryRef
    parent: GeometryRef
    boneName: string
}

export interface LinkRecord {
    sourcePath: string
    groupName: string
    rigObjectName: string
    constrainBone: string
    target: GeometryRef
}

export class InMemoryScene implements SceneBackend {
    private objects = new Map<string, SceneObject>()
    private meshes = new Map<string, MeshData>()
    private groups = new Map<string, string[]>()
    private materials = new Set<string>()
    private libraries = new Set<string>()
    private placementGroups = new Map<string, PlacementGroup>()
    private copyCounts = new Map<string, number>()

    readonly duplicates: GeometryHandle[] = []
    readonly transforms: TransformRecord[] = []
    readonly materialAssignments: Array<{ handle: GeometryHandle; substitutions: Record<string, string> }> = []
    readonly attachments: AttachmentRecord[] = []
    readonly links: LinkRecord[] = []
    readonly resets: string[] = []
    readonly agents: AgentRegistration[] = []

    // ========================================================================
    // SETUP
    // ========================================================================

    addObject(name: string, init: ObjectInit = {}): this {
        this.objects.set(name, {
            name,
            type: init.type ?? (init.mesh ? 'mesh' : 'empty'),
            location: init.location ?? [0, 0, 0],
            rotation: init.rotation ?? [0, 0, 0],
            scale: init.scale ?? [1, 1, 1],
            dimensions: init.dimensions ?? [0, 0, 0],
        })
        if (init.mesh) this.meshes.set(name, init.mesh)
        return this
    }

    addGroup(name: string, members: string[]): this {
        this.groups.set(name, [...members])
        return this
    }

    addMaterials(...names: string[]): this {
        for (const name of names) this.materials.add(name)
        return this
    }

    /** Make an external file available to linkExternalGroup */
    addLibrary(path: string): this {
        this.libraries.add(path)
        return this
    }

    addPlacementGroup(name: string, type: PlacementGroupType = 'manual', frozen = false): this {
        this.placementGroups.set(name, { type, frozen })
        return this
    }

    agentsInGroup(groupName: string): AgentRegistration[] {
        return this.agents.filter(a => a.groupName === groupName)
    }

    // ========================================================================
    // LOOKUPS
    // ========================================================================

    hasObject(name: string): boolean {
        return this.objects.has(name)
    }

    hasGroup(name: string): boolean {
        return this.groups.has(name)
    }

    hasMesh(objectName: string): boolean {
        return this.meshes.has(objectName)
    }

    hasMaterial(name: string): boolean {
        return this.materials.has(name)
    }

    getObject(name: string): SceneObject {
        const obj = this.objects.get(name)
        if (!obj) throw new Error(`InMemoryScene: no object "${name}"`)
        return obj
    }

    getGroupObjects(groupName: string): SceneObject[] {
        const members = this.groups.get(groupName)
        if (!members) throw new Error(`InMemoryScene: no group "${groupName}"`)
        return members.map(name => this.getObject(name))
    }

    getMesh(objectName: string): MeshData {
        const mesh = this.meshes.get(objectName)
        if (!mesh) throw new Error(`InMemoryScene: object "${objectName}" has no mesh`)
        return mesh
    }

    listMaterials(): string[] {
        return Array.from(this.materials)
    }

    // ========================================================================
    // PLACEMENT GROUPS
    // ========================================================================

    groupExists(name: string): boolean {
        return this.placementGroups.has(name)
    }

    isGroupFrozen(name: string): boolean {
        return this.placementGroups.get(name)?.frozen ?? false
    }

    getGroupType(name: string): PlacementGroupType {
        return this.placementGroups.get(name)?.type ?? 'manual'
    }

    resetGroup(name: string): void {
        this.resets.push(name)
        this.agents.splice(0, this.agents.length, ...this.agents.filter(a => a.groupName !== name))
    }

    createGroup(name: string): void {
        if (!this.placementGroups.has(name)) {
            this.placementGroups.set(name, { type: 'auto', frozen: false })
        }
    }

    // ========================================================================
    // GEOMETRY
    // ========================================================================

    duplicateObject(name: string): GeometryHandle {
        this.getObject(name)
        return this.copy(name)
    }

    duplicateGroupMembers(groupName: string): DuplicatedGroup {
        const members = this.getGroupObjects(groupName)
        const copies = members.map(obj => this.copy(obj.name))
        const armature = members.findIndex(obj => obj.type === 'armature')
        const top = armature >= 0 ? copies[armature] : this.copy(`${groupName}_anchor`)
        return { top, members: copies }
    }

    linkExternalGroup(
        sourcePath: string,
        groupName: string,
        rigObjectName: string,
        constrainBone: string,
        target: GeometryRef
    ): LinkedRig {
        if (!this.libraries.has(sourcePath)) {
            throw new Error(`InMemoryScene: cannot open library "${sourcePath}"`)
        }
        this.links.push({ sourcePath, groupName, rigObjectName, constrainBone, target })
        return {
            object: this.copy(groupName),
            rig: this.copy(rigObjectName),
        }
    }

    attachToBone(child: GeometryRef, parent: GeometryRef, boneName: string): void {
        this.attachments.push({ child, parent, boneName })
    }

    setTransform(handle: GeometryHandle, position: THREE.Vector3, rotation: THREE.Euler, scale: number): void {
        this.transforms.push({
            handle,
            position: [position.x, position.y, position.z],
            rotation: [rotation.x, rotation.y, rotation.z],
            scale,
        })
    }

    applyMaterials(handle: GeometryHandle, substitutions: ReadonlyMap<string, string>): void {
        this.materialAssignments.push({ handle, substitutions: Object.fromEntries(substitutions) })
    }

    // ========================================================================
    // AGENTS
    // ========================================================================

    registerAgent(agent: AgentRegistration): void {
        this.agents.push(agent)
    }

    /** Copies are named Cube.001, Cube.002, ... */
    private copy(name: string): GeometryHandle {
        const n = (this.copyCounts.get(name) ?? 0) + 1
        this.copyCounts.set(name, n)
        const handle = { id: `${name}.${String(n).padStart(3, '0')}` }
        this.duplicates.push(handle)
        return handle
    }
}

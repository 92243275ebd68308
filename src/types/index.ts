/**
 * Placement Graph — Core Types
 *
 * Value types shared by the spatial indexes, the node graph and the
 * scene backend boundary. Pure data, no three.js classes.
 */

// ============================================================================
// PRIMITIVES
// ============================================================================

export type Vec3Tuple = [number, number, number]

/** Value stored under a tag name on an agent */
export type TagValue = number | string | boolean

export type NodeFamily = 'placement' | 'geometry'

// ============================================================================
// SCENE SNAPSHOTS
// ============================================================================

export type SceneObjectType = 'mesh' | 'armature' | 'empty' | 'other'

/**
 * Read-only snapshot of a scene object, as handed out by the backend.
 * Rotation is Euler angles in radians (X, then Y, then Z about fixed axes).
 */
export interface SceneObject {
    name: string
    type: SceneObjectType
    location: Vec3Tuple
    rotation: Vec3Tuple
    scale: Vec3Tuple
    /** Size of the object's bounding box in world units */
    dimensions: Vec3Tuple
}

/**
 * Triangulated mesh in the owning object's local space.
 * `positions` is flat xyz, `indices` holds three vertex indices per triangle.
 */
export interface MeshData {
    positions: ArrayLike<number>
    indices: ArrayLike<number>
}

// ============================================================================
// GEOMETRY
// ============================================================================

/** Opaque reference to something the backend created. */
export interface GeometryHandle {
    readonly id: string
}

/**
 * What a geometry subgraph produced: either a live duplicate, or a
 * placeholder the backend resolves later.
 */
export type GeometryRef =
    | { kind: 'instance'; handle: GeometryHandle }
    | { kind: 'deferred'; source: 'object'; objectName: string }
    | { kind: 'deferred'; source: 'group'; groupName: string; armatureName: string | null }

/** bone name → attribute name → tag name */
export type BoneModifications = Record<string, Record<string, string>>

export interface GeometryResult {
    geometry: GeometryRef
    rigOverride: GeometryHandle | null
    constrainBone: string | null
    boneModifications: BoneModifications
}

// ============================================================================
// AGENTS
// ============================================================================

export interface AgentRegistration {
    geometry: GeometryRef
    brainType: string
    groupName: string
    position: Vec3Tuple
    rotation: Vec3Tuple
    scale: number
    tags: Record<string, TagValue>
    materials: Record<string, string>
    rigOverride: GeometryHandle | null
    constrainBone: string | null
    boneModifications: BoneModifications
}

// ============================================================================
// BUILD REPORTING
// ============================================================================

export type DropReason = 'obstacle' | 'ground' | 'frozenGroup'

export interface BuildStats {
    /** Agents registered with the backend */
    agents: number
    /** Total node evaluations across the graph */
    evaluations: number
    /** Branches that ended without an agent, by reason */
    dropped: Record<DropReason, number>
}

export interface ValidationIssue {
    nodeId: string
    nodeType: string
    message: string
}

/**
 * Placement Graph — Public API
 *
 * Procedural placement of agents through a graph of template nodes.
 * Scene storage stays with the host, behind SceneBackend.
 */

// Core types
export type {
    Vec3Tuple,
    TagValue,
    NodeFamily,
    SceneObjectType,
    SceneObject,
    MeshData,
    GeometryHandle,
    GeometryRef,
    BoneModifications,
    GeometryResult,
    AgentRegistration,
    DropReason,
    BuildStats,
    ValidationIssue,
} from './types/index.js'

// Graph
export { PlacementGraph, GraphDescriptionSchema } from './graph/PlacementGraph.js'
export type {
    BuildOptions,
    BuildResult,
    GraphDescription,
    NodeDescription,
    ValidationResult,
} from './graph/PlacementGraph.js'
export { PlacementRequest, DEFAULT_GROUP, forkGeometryRequest, geometryResult } from './graph/PlacementRequest.js'
export type { PlacementRequestInit, GeometryRequest } from './graph/PlacementRequest.js'
export { BaseNode, PlacementNode, GeometryNode, TemplateNode } from './graph/Node.js'
export type { GraphNode, NodeInit, NodeInputs, SlotSpec } from './graph/Node.js'
export { NodeRegistry, defineNodeKind } from './graph/registry.js'
export type { NodeKind, NodeKindDefinition, CreateResult } from './graph/registry.js'
export { BuildContext, ValidationPass } from './graph/context.js'
export type { Logger } from './graph/context.js'
export { GraphError, ConfigurationError, BuildError, GraphStateError } from './graph/errors.js'

// Built-in nodes
export { builtinNodeKinds, createDefaultRegistry } from './nodes/index.js'

// Scene backend
export type {
    SceneBackend,
    SceneLookup,
    PlacementGroupType,
    DuplicatedGroup,
    LinkedRig,
} from './scene/SceneBackend.js'
export { InMemoryScene } from './scene/InMemoryScene.js'

// Spatial indexes
export { KDTree } from './spatial/KDTree.js'
export type { PointHit } from './spatial/KDTree.js'
export { TriangleBVH } from './spatial/TriangleBVH.js'
export type { RayHit, SurfacePoint } from './spatial/TriangleBVH.js'
export { VolumeOctree } from './spatial/VolumeOctree.js'
export type { Volume, OctreeOptions } from './spatial/VolumeOctree.js'
export { SurfaceSampler } from './spatial/SurfaceSampler.js'
export { relax } from './spatial/relax.js'
export type { RelaxOptions } from './spatial/relax.js'

// Utilities
export { createRng } from './math/random.js'
export type { Rng } from './math/random.js'
export { EULER_ORDER } from './math/transform.js'

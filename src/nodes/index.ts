/**
 * Built-in node kinds.
 */

import { NodeRegistry, type NodeKind } from '../graph/registry.js'
import { agentKind } from './placement/AgentNode.js'
import { combineKind } from './placement/CombineNode.js'
import { switchKind } from './placement/SwitchNode.js'
import { offsetKind } from './placement/OffsetNode.js'
import { randomKind } from './placement/RandomNode.js'
import { pointTowardsKind } from './placement/PointTowardsNode.js'
import { randomMaterialKind } from './placement/RandomMaterialNode.js'
import { setTagKind } from './placement/SetTagNode.js'
import { addToGroupKind } from './placement/AddToGroupNode.js'
import { randomPositioningKind } from './placement/RandomPositioningNode.js'
import { meshPositioningKind } from './placement/MeshPositioningNode.js'
import { formationKind } from './placement/FormationNode.js'
import { targetKind } from './placement/TargetNode.js'
import { obstacleKind } from './placement/ObstacleNode.js'
import { groundKind } from './placement/GroundNode.js'
import { objectInputKind } from './geometry/ObjectInputNode.js'
import { groupInputKind } from './geometry/GroupInputNode.js'
import { geoSwitchKind } from './geometry/GeoSwitchNode.js'
import { parentKind } from './geometry/ParentNode.js'
import { linkGroupKind } from './geometry/LinkGroupNode.js'
import { modifyBoneKind } from './geometry/ModifyBoneNode.js'

export const builtinNodeKinds: readonly NodeKind[] = [
    // Placement
    agentKind,
    combineKind,
    switchKind,
    offsetKind,
    randomKind,
    pointTowardsKind,
    randomMaterialKind,
    setTagKind,
    addToGroupKind,
    randomPositioningKind,
    meshPositioningKind,
    formationKind,
    targetKind,
    obstacleKind,
    groundKind,
    // Geometry
    objectInputKind,
    groupInputKind,
    geoSwitchKind,
    parentKind,
    linkGroupKind,
    modifyBoneKind,
]

export function createDefaultRegistry(): NodeRegistry {
    return new NodeRegistry(builtinNodeKinds)
}

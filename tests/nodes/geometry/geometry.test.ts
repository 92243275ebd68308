import { describe, it, expect } from 'vitest'
import { PlacementGraph, type NodeDescription } from '../../../src/graph/PlacementGraph.js'
import { BuildError } from '../../../src/graph/errors.js'
import * as THREE from 'three'
import { InMemoryScene } from '../../../src/scene/InMemoryScene.js'
import { buildGraph, planeMesh, sequence } from '../../helpers.js'

function characterScene(): InMemoryScene {
    return new InMemoryScene()
        .addObject('Cube')
        .addObject('Cone')
        .addObject('Hat')
        .addObject('Armature', { type: 'armature' })
        .addObject('BodyMesh', { mesh: planeMesh(1) })
        .addObject('Crate')
        .addGroup('Rig', ['Armature', 'BodyMesh'])
        .addGroup('Props', ['Crate'])
}

/** Agent whose Objects input is `geometry`, followed by the geometry nodes */
function agentOf(geometry: string, nodes: NodeDescription[], settings: Record<string, unknown> = {}): NodeDescription[] {
    return [
        { id: 'agent', type: 'agent', inputs: { Objects: geometry }, settings: { brainType: 'walker', ...settings } },
        ...nodes,
    ]
}

// ============================================================================
// OBJECT INPUT
// ============================================================================

describe('object-input', () => {
    it('duplicates the object and applies pending materials', () => {
        const scene = characterScene()
        buildGraph(agentOf('body', [{ id: 'body', type: 'object-input', settings: { inputObject: 'Cube' } }]), scene, {
            origin: { materials: new Map([['Paint', 'Red']]) },
        })

        expect(scene.duplicates.map(h => h.id)).toEqual(['Cube.001'])
        expect(scene.materialAssignments[0]).toEqual({ handle: { id: 'Cube.001' }, substitutions: { Paint: 'Red' } })
    })

    it('returns a placeholder when deferred', () => {
        const scene = characterScene()
        buildGraph(agentOf('body', [{ id: 'body', type: 'object-input', settings: { inputObject: 'Cube' } }], { deferGeometry: true }), scene, {
            origin: { materials: new Map([['Paint', 'Red']]) },
        })

        expect(scene.duplicates).toEqual([])
        expect(scene.materialAssignments).toEqual([])
        expect(scene.agents[0].geometry).toEqual({ kind: 'deferred', source: 'object', objectName: 'Cube' })
        expect(scene.agents[0].materials).toEqual({ Paint: 'Red' })
    })
})

// ============================================================================
// GROUP INPUT
// ============================================================================

describe('group-input', () => {
    it('hands back the armature copy', () => {
        const scene = characterScene()
        buildGraph(agentOf('rig', [{ id: 'rig', type: 'group-input', settings: { inputGroup: 'Rig' } }]), scene, {
            origin: { materials: new Map([['Paint', 'Red']]) },
        })

        expect(scene.duplicates.map(h => h.id)).toEqual(['Armature.001', 'BodyMesh.001'])
        expect(scene.agents[0].geometry).toEqual({ kind: 'instance', handle: { id: 'Armature.001' } })
        // Every member, then the agent's own pass over the top object
        expect(scene.materialAssignments.map(m => m.handle.id)).toEqual(['Armature.001', 'BodyMesh.001', 'Armature.001'])
    })

    it('hands back an anchor when there is no armature', () => {
        const scene = characterScene()
        buildGraph(agentOf('props', [{ id: 'props', type: 'group-input', settings: { inputGroup: 'Props' } }]), scene)
        expect(scene.agents[0].geometry).toEqual({ kind: 'instance', handle: { id: 'Props_anchor.001' } })
    })

    it('names the group and its armature when deferred', () => {
        const scene = characterScene()
        buildGraph([
            { id: 'both', type: 'combine', inputs: { A: 'rigAgent', B: 'propAgent' } },
            { id: 'rigAgent', type: 'agent', inputs: { Objects: 'rig' }, settings: { brainType: 'walker', deferGeometry: true } },
            { id: 'propAgent', type: 'agent', inputs: { Objects: 'props' }, settings: { brainType: 'prop', deferGeometry: true } },
            { id: 'rig', type: 'group-input', settings: { inputGroup: 'Rig' } },
            { id: 'props', type: 'group-input', settings: { inputGroup: 'Props' } },
        ], scene)

        expect(scene.duplicates).toEqual([])
        expect(scene.agents.map(a => a.geometry)).toEqual([
            { kind: 'deferred', source: 'group', groupName: 'Rig', armatureName: 'Armature' },
            { kind: 'deferred', source: 'group', groupName: 'Props', armatureName: null },
        ])
    })

    it('needs the group', () => {
        const graph = PlacementGraph.fromDescription({
            nodes: agentOf('rig', [{ id: 'rig', type: 'group-input', settings: { inputGroup: 'Crew' } }]),
        })
        expect(graph.validate(characterScene()).issues).toEqual([
            { nodeId: 'rig', nodeType: 'group-input', message: 'group "Crew" not found' },
        ])
    })
})

// ============================================================================
// GEO SWITCH
// ============================================================================

describe('geo-switch', () => {
    const nodes = (switchAmount: number) => [
        { id: 'spawn', type: 'formation', inputs: { Template: 'agent' }, settings: { noToPlace: 4 } },
        ...agentOf('pick', [
            { id: 'pick', type: 'geo-switch', inputs: { 'Object 1': 'cube', 'Object 2': 'cone' }, settings: { switchAmount } },
            { id: 'cube', type: 'object-input', settings: { inputObject: 'Cube' } },
            { id: 'cone', type: 'object-input', settings: { inputObject: 'Cone' } },
        ]),
    ]

    it('picks per agent', () => {
        const scene = characterScene()
        buildGraph(nodes(0.5), scene, { rng: sequence(0.1, 0.9, 0.9, 0.1) })
        expect(scene.duplicates.map(h => h.id)).toEqual(['Cube.001', 'Cone.001', 'Cone.002', 'Cube.002'])
    })

    it('always takes the first input at 1', () => {
        const scene = characterScene()
        buildGraph(nodes(1), scene, { seed: 5 })
        expect(scene.duplicates.map(h => h.id)).toEqual(['Cube.001', 'Cube.002', 'Cube.003', 'Cube.004'])
    })

    it('needs geometry inputs', () => {
        const graph = PlacementGraph.fromDescription({
            nodes: [
                ...agentOf('pick', [
                    { id: 'pick', type: 'geo-switch', inputs: { 'Object 1': 'cube', 'Object 2': 'agent2' } },
                    { id: 'cube', type: 'object-input', settings: { inputObject: 'Cube' } },
                ]),
                { id: 'agent2', type: 'agent', inputs: { Objects: 'cube' }, settings: { brainType: 'walker' } },
            ],
        })
        expect(graph.validate(characterScene()).issues).toEqual([
            { nodeId: 'pick', nodeType: 'geo-switch', message: 'input "Object 2" needs a geometry node, got agent[agent2]' },
        ])
    })
})

// ============================================================================
// PARENT
// ============================================================================

describe('parent', () => {
    const nodes: NodeDescription[] = [
        { id: 'par', type: 'parent', inputs: { 'Parent Group': 'rig', 'Child Object': 'hat' }, settings: { parentTo: 'head' } },
        { id: 'rig', type: 'group-input', settings: { inputGroup: 'Rig' } },
        { id: 'hat', type: 'object-input', settings: { inputObject: 'Hat' } },
    ]

    it('pins the child to a bone of the parent', () => {
        const scene = characterScene()
        buildGraph(agentOf('par', nodes), scene, { origin: { position: new THREE.Vector3(1, 0, 0) } })

        expect(scene.duplicates.map(h => h.id)).toEqual(['Armature.001', 'BodyMesh.001', 'Hat.001'])
        expect(scene.attachments).toEqual([{
            child: { kind: 'instance', handle: { id: 'Hat.001' } },
            parent: { kind: 'instance', handle: { id: 'Armature.001' } },
            boneName: 'head',
        }])
        expect(scene.agents[0].geometry).toEqual({ kind: 'instance', handle: { id: 'Armature.001' } })
        expect(scene.transforms.map(t => t.handle.id)).toEqual(['Armature.001'])
    })

    it('pins placeholders when deferred', () => {
        const scene = characterScene()
        buildGraph(agentOf('par', nodes, { deferGeometry: true }), scene)

        expect(scene.attachments).toEqual([{
            child: { kind: 'deferred', source: 'object', objectName: 'Hat' },
            parent: { kind: 'deferred', source: 'group', groupName: 'Rig', armatureName: 'Armature' },
            boneName: 'head',
        }])
    })

    it('needs a bone', () => {
        const graph = PlacementGraph.fromDescription({
            nodes: agentOf('par', [{ ...nodes[0], settings: {} }, nodes[1], nodes[2]]),
        })
        expect(graph.validate(characterScene()).issues).toEqual([
            { nodeId: 'par', nodeType: 'parent', message: 'setting "parentTo" must not be empty' },
        ])
    })
})

// ============================================================================
// LINK GROUP
// ============================================================================

describe('link-group', () => {
    const nodes = agentOf('link', [
        {
            id: 'link',
            type: 'link-group',
            inputs: { Objects: 'body' },
            settings: { groupFile: 'assets/rigs.lib', groupName: 'Walkers', rigObject: 'MainRig', constrainBone: 'root' },
        },
        { id: 'body', type: 'object-input', settings: { inputObject: 'Cube' } },
    ])

    it('links the rig and drives a bone from the child', () => {
        const scene = characterScene().addLibrary('assets/rigs.lib')
        buildGraph(nodes, scene)

        expect(scene.links).toEqual([{
            sourcePath: 'assets/rigs.lib',
            groupName: 'Walkers',
            rigObjectName: 'MainRig',
            constrainBone: 'root',
            target: { kind: 'instance', handle: { id: 'Cube.001' } },
        }])
        const [agent] = scene.agents
        expect(agent.geometry).toEqual({ kind: 'instance', handle: { id: 'Cube.001' } })
        expect(agent.rigOverride).toEqual({ id: 'MainRig.001' })
        expect(agent.constrainBone).toBe('root')
    })

    it('aborts the build when the file cannot be opened', () => {
        const scene = characterScene()

        let error: unknown
        try {
            buildGraph(nodes, scene)
        } catch (err) {
            error = err
        }

        expect(error).toBeInstanceOf(BuildError)
        if (!(error instanceof BuildError)) return
        expect(error.nodeId).toBe('link')
        expect(error.message).toBe(
            'Build failed at node "link": link external group: InMemoryScene: cannot open library "assets/rigs.lib"'
        )
        expect(scene.duplicates.map(h => h.id)).toEqual(['Cube.001'])
        expect(scene.agents).toEqual([])
    })

    it('needs every setting', () => {
        const graph = PlacementGraph.fromDescription({
            nodes: agentOf('link', [
                { id: 'link', type: 'link-group', inputs: { Objects: 'body' } },
                { id: 'body', type: 'object-input', settings: { inputObject: 'Cube' } },
            ]),
        })
        expect(graph.validate(characterScene()).issues.map(i => i.message)).toEqual([
            'setting "groupFile" must not be empty',
            'setting "groupName" must not be empty',
            'setting "rigObject" must not be empty',
            'setting "constrainBone" must not be empty',
        ])
    })
})

// ============================================================================
// MODIFY BONE
// ============================================================================

describe('modify-bone', () => {
    it('merges bone overrides from nested nodes', () => {
        const scene = characterScene()
        buildGraph(agentOf('outer', [
            { id: 'outer', type: 'modify-bone', inputs: { Objects: 'inner' }, settings: { boneName: 'head', attribute: 'scale', tagName: 'size' } },
            { id: 'inner', type: 'modify-bone', inputs: { Objects: 'tail' }, settings: { boneName: 'head', attribute: 'rotation', tagName: 'nod' } },
            { id: 'tail', type: 'modify-bone', inputs: { Objects: 'body' }, settings: { boneName: 'tail', attribute: 'rotation', tagName: 'wag' } },
            { id: 'body', type: 'object-input', settings: { inputObject: 'Cube' } },
        ]), scene)

        expect(scene.agents[0].boneModifications).toEqual({
            head: { rotation: 'nod', scale: 'size' },
            tail: { rotation: 'wag' },
        })
        expect(scene.agents[0].geometry).toEqual({ kind: 'instance', handle: { id: 'Cube.001' } })
    })

    it('needs bone, attribute and tag', () => {
        const graph = PlacementGraph.fromDescription({
            nodes: agentOf('mb', [
                { id: 'mb', type: 'modify-bone', inputs: { Objects: 'body' }, settings: { boneName: 'head' } },
                { id: 'body', type: 'object-input', settings: { inputObject: 'Cube' } },
            ]),
        })
        expect(graph.validate(characterScene()).issues.map(i => i.message)).toEqual([
            'setting "attribute" must not be empty',
            'setting "tagName" must not be empty',
        ])
    })
})

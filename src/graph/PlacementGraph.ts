/**
 * PlacementGraph — a validated, ready-to-build node graph.
 *
 * Built from a plain description:
 *
 *   {
 *     nodes: [
 *       { id: 'spawn', type: 'formation', inputs: { Template: 'agent' }, settings: { noToPlace: 4 } },
 *       { id: 'agent', type: 'agent', inputs: { Objects: 'body' }, settings: { brainType: 'walker' } },
 *       { id: 'body', type: 'object-input', settings: { inputObject: 'Cube' } },
 *     ]
 *   }
 *
 * Input values name other node ids; Combine slots may list several. Nodes
 * are constructed children-first, so every node holds its inputs directly
 * and the graph never has to resolve ids again.
 */

import { z } from 'zod'
import type { SceneBackend, SceneLookup } from '../scene/SceneBackend.js'
import type { BuildStats, ValidationIssue } from '../types/index.js'
import { createRng, type Rng } from '../math/random.js'
import { createDefaultRegistry } from '../nodes/index.js'
import type { GraphNode, PlacementNode } from './Node.js'
import { BuildContext, ValidationPass, type Logger } from './context.js'
import { ConfigurationError } from './errors.js'
import { PlacementRequest, type PlacementRequestInit } from './PlacementRequest.js'
import type { NodeRegistry } from './registry.js'

// ============================================================================
// DESCRIPTION SCHEMA
// ============================================================================

const NodeDescriptionSchema = z.object({
    id: z.string().min(1),
    type: z.string().min(1),
    inputs: z.record(z.string(), z.union([z.string(), z.array(z.string())])).default({}),
    settings: z.record(z.string(), z.unknown()).default({}),
})

export const GraphDescriptionSchema = z.object({
    nodes: z.array(NodeDescriptionSchema),
})

export type NodeDescription = z.input<typeof NodeDescriptionSchema>
export type GraphDescription = z.input<typeof GraphDescriptionSchema>

type ParsedNode = z.output<typeof NodeDescriptionSchema>

// ============================================================================
// BUILD OPTIONS
// ============================================================================

export interface BuildOptions {
    backend: SceneBackend
    /** Seed for the built-in generator. Ignored when `rng` is given. */
    seed?: number
    /** Random source returning values in [0, 1) */
    rng?: Rng
    logger?: Logger
    /** Ids of the placement nodes to start from. Defaults to the roots. */
    start?: string[]
    /** Fields of the request every start node receives */
    origin?: Partial<PlacementRequestInit>
}

export type BuildResult = BuildStats

export interface ValidationResult {
    valid: boolean
    issues: ValidationIssue[]
}

const GRAPH_ISSUE = { nodeId: '', nodeType: 'graph' }

// ============================================================================
// GRAPH
// ============================================================================

export class PlacementGraph {
    private nodes: Map<string, GraphNode>
    private rootIds: string[]

    private constructor(nodes: Map<string, GraphNode>, rootIds: string[]) {
        this.nodes = nodes
        this.rootIds = rootIds
    }

    /**
     * Parse and construct a graph. Every problem found is collected into a
     * single ConfigurationError.
     */
    static fromDescription(raw: unknown, registry: NodeRegistry = createDefaultRegistry()): PlacementGraph {
        const parsed = GraphDescriptionSchema.safeParse(raw)
        if (!parsed.success) {
            throw new ConfigurationError(parsed.error.issues.map(issue => ({
                ...GRAPH_ISSUE,
                message: `${issue.path.map(String).join('.') || 'description'}: ${issue.message}`,
            })))
        }

        const issues: ValidationIssue[] = []
        const described = new Map<string, ParsedNode>()
        const declared = new Set(parsed.data.nodes.map(n => n.id))

        for (const node of parsed.data.nodes) {
            if (described.has(node.id)) {
                issues.push({ nodeId: node.id, nodeType: node.type, message: 'duplicate node id' })
                continue
            }
            described.set(node.id, node)
            if (!registry.has(node.type)) {
                issues.push({ nodeId: node.id, nodeType: node.type, message: `unknown node type "${node.type}"` })
            }
            for (const [slot, ref] of Object.entries(node.inputs)) {
                for (const target of refs(ref)) {
                    if (!declared.has(target)) {
                        issues.push({
                            nodeId: node.id,
                            nodeType: node.type,
                            message: `input "${slot}" references unknown node "${target}"`,
                        })
                    }
                }
            }
        }

        if (issues.length === 0) {
            issues.push(...findCycles(described))
        }
        if (issues.length > 0) throw new ConfigurationError(issues)

        // Children first; the description is acyclic and fully resolved here
        const built = new Map<string, GraphNode>()
        const construct = (id: string): GraphNode | null => {
            const existing = built.get(id)
            if (existing) return existing

            const desc = described.get(id)
            const kind = desc ? registry.get(desc.type) : undefined
            if (!desc || !kind) return null

            const inputs = new Map<string, GraphNode[]>()
            let complete = true
            for (const [slot, ref] of Object.entries(desc.inputs)) {
                const children: GraphNode[] = []
                for (const target of refs(ref)) {
                    const child = construct(target)
                    if (child) children.push(child)
                    else complete = false
                }
                inputs.set(slot, children)
            }
            if (!complete) return null

            const result = kind.create(desc.id, desc.settings, inputs)
            if (!result.ok) {
                for (const message of result.errors) {
                    issues.push({ nodeId: desc.id, nodeType: desc.type, message })
                }
                return null
            }
            built.set(id, result.node)
            return result.node
        }

        for (const id of described.keys()) construct(id)
        if (issues.length > 0) throw new ConfigurationError(issues)

        const referenced = new Set<string>()
        for (const desc of described.values()) {
            for (const ref of Object.values(desc.inputs)) {
                for (const target of refs(ref)) referenced.add(target)
            }
        }
        const rootIds = Array.from(built.values())
            .filter(node => node.family === 'placement' && !referenced.has(node.id))
            .map(node => node.id)

        return new PlacementGraph(built, rootIds)
    }

    get size(): number {
        return this.nodes.size
    }

    /** Placement nodes no other node references */
    get roots(): string[] {
        return [...this.rootIds]
    }

    getNode(id: string): GraphNode | undefined {
        return this.nodes.get(id)
    }

    /** Check every node's inputs and scene references */
    validate(scene: SceneLookup): ValidationResult {
        const pass = new ValidationPass(scene)
        let valid = true
        for (const node of this.nodes.values()) {
            valid = pass.check(node) && valid
        }
        return { valid, issues: pass.issues }
    }

    /**
     * Validate, then evaluate each start node once with a fresh request.
     * Throws ConfigurationError before touching the backend when the graph
     * does not validate; a failing backend call surfaces as BuildError.
     */
    build(options: BuildOptions): BuildResult {
        const logger = options.logger ?? console
        const starts = this.startNodes(options.start ?? this.rootIds)

        const { valid, issues } = this.validate(options.backend)
        if (!valid) throw new ConfigurationError(issues)

        const seed = options.seed ?? Math.floor(Math.random() * 100000)
        const ctx = new BuildContext({
            backend: options.backend,
            rng: options.rng ?? createRng(seed),
            logger,
        })

        for (const node of starts) {
            node.evaluate(new PlacementRequest(options.origin), ctx)
        }

        const { stats } = ctx
        logger.info(
            `PlacementGraph: built ${stats.agents} agent(s) in ${stats.evaluations} evaluation(s), ` +
            `dropped ${stats.dropped.obstacle} obstacle / ${stats.dropped.ground} ground / ` +
            `${stats.dropped.frozenGroup} frozen-group branch(es)`
        )
        return { agents: stats.agents, evaluations: stats.evaluations, dropped: { ...stats.dropped } }
    }

    private startNodes(ids: readonly string[]): PlacementNode<unknown>[] {
        const issues: ValidationIssue[] = []
        const starts: PlacementNode<unknown>[] = []

        for (const id of ids) {
            const node = this.nodes.get(id)
            if (node === undefined) {
                issues.push({ ...GRAPH_ISSUE, message: `start node "${id}" not found` })
            } else if (node.family !== 'placement') {
                issues.push({ nodeId: id, nodeType: node.type, message: 'start node must be a placement node' })
            } else {
                starts.push(node)
            }
        }

        if (issues.length > 0) throw new ConfigurationError(issues)
        return starts
    }
}

function refs(ref: string | string[]): string[] {
    return typeof ref === 'string' ? [ref] : ref
}

/** One issue per node found closing a cycle */
function findCycles(described: ReadonlyMap<string, ParsedNode>): ValidationIssue[] {
    const issues: ValidationIssue[] = []
    const state = new Map<string, 'visiting' | 'done'>()

    const visit = (id: string, path: string[]): void => {
        const seen = state.get(id)
        if (seen === 'done') return
        if (seen === 'visiting') {
            const desc = described.get(id)
            const cycle = [...path.slice(path.indexOf(id)), id]
            issues.push({
                nodeId: id,
                nodeType: desc?.type ?? 'unknown',
                message: `cycle: ${cycle.join(' -> ')}`,
            })
            return
        }

        state.set(id, 'visiting')
        const desc = described.get(id)
        if (desc) {
            for (const ref of Object.values(desc.inputs)) {
                for (const target of refs(ref)) visit(target, [...path, id])
            }
        }
        state.set(id, 'done')
    }

    for (const id of described.keys()) visit(id, [])
    return issues
}

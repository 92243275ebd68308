/**
 * Capabilities handed to nodes while validating and while building.
 *
 * Nothing here is global: the scene, the random stream and the logger all
 * arrive through these objects, so two builds never share state.
 */

import type { SceneBackend, SceneLookup } from '../scene/SceneBackend.js'
import type { BuildStats, DropReason, ValidationIssue } from '../types/index.js'
import type { Rng } from '../math/random.js'
import type { BaseNode, GraphNode } from './Node.js'
import { BuildError, GraphError } from './errors.js'

export interface Logger {
    debug(message: string): void
    info(message: string): void
    warn(message: string): void
}

type AnyNode = BaseNode<unknown>

// ============================================================================
// VALIDATION
// ============================================================================

/**
 * One validation pass over a graph. Results are memoised per node, so a
 * child shared by several parents is checked and reported once.
 */
export class ValidationPass {
    readonly scene: SceneLookup
    private results = new Map<AnyNode, boolean>()
    private seen = new Set<string>()
    private _issues: ValidationIssue[] = []

    constructor(scene: SceneLookup) {
        this.scene = scene
    }

    get issues(): ValidationIssue[] {
        return [...this._issues]
    }

    check(node: GraphNode): boolean {
        const cached = this.results.get(node)
        if (cached !== undefined) return cached

        const ok = node.validate(this)
        this.results.set(node, ok)
        return ok
    }

    report(node: AnyNode, message: string): void {
        const key = `${node.id}\u0000${message}`
        if (this.seen.has(key)) return
        this.seen.add(key)
        this._issues.push({ nodeId: node.id, nodeType: node.type, message })
    }
}

// ============================================================================
// BUILD
// ============================================================================

export interface BuildContextInit {
    backend: SceneBackend
    rng: Rng
    logger: Logger
}

export class BuildContext {
    readonly backend: SceneBackend
    readonly rng: Rng
    readonly logger: Logger
    readonly stats: BuildStats = {
        agents: 0,
        evaluations: 0,
        dropped: { obstacle: 0, ground: 0, frozenGroup: 0 },
    }
    /**
     * Placement groups already prepared during this build, and whether
     * they accept agents. Auto groups are reset only on first use.
     */
    readonly openGroups = new Map<string, boolean>()

    constructor(init: BuildContextInit) {
        this.backend = init.backend
        this.rng = init.rng
        this.logger = init.logger
    }

    /** Record a branch that ends here without producing an agent */
    drop(node: AnyNode, reason: DropReason): void {
        this.stats.dropped[reason]++
        this.logger.debug(`${node.type}[${node.id}]: dropped branch (${reason})`)
    }

    /**
     * Run a backend call on behalf of a node. Failures become BuildErrors
     * naming the node.
     */
    call<T>(node: AnyNode, action: string, fn: (backend: SceneBackend) => T): T {
        try {
            return fn(this.backend)
        } catch (err) {
            if (err instanceof GraphError) throw err
            const reason = err instanceof Error ? err.message : String(err)
            throw new BuildError(node.id, `${action}: ${reason}`, err)
        }
    }
}

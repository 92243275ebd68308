/**
 * Error types raised by graph construction, validation and builds.
 *
 * Branches dropped by obstacles, ground misses or frozen groups are not
 * errors; they are counted in BuildStats.dropped.
 */

import type { ValidationIssue } from '../types/index.js'

export class GraphError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options)
        this.name = new.target.name
    }
}

/** The graph description or its references to the scene are wrong. */
export class ConfigurationError extends GraphError {
    readonly issues: ValidationIssue[]

    constructor(issues: ValidationIssue[]) {
        super(ConfigurationError.summarize(issues))
        this.issues = issues
    }

    private static summarize(issues: ValidationIssue[]): string {
        const lines = issues.map(i => `  ${i.nodeType}[${i.nodeId}]: ${i.message}`)
        return `Invalid placement graph (${issues.length} issue${issues.length === 1 ? '' : 's'}):\n${lines.join('\n')}`
    }
}

/** A scene backend call failed part-way through a build. */
export class BuildError extends GraphError {
    readonly nodeId: string

    constructor(nodeId: string, message: string, cause: unknown) {
        super(`Build failed at node "${nodeId}": ${message}`, { cause })
        this.nodeId = nodeId
    }
}

/** A node was evaluated in a state validation should have ruled out. */
export class GraphStateError extends GraphError {}

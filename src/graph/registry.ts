/**
 * NodeRegistry — maps node type identifiers to node kinds.
 *
 * A kind knows its family, how to validate raw settings (a zod schema) and
 * how to construct the node. The graph builder only ever talks to kinds.
 */

import type { z } from 'zod'
import type { NodeFamily } from '../types/index.js'
import type { GraphNode, NodeInit, NodeInputs } from './Node.js'

export type CreateResult =
    | { ok: true; node: GraphNode }
    | { ok: false; errors: string[] }

export interface NodeKind {
    readonly type: string
    readonly family: NodeFamily
    readonly description: string
    create(id: string, rawSettings: unknown, inputs: NodeInputs): CreateResult
}

export interface NodeKindDefinition<S> {
    type: string
    family: NodeFamily
    description: string
    settings: z.ZodType<S>
    create(init: NodeInit<S>): GraphNode
}

/** Bind a settings schema to a node constructor */
export function defineNodeKind<S>(definition: NodeKindDefinition<S>): NodeKind {
    return {
        type: definition.type,
        family: definition.family,
        description: definition.description,
        create(id, rawSettings, inputs) {
            const parsed = definition.settings.safeParse(rawSettings ?? {})
            if (!parsed.success) {
                return {
                    ok: false,
                    errors: parsed.error.issues.map(issue => {
                        const path = issue.path.map(String).join('.')
                        return path ? `setting "${path}": ${issue.message}` : issue.message
                    }),
                }
            }
            return {
                ok: true,
                node: definition.create({ id, type: definition.type, settings: parsed.data, inputs }),
            }
        },
    }
}

export class NodeRegistry {
    private kinds: Map<string, NodeKind> = new Map()

    constructor(kinds: readonly NodeKind[] = []) {
        for (const kind of kinds) {
            this.register(kind)
        }
    }

    /** Register a kind, replacing any kind with the same type */
    register(kind: NodeKind): void {
        this.kinds.set(kind.type, kind)
    }

    get(type: string): NodeKind | undefined {
        return this.kinds.get(type)
    }

    has(type: string): boolean {
        return this.kinds.has(type)
    }

    getAll(): NodeKind[] {
        return Array.from(this.kinds.values())
    }

    getByFamily(family: NodeFamily): NodeKind[] {
        return this.getAll().filter(k => k.family === family)
    }

    get count(): number {
        return this.kinds.size
    }
}

/**
 * Node contract — the two node families every graph is made of.
 *
 * Placement nodes take a PlacementRequest and pass it (or forks of it) on;
 * their leaves register agents. Geometry nodes take a GeometryRequest and
 * return a GeometryResult; their leaves duplicate scene geometry.
 *
 * A node declares its input slots and the family each slot accepts. The
 * shared `validate` checks slots, then the node's own settings, then every
 * child, and ANDs the lot.
 */

import type { GeometryResult, NodeFamily } from '../types/index.js'
import type { BuildContext, ValidationPass } from './context.js'
import type { GeometryRequest, PlacementRequest } from './PlacementRequest.js'
import { GraphStateError } from './errors.js'

export interface SlotSpec {
    name: string
    family: NodeFamily
}

export type NodeInputs = ReadonlyMap<string, readonly GraphNode[]>

export interface NodeInit<S> {
    id: string
    type: string
    settings: S
    inputs: NodeInputs
}

export abstract class BaseNode<S> {
    abstract readonly family: NodeFamily
    readonly id: string
    readonly type: string
    readonly settings: S
    readonly inputs: NodeInputs
    /** How many times evaluate() ran. Diagnostics only. */
    evaluations = 0

    constructor(init: NodeInit<S>) {
        this.id = init.id
        this.type = init.type
        this.settings = init.settings
        this.inputs = init.inputs
    }

    /** Input slots this node requires */
    protected get slots(): readonly SlotSpec[] {
        return []
    }

    get label(): string {
        return `${this.type}[${this.id}]`
    }

    validate(ctx: ValidationPass): boolean {
        let ok = this.checkInputs(ctx)
        ok = this.checkSettings(ctx) && ok
        for (const children of this.inputs.values()) {
            for (const child of children) {
                ok = ctx.check(child) && ok
            }
        }
        return ok
    }

    protected checkInputs(ctx: ValidationPass): boolean {
        let ok = true
        const declared = new Set(this.slots.map(s => s.name))

        for (const slot of this.slots) {
            const bound = this.inputs.get(slot.name) ?? []
            if (bound.length === 0) {
                ctx.report(this, `missing input "${slot.name}"`)
                ok = false
            } else if (bound.length > 1) {
                ctx.report(this, `input "${slot.name}" accepts one node, got ${bound.length}`)
                ok = false
            } else if (bound[0].family !== slot.family) {
                ctx.report(this, `input "${slot.name}" needs a ${slot.family} node, got ${bound[0].label}`)
                ok = false
            }
        }

        for (const name of this.inputs.keys()) {
            if (!declared.has(name)) {
                ctx.report(this, `unknown input "${name}"`)
                ok = false
            }
        }

        return ok
    }

    /** Node-specific checks against settings and the scene */
    protected checkSettings(_ctx: ValidationPass): boolean {
        return true
    }

    // ------------------------------------------------------------------
    // Helpers for checkSettings
    // ------------------------------------------------------------------

    protected requireText(ctx: ValidationPass, setting: string, value: string): boolean {
        if (value.trim() !== '') return true
        ctx.report(this, `setting "${setting}" must not be empty`)
        return false
    }

    protected requireObject(ctx: ValidationPass, setting: string, name: string): boolean {
        if (!this.requireText(ctx, setting, name)) return false
        if (ctx.scene.hasObject(name)) return true
        ctx.report(this, `object "${name}" not found`)
        return false
    }

    protected requireMesh(ctx: ValidationPass, setting: string, name: string): boolean {
        if (!this.requireObject(ctx, setting, name)) return false
        if (ctx.scene.hasMesh(name)) return true
        ctx.report(this, `object "${name}" has no mesh`)
        return false
    }

    protected requireGroup(ctx: ValidationPass, setting: string, name: string): boolean {
        if (!this.requireText(ctx, setting, name)) return false
        if (ctx.scene.hasGroup(name)) return true
        ctx.report(this, `group "${name}" not found`)
        return false
    }

    protected requireMaterial(ctx: ValidationPass, name: string): boolean {
        if (ctx.scene.hasMaterial(name)) return true
        ctx.report(this, `material "${name}" not found`)
        return false
    }

    // ------------------------------------------------------------------
    // Typed access to validated inputs
    // ------------------------------------------------------------------

    protected placementInput(slot: string): PlacementNode<unknown> {
        const node = this.inputs.get(slot)?.[0]
        if (node === undefined || node.family !== 'placement') {
            throw new GraphStateError(`${this.label}: input "${slot}" is not a placement node`)
        }
        return node
    }

    protected geometryInput(slot: string): GeometryNode<unknown> {
        const node = this.inputs.get(slot)?.[0]
        if (node === undefined || node.family !== 'geometry') {
            throw new GraphStateError(`${this.label}: input "${slot}" is not a geometry node`)
        }
        return node
    }
}

export abstract class PlacementNode<S> extends BaseNode<S> {
    readonly family = 'placement' as const

    evaluate(request: PlacementRequest, ctx: BuildContext): void {
        this.evaluations++
        ctx.stats.evaluations++
        this.apply(request, ctx)
    }

    protected abstract apply(request: PlacementRequest, ctx: BuildContext): void
}

export abstract class GeometryNode<S> extends BaseNode<S> {
    readonly family = 'geometry' as const

    evaluate(request: GeometryRequest, ctx: BuildContext): GeometryResult {
        this.evaluations++
        ctx.stats.evaluations++
        return this.apply(request, ctx)
    }

    protected abstract apply(request: GeometryRequest, ctx: BuildContext): GeometryResult
}

export type GraphNode = PlacementNode<unknown> | GeometryNode<unknown>

/** Single-input placement node forwarding to its "Template" slot */
export abstract class TemplateNode<S> extends PlacementNode<S> {
    protected get slots(): readonly SlotSpec[] {
        return [{ name: 'Template', family: 'placement' }]
    }

    protected forward(request: PlacementRequest, ctx: BuildContext): void {
        this.placementInput('Template').evaluate(request, ctx)
    }
}

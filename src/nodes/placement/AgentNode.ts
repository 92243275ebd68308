/**
 * Agent — terminal placement node.
 *
 * Builds the geometry subgraph for the incoming request, places the result
 * and registers one agent with the backend.
 */

import { z } from 'zod'
import { PlacementNode, type SlotSpec } from '../../graph/Node.js'
import { defineNodeKind } from '../../graph/registry.js'
import { nameSetting } from '../../graph/settings.js'
import type { BuildContext, ValidationPass } from '../../graph/context.js'
import type { PlacementRequest } from '../../graph/PlacementRequest.js'
import { tuple } from '../../math/transform.js'

const AgentSettingsSchema = z.object({
    brainType: nameSetting,
    /** Ask geometry nodes for placeholders instead of duplicates */
    deferGeometry: z.boolean().default(false),
})

export type AgentSettings = z.infer<typeof AgentSettingsSchema>

export class AgentNode extends PlacementNode<AgentSettings> {
    protected get slots(): readonly SlotSpec[] {
        return [{ name: 'Objects', family: 'geometry' }]
    }

    protected checkSettings(ctx: ValidationPass): boolean {
        return this.requireText(ctx, 'brainType', this.settings.brainType)
    }

    protected apply(request: PlacementRequest, ctx: BuildContext): void {
        const result = this.geometryInput('Objects').evaluate(
            { placement: request.clone(), deferred: this.settings.deferGeometry },
            ctx
        )
        const { geometry } = result

        if (geometry.kind === 'instance') {
            const { handle } = geometry
            ctx.call(this, 'set transform', backend =>
                backend.setTransform(handle, request.position.clone(), request.euler(), request.scale))
            if (request.materials.size > 0) {
                ctx.call(this, 'apply materials', backend =>
                    backend.applyMaterials(handle, new Map(request.materials)))
            }
        }

        ctx.call(this, 'register agent', backend => backend.registerAgent({
            geometry,
            brainType: this.settings.brainType,
            groupName: request.group,
            position: tuple(request.position),
            rotation: tuple(request.rotation),
            scale: request.scale,
            tags: Object.fromEntries(request.tags),
            materials: Object.fromEntries(request.materials),
            rigOverride: result.rigOverride,
            constrainBone: result.constrainBone,
            boneModifications: result.boneModifications,
        }))
        ctx.stats.agents++
    }
}

export const agentKind = defineNodeKind({
    type: 'agent',
    family: 'placement',
    description: 'Create an agent from the connected geometry',
    settings: AgentSettingsSchema,
    create: init => new AgentNode(init),
})

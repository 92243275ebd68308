/**
 * Combine — sends an independent copy of the request to every input.
 */

import { z } from 'zod'
import { PlacementNode } from '../../graph/Node.js'
import { defineNodeKind } from '../../graph/registry.js'
import type { BuildContext, ValidationPass } from '../../graph/context.js'
import type { PlacementRequest } from '../../graph/PlacementRequest.js'

const CombineSettingsSchema = z.object({})

export type CombineSettings = z.infer<typeof CombineSettingsSchema>

export class CombineNode extends PlacementNode<CombineSettings> {
    /** Any slot names, each holding one or more placement nodes */
    protected checkInputs(ctx: ValidationPass): boolean {
        if (this.inputs.size === 0) {
            ctx.report(this, 'needs at least one input')
            return false
        }

        let ok = true
        for (const [slot, children] of this.inputs) {
            for (const child of children) {
                if (child.family !== 'placement') {
                    ctx.report(this, `input "${slot}" needs a placement node, got ${child.label}`)
                    ok = false
                }
            }
        }
        return ok
    }

    protected apply(request: PlacementRequest, ctx: BuildContext): void {
        for (const children of this.inputs.values()) {
            for (const child of children) {
                if (child.family === 'placement') {
                    child.evaluate(request.clone(), ctx)
                }
            }
        }
    }
}

export const combineKind = defineNodeKind({
    type: 'combine',
    family: 'placement',
    description: 'Duplicate the request to all inputs',
    settings: CombineSettingsSchema,
    create: init => new CombineNode(init),
})

/**
 * Switch — one draw decides whether the whole request goes to
 * "Template 1" (probability switchAmount) or "Template 2".
 */

import { z } from 'zod'
import { PlacementNode, type SlotSpec } from '../../graph/Node.js'
import { defineNodeKind } from '../../graph/registry.js'
import { probabilitySetting } from '../../graph/settings.js'
import type { BuildContext } from '../../graph/context.js'
import type { PlacementRequest } from '../../graph/PlacementRequest.js'

const SwitchSettingsSchema = z.object({
    switchAmount: probabilitySetting.default(0.5),
})

export type SwitchSettings = z.infer<typeof SwitchSettingsSchema>

export class SwitchNode extends PlacementNode<SwitchSettings> {
    protected get slots(): readonly SlotSpec[] {
        return [
            { name: 'Template 1', family: 'placement' },
            { name: 'Template 2', family: 'placement' },
        ]
    }

    protected apply(request: PlacementRequest, ctx: BuildContext): void {
        const slot = ctx.rng() < this.settings.switchAmount ? 'Template 1' : 'Template 2'
        this.placementInput(slot).evaluate(request, ctx)
    }
}

export const switchKind = defineNodeKind({
    type: 'switch',
    family: 'placement',
    description: 'Randomly pick one of two inputs',
    settings: SwitchSettingsSchema,
    create: init => new SwitchNode(init),
})

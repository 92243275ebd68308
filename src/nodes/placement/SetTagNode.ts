/**
 * Set Tag — sets a starting tag on every agent below this node.
 */

import { z } from 'zod'
import { TemplateNode } from '../../graph/Node.js'
import { defineNodeKind } from '../../graph/registry.js'
import { nameSetting, tagValueSetting } from '../../graph/settings.js'
import type { BuildContext, ValidationPass } from '../../graph/context.js'
import type { PlacementRequest } from '../../graph/PlacementRequest.js'

const SetTagSettingsSchema = z.object({
    tagName: nameSetting,
    tagValue: tagValueSetting.default(0),
})

export type SetTagSettings = z.infer<typeof SetTagSettingsSchema>

export class SetTagNode extends TemplateNode<SetTagSettings> {
    protected checkSettings(ctx: ValidationPass): boolean {
        return this.requireText(ctx, 'tagName', this.settings.tagName)
    }

    protected apply(request: PlacementRequest, ctx: BuildContext): void {
        request.tags.set(this.settings.tagName, this.settings.tagValue)
        this.forward(request, ctx)
    }
}

export const setTagKind = defineNodeKind({
    type: 'set-tag',
    family: 'placement',
    description: 'Set a tag for agents to start with',
    settings: SetTagSettingsSchema,
    create: init => new SetTagNode(init),
})

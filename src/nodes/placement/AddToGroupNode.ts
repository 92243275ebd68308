/**
 * Add To Group — places everything below this node into a named group.
 *
 * A frozen group refuses new agents and the branch ends here. An auto
 * group is cleared the first time a build reaches it.
 */

import { z } from 'zod'
import { TemplateNode } from '../../graph/Node.js'
import { defineNodeKind } from '../../graph/registry.js'
import { nameSetting } from '../../graph/settings.js'
import type { BuildContext, ValidationPass } from '../../graph/context.js'
import type { PlacementRequest } from '../../graph/PlacementRequest.js'

const AddToGroupSettingsSchema = z.object({
    groupName: nameSetting,
})

export type AddToGroupSettings = z.infer<typeof AddToGroupSettingsSchema>

export class AddToGroupNode extends TemplateNode<AddToGroupSettings> {
    protected checkSettings(ctx: ValidationPass): boolean {
        return this.requireText(ctx, 'groupName', this.settings.groupName)
    }

    protected apply(request: PlacementRequest, ctx: BuildContext): void {
        const name = this.settings.groupName
        if (!this.openGroup(name, ctx)) {
            ctx.drop(this, 'frozenGroup')
            return
        }

        request.group = name
        this.forward(request, ctx)
    }

    private openGroup(name: string, ctx: BuildContext): boolean {
        const known = ctx.openGroups.get(name)
        if (known !== undefined) return known

        const open = ctx.call(this, `prepare group "${name}"`, backend => {
            if (!backend.groupExists(name)) {
                backend.createGroup(name)
                return true
            }
            if (backend.isGroupFrozen(name)) return false
            if (backend.getGroupType(name) === 'auto') backend.resetGroup(name)
            return true
        })

        ctx.openGroups.set(name, open)
        return open
    }
}

export const addToGroupKind = defineNodeKind({
    type: 'add-to-group',
    family: 'placement',
    description: 'Change the group agents are added to',
    settings: AddToGroupSettingsSchema,
    create: init => new AddToGroupNode(init),
})

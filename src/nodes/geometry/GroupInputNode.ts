/**
 * Group Input — geometry leaf that duplicates every member of a group.
 *
 * The backend keeps parenting and armature bindings inside the copy and
 * hands back its top object: the armature when the group has one, else
 * an anchor under the lowest member. Deferred requests get a placeholder
 * naming the group and its armature instead.
 */

import { z } from 'zod'
import { GeometryNode } from '../../graph/Node.js'
import { defineNodeKind } from '../../graph/registry.js'
import { nameSetting } from '../../graph/settings.js'
import type { BuildContext, ValidationPass } from '../../graph/context.js'
import { geometryResult, type GeometryRequest } from '../../graph/PlacementRequest.js'
import type { GeometryResult } from '../../types/index.js'

const GroupInputSettingsSchema = z.object({
    inputGroup: nameSetting,
})

export type GroupInputSettings = z.infer<typeof GroupInputSettingsSchema>

export class GroupInputNode extends GeometryNode<GroupInputSettings> {
    protected checkSettings(ctx: ValidationPass): boolean {
        return this.requireGroup(ctx, 'inputGroup', this.settings.inputGroup)
    }

    protected apply(request: GeometryRequest, ctx: BuildContext): GeometryResult {
        const groupName = this.settings.inputGroup

        if (request.deferred) {
            const members = ctx.call(this, 'read group', backend => backend.getGroupObjects(groupName))
            const armature = members.find(obj => obj.type === 'armature')
            return geometryResult({
                kind: 'deferred',
                source: 'group',
                groupName,
                armatureName: armature?.name ?? null,
            })
        }

        const copy = ctx.call(this, 'duplicate group', backend => backend.duplicateGroupMembers(groupName))
        const { materials } = request.placement
        if (materials.size > 0) {
            for (const member of copy.members) {
                ctx.call(this, 'apply materials', backend => backend.applyMaterials(member, new Map(materials)))
            }
        }
        return geometryResult({ kind: 'instance', handle: copy.top })
    }
}

export const groupInputKind = defineNodeKind({
    type: 'group-input',
    family: 'geometry',
    description: 'Duplicate every object in a group',
    settings: GroupInputSettingsSchema,
    create: init => new GroupInputNode(init),
})

/**
 * Link Group — links a rig from an external file and drives one of its
 * bones from the child geometry. The linked rig becomes the agent's rig.
 */

import { z } from 'zod'
import { GeometryNode, type SlotSpec } from '../../graph/Node.js'
import { defineNodeKind } from '../../graph/registry.js'
import { nameSetting } from '../../graph/settings.js'
import type { BuildContext, ValidationPass } from '../../graph/context.js'
import type { GeometryRequest } from '../../graph/PlacementRequest.js'
import type { GeometryResult } from '../../types/index.js'

const LinkGroupSettingsSchema = z.object({
    /** Path of the external file holding the group */
    groupFile: nameSetting,
    groupName: nameSetting,
    rigObject: nameSetting,
    constrainBone: nameSetting,
})

export type LinkGroupSettings = z.infer<typeof LinkGroupSettingsSchema>

export class LinkGroupNode extends GeometryNode<LinkGroupSettings> {
    protected get slots(): readonly SlotSpec[] {
        return [{ name: 'Objects', family: 'geometry' }]
    }

    protected checkSettings(ctx: ValidationPass): boolean {
        const s = this.settings
        let ok = this.requireText(ctx, 'groupFile', s.groupFile)
        ok = this.requireText(ctx, 'groupName', s.groupName) && ok
        ok = this.requireText(ctx, 'rigObject', s.rigObject) && ok
        ok = this.requireText(ctx, 'constrainBone', s.constrainBone) && ok
        return ok
    }

    protected apply(request: GeometryRequest, ctx: BuildContext): GeometryResult {
        const { groupFile, groupName, rigObject, constrainBone } = this.settings
        const child = this.geometryInput('Objects').evaluate(request, ctx)

        const linked = ctx.call(this, 'link external group', backend =>
            backend.linkExternalGroup(groupFile, groupName, rigObject, constrainBone, child.geometry))

        return { ...child, rigOverride: linked.rig, constrainBone }
    }
}

export const linkGroupKind = defineNodeKind({
    type: 'link-group',
    family: 'geometry',
    description: 'Link an external rig driven by the input geometry',
    settings: LinkGroupSettingsSchema,
    create: init => new LinkGroupNode(init),
})

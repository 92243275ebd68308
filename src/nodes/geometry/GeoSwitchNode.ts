/**
 * Geo Switch — geometry counterpart of Switch.
 */

import { z } from 'zod'
import { GeometryNode, type SlotSpec } from '../../graph/Node.js'
import { defineNodeKind } from '../../graph/registry.js'
import { probabilitySetting } from '../../graph/settings.js'
import type { BuildContext } from '../../graph/context.js'
import type { GeometryRequest } from '../../graph/PlacementRequest.js'
import type { GeometryResult } from '../../types/index.js'

const GeoSwitchSettingsSchema = z.object({
    switchAmount: probabilitySetting.default(0.5),
})

export type GeoSwitchSettings = z.infer<typeof GeoSwitchSettingsSchema>

export class GeoSwitchNode extends GeometryNode<GeoSwitchSettings> {
    protected get slots(): readonly SlotSpec[] {
        return [
            { name: 'Object 1', family: 'geometry' },
            { name: 'Object 2', family: 'geometry' },
        ]
    }

    protected apply(request: GeometryRequest, ctx: BuildContext): GeometryResult {
        const slot = ctx.rng() < this.settings.switchAmount ? 'Object 1' : 'Object 2'
        return this.geometryInput(slot).evaluate(request, ctx)
    }
}

export const geoSwitchKind = defineNodeKind({
    type: 'geo-switch',
    family: 'geometry',
    description: 'Randomly pick one of two geometry inputs',
    settings: GeoSwitchSettingsSchema,
    create: init => new GeoSwitchNode(init),
})

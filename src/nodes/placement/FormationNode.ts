/**
 * Formation — lays N copies of the request out on a grid.
 *
 * Rows run along local X (rowMargin apart), columns along local Y
 * (columnMargin apart). Full columns of `rows` come first; the last
 * column takes the N mod rows leftovers.
 */

import * as THREE from 'three'
import { z } from 'zod'
import { TemplateNode } from '../../graph/Node.js'
import { defineNodeKind } from '../../graph/registry.js'
import { countSetting } from '../../graph/settings.js'
import type { BuildContext } from '../../graph/context.js'
import type { PlacementRequest } from '../../graph/PlacementRequest.js'
import { rotateBy } from '../../math/transform.js'

const FormationSettingsSchema = z.object({
    noToPlace: countSetting.default(1),
    rows: z.number().int().min(1).default(1),
    rowMargin: z.number().default(1),
    columnMargin: z.number().default(1),
})

export type FormationSettings = z.infer<typeof FormationSettingsSchema>

export class FormationNode extends TemplateNode<FormationSettings> {
    protected apply(request: PlacementRequest, ctx: BuildContext): void {
        for (const position of this.layout(request)) {
            this.forward(request.at(position), ctx)
        }
    }

    /** Grid positions in placement order */
    layout(request: PlacementRequest): THREE.Vector3[] {
        const { noToPlace, rows, rowMargin, columnMargin } = this.settings
        const diffRow = rotateBy(new THREE.Vector3(rowMargin, 0, 0), request.rotation).multiplyScalar(request.scale)
        const diffCol = rotateBy(new THREE.Vector3(0, columnMargin, 0), request.rotation).multiplyScalar(request.scale)

        const at = (col: number, row: number) => request.position.clone()
            .addScaledVector(diffCol, col)
            .addScaledVector(diffRow, row)

        const positions: THREE.Vector3[] = []
        const fullColumns = Math.floor(noToPlace / rows)
        for (let col = 0; col < fullColumns; col++) {
            for (let row = 0; row < rows; row++) {
                positions.push(at(col, row))
            }
        }
        for (let row = 0; row < noToPlace % rows; row++) {
            positions.push(at(fullColumns, row))
        }

        return positions
    }
}

export const formationKind = defineNodeKind({
    type: 'formation',
    family: 'placement',
    description: 'Place in a grid formation',
    settings: FormationSettingsSchema,
    create: init => new FormationNode(init),
})

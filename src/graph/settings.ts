/**
 * Zod building blocks shared by node settings schemas.
 */

import { z } from 'zod'

export const vec3Setting = z.tuple([z.number(), z.number(), z.number()])

/** Name of a scene entity; emptiness is reported by validation, not parsing */
export const nameSetting = z.string().default('')

export const countSetting = z.number().int().min(0)

export const probabilitySetting = z.number().min(0).max(1)

export const tagValueSetting = z.union([z.number(), z.string(), z.boolean()])

export const relaxSettings = {
    relax: z.boolean().default(false),
    relaxRadius: z.number().min(0).default(1),
    relaxIterations: countSetting.default(1),
}

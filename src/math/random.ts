/**
 * Random helpers. Every draw goes through an injected `() => number`
 * so a build can be replayed from a seed.
 */

export type Rng = () => number

/**
 * Mulberry32 seeded PRNG.
 * Produces deterministic () => number from a seed.
 */
export function createRng(seed: number): Rng {
    let t = seed | 0
    return () => {
        t = (t + 0x6D2B79F5) | 0
        let v = t
        v = Math.imul(v ^ (v >>> 15), v | 1)
        v ^= v + Math.imul(v ^ (v >>> 7), v | 61)
        return ((v ^ (v >>> 14)) >>> 0) / 4294967296
    }
}

/** Uniform draw in [min, max] */
export function uniform(rng: Rng, min: number, max: number): number {
    return min + rng() * (max - min)
}

/**
 * Weighted random pick. Draws s in [0, total) and subtracts weights in
 * order until s goes non-positive. A single entry still draws, so the
 * stream advances the same way for every list. Returns -1 for an empty list.
 */
export function weightedIndex(weights: readonly number[], rng: Rng): number {
    if (weights.length === 0) return -1

    const totalWeight = weights.reduce((sum, w) => sum + w, 0)
    let roll = rng() * totalWeight

    for (let i = 0; i < weights.length; i++) {
        roll -= weights[i]
        if (roll <= 0) return i
    }

    return weights.length - 1
}

/** Pick one element uniformly */
export function choice<T>(items: readonly T[], rng: Rng): T | undefined {
    if (items.length === 0) return undefined
    return items[Math.min(items.length - 1, Math.floor(rng() * items.length))]
}

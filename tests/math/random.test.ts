import { describe, it, expect } from 'vitest'
import { choice, createRng, uniform, weightedIndex } from '../../src/math/random.js'
import { sequence } from '../helpers.js'

describe('createRng', () => {
    it('replays the same stream for the same seed', () => {
        const a = createRng(42)
        const b = createRng(42)
        for (let i = 0; i < 20; i++) {
            expect(a()).toBe(b())
        }
    })

    it('differs between seeds', () => {
        expect(createRng(1)()).not.toBe(createRng(2)())
    })

    it('stays within [0, 1)', () => {
        const rng = createRng(7)
        for (let i = 0; i < 1000; i++) {
            const v = rng()
            expect(v).toBeGreaterThanOrEqual(0)
            expect(v).toBeLessThan(1)
        }
    })
})

describe('uniform', () => {
    it('maps [0, 1) onto [min, max)', () => {
        expect(uniform(sequence(0), -5, 5)).toBe(-5)
        expect(uniform(sequence(0.5), -5, 5)).toBe(0)
        expect(uniform(sequence(0.25), 2, 6)).toBe(3)
    })
})

describe('weightedIndex', () => {
    it('subtracts weights in order until the roll goes non-positive', () => {
        // total 4: roll 0.8 -> first, roll 1.0 -> first (exactly zero), roll 2.0 -> second
        expect(weightedIndex([1, 3], sequence(0.2))).toBe(0)
        expect(weightedIndex([1, 3], sequence(0.25))).toBe(0)
        expect(weightedIndex([1, 3], sequence(0.5))).toBe(1)
    })

    it('skips zero weights', () => {
        expect(weightedIndex([0, 2, 0], sequence(0.5))).toBe(1)
    })

    it('returns -1 for an empty list', () => {
        expect(weightedIndex([], sequence(0.5))).toBe(-1)
    })

    it('draws once for a single entry', () => {
        let draws = 0
        const rng = () => {
            draws++
            return 0.9
        }
        expect(weightedIndex([5], rng)).toBe(0)
        expect(draws).toBe(1)
    })

    it('picks in proportion to weight', () => {
        const rng = createRng(42)
        let second = 0
        for (let i = 0; i < 10000; i++) {
            if (weightedIndex([1, 3], rng) === 1) second++
        }
        expect(second / 10000).toBeGreaterThan(0.72)
        expect(second / 10000).toBeLessThan(0.78)
    })
})

describe('choice', () => {
    it('maps the draw onto an index', () => {
        expect(choice(['a', 'b', 'c'], sequence(0))).toBe('a')
        expect(choice(['a', 'b', 'c'], sequence(0.5))).toBe('b')
        expect(choice(['a', 'b', 'c'], sequence(0.99))).toBe('c')
    })

    it('returns undefined for no items', () => {
        expect(choice([], sequence(0.5))).toBeUndefined()
    })
})

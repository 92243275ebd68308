import { describe, it, expect } from 'vitest'
import { SurfaceSampler } from '../../src/spatial/SurfaceSampler.js'
import { createRng } from '../../src/math/random.js'
import { planeMesh, sequence } from '../helpers.js'
import type { MeshData } from '../../src/types/index.js'

// Areas 0.5 and 1.5
const twoTriangles: MeshData = {
    positions: [
        0, 0, 0, 1, 0, 0, 0, 1, 0,
        0, 0, 5, 3, 0, 5, 0, 1, 5,
    ],
    indices: [0, 1, 2, 3, 4, 5],
}

describe('SurfaceSampler', () => {
    it('sums triangle areas', () => {
        expect(new SurfaceSampler(twoTriangles).totalArea).toBeCloseTo(2, 9)
        expect(new SurfaceSampler(planeMesh(5)).totalArea).toBeCloseTo(100, 9)
    })

    it('picks the first triangle whose cumulative area exceeds the draw', () => {
        const sampler = new SurfaceSampler(twoTriangles)
        expect(sampler.pickTriangle(0)).toBe(0)
        expect(sampler.pickTriangle(0.4)).toBe(0)
        expect(sampler.pickTriangle(0.5)).toBe(1)
        expect(sampler.pickTriangle(1.9)).toBe(1)
    })

    it('places a point from barycentric draws', () => {
        const sampler = new SurfaceSampler(twoTriangles)
        // 0.1 * 2 = 0.2 picks the first triangle; u = 0.25, v = 0.5
        expect(sampler.sample(sequence(0.1, 0.25, 0.5))?.toArray()).toEqual([0.25, 0.5, 0])
    })

    it('folds draws that land outside the triangle', () => {
        const sampler = new SurfaceSampler(twoTriangles)
        // u + v = 1.25 folds to u = 0.25, v = 0.5
        expect(sampler.sample(sequence(0.1, 0.75, 0.5))?.toArray()).toEqual([0.25, 0.5, 0])
    })

    it('keeps samples on the surface', () => {
        const sampler = new SurfaceSampler(planeMesh(5, 2))
        const rng = createRng(9)
        for (let i = 0; i < 500; i++) {
            const p = sampler.sample(rng)
            expect(p).not.toBeNull()
            if (p === null) continue
            expect(Math.abs(p.x)).toBeLessThanOrEqual(5 + 1e-9)
            expect(Math.abs(p.y)).toBeLessThanOrEqual(5 + 1e-9)
            expect(p.z).toBe(2)
        }
    })

    it('returns null for a mesh without area', () => {
        const flat: MeshData = { positions: [0, 0, 0, 1, 0, 0, 2, 0, 0], indices: [0, 1, 2] }
        expect(new SurfaceSampler(flat).sample(sequence(0.5))).toBeNull()
    })
})

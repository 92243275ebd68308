/**
 * Shared fixtures for the test suites.
 */

import { expect } from 'vitest'
import type { Logger } from '../src/graph/context.js'
import { PlacementGraph, type BuildOptions, type BuildResult, type NodeDescription } from '../src/graph/PlacementGraph.js'
import type { Rng } from '../src/math/random.js'
import { InMemoryScene } from '../src/scene/InMemoryScene.js'
import type { MeshData } from '../src/types/index.js'

/** Logger that keeps every message */
export class RecordingLogger implements Logger {
    readonly debugs: string[] = []
    readonly infos: string[] = []
    readonly warnings: string[] = []

    debug(message: string): void {
        this.debugs.push(message)
    }

    info(message: string): void {
        this.infos.push(message)
    }

    warn(message: string): void {
        this.warnings.push(message)
    }
}

/** Rng that replays the given values, cycling when it runs out */
export function sequence(...values: number[]): Rng {
    let i = 0
    return () => {
        const value = values[i % values.length]
        i++
        return value
    }
}

/** Square of side 2 * half, facing +Z, at height z */
export function planeMesh(half: number, z = 0): MeshData {
    return {
        positions: [
            -half, -half, z,
            half, -half, z,
            half, half, z,
            -half, half, z,
        ],
        indices: [0, 1, 2, 0, 2, 3],
    }
}

/** Flat grid of cells × cells quads covering [-size/2, size/2] at height z */
export function gridMesh(cells: number, size: number, z = 0): MeshData {
    const positions: number[] = []
    const indices: number[] = []
    const step = size / cells
    const row = cells + 1

    for (let j = 0; j <= cells; j++) {
        for (let i = 0; i <= cells; i++) {
            positions.push(-size / 2 + i * step, -size / 2 + j * step, z)
        }
    }
    for (let j = 0; j < cells; j++) {
        for (let i = 0; i < cells; i++) {
            const a = j * row + i
            indices.push(a, a + 1, a + row + 1, a, a + row + 1, a + row)
        }
    }
    return { positions, indices }
}

/** Join meshes into one */
export function mergeMeshes(...meshes: MeshData[]): MeshData {
    const positions: number[] = []
    const indices: number[] = []
    for (const mesh of meshes) {
        const offset = positions.length / 3
        positions.push(...Array.from(mesh.positions))
        indices.push(...Array.from(mesh.indices, i => i + offset))
    }
    return { positions, indices }
}

/** Scene with a single 1×1×1 "Cube" to build agents from */
export function cubeScene(): InMemoryScene {
    return new InMemoryScene().addObject('Cube', { dimensions: [1, 1, 1] })
}

/**
 * The usual tail of a test graph: an "agent" node fed by an object-input
 * duplicating "Cube".
 */
export function agentTail(settings: Record<string, unknown> = {}): NodeDescription[] {
    return [
        { id: 'agent', type: 'agent', inputs: { Objects: 'body' }, settings: { brainType: 'walker', ...settings } },
        { id: 'body', type: 'object-input', settings: { inputObject: 'Cube' } },
    ]
}

/** Build a graph from its nodes against `scene`, seed 1 unless overridden */
export function buildGraph(
    nodes: NodeDescription[],
    scene: InMemoryScene,
    options: Omit<BuildOptions, 'backend' | 'logger'> = {}
): { result: BuildResult; logger: RecordingLogger } {
    const logger = new RecordingLogger()
    const result = PlacementGraph.fromDescription({ nodes }).build({ seed: 1, ...options, backend: scene, logger })
    return { result, logger }
}

export function expectTuple(actual: readonly number[], expected: readonly number[], digits = 6): void {
    expect(actual).toHaveLength(expected.length)
    expected.forEach((value, i) => expect(actual[i]).toBeCloseTo(value, digits))
}

import { describe, it, expect } from 'vitest'
import * as THREE from 'three'
import {
    degreesToRadians,
    fromEuler,
    objectMatrix,
    rotateAboutLocalZ,
    rotateBy,
    toEuler,
    trackRotation,
} from '../../src/math/transform.js'
import type { SceneObject } from '../../src/types/index.js'

function expectVector(actual: THREE.Vector3, x: number, y: number, z: number) {
    expect(actual.x).toBeCloseTo(x, 6)
    expect(actual.y).toBeCloseTo(y, 6)
    expect(actual.z).toBeCloseTo(z, 6)
}

describe('rotateBy', () => {
    it('turns about Z', () => {
        expectVector(rotateBy(new THREE.Vector3(1, 0, 0), new THREE.Vector3(0, 0, Math.PI / 2)), 0, 1, 0)
    })

    it('applies X, then Y, then Z about fixed axes', () => {
        // X first lifts +Y to +Z; the Z turn then leaves it there
        const rotation = new THREE.Vector3(Math.PI / 2, 0, Math.PI / 2)
        expectVector(rotateBy(new THREE.Vector3(0, 1, 0), rotation), 0, 0, 1)
    })
})

describe('toEuler / fromEuler', () => {
    it('round-trips angles', () => {
        const angles = new THREE.Vector3(0.1, -0.2, 0.3)
        expectVector(fromEuler(toEuler(angles)), 0.1, -0.2, 0.3)
    })

    it('reorders Eulers given in another order', () => {
        const euler = new THREE.Euler(0, 0, 0.5, 'XYZ')
        expectVector(fromEuler(euler), 0, 0, 0.5)
    })
})

describe('degreesToRadians', () => {
    it('converts each component', () => {
        expectVector(degreesToRadians([180, 90, -45]), Math.PI, Math.PI / 2, -Math.PI / 4)
    })
})

describe('rotateAboutLocalZ', () => {
    it('adds to Z when there is no other rotation', () => {
        expectVector(rotateAboutLocalZ(new THREE.Vector3(), Math.PI / 2), 0, 0, Math.PI / 2)
    })

    it('turns about the already-rotated Z axis', () => {
        // Local Z turn takes +X to +Y, then the X quarter turn lifts +Y to +Z
        const rotation = rotateAboutLocalZ(new THREE.Vector3(Math.PI / 2, 0, 0), Math.PI / 2)
        expectVector(rotateBy(new THREE.Vector3(1, 0, 0), rotation), 0, 0, 1)
    })
})

describe('trackRotation', () => {
    it('points +Y along the direction and keeps +Z up', () => {
        const rotation = trackRotation(new THREE.Vector3(3, 0, 0))
        expect(rotation).not.toBeNull()
        if (rotation === null) return

        expectVector(rotation, 0, 0, -Math.PI / 2)
        expectVector(rotateBy(new THREE.Vector3(0, 1, 0), rotation), 1, 0, 0)
        expectVector(rotateBy(new THREE.Vector3(0, 0, 1), rotation), 0, 0, 1)
    })

    it('handles directions parallel to the up axis', () => {
        const rotation = trackRotation(new THREE.Vector3(0, 0, 2))
        expect(rotation).not.toBeNull()
        if (rotation === null) return
        expectVector(rotateBy(new THREE.Vector3(0, 1, 0), rotation), 0, 0, 1)
    })

    it('returns null for a zero direction', () => {
        expect(trackRotation(new THREE.Vector3())).toBeNull()
    })
})

describe('objectMatrix', () => {
    it('scales, rotates, then translates', () => {
        const obj: SceneObject = {
            name: 'Box',
            type: 'mesh',
            location: [1, 2, 3],
            rotation: [0, 0, Math.PI / 2],
            scale: [2, 2, 2],
            dimensions: [2, 2, 2],
        }
        expectVector(new THREE.Vector3(1, 0, 0).applyMatrix4(objectMatrix(obj)), 1, 4, 3)
    })
})

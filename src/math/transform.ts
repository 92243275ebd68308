/**
 * Transform helpers on top of three.js math.
 *
 * Rotations travel through the graph as plain Vector3 Euler angles so
 * nodes can add them component-wise. They are applied X, then Y, then Z
 * about the fixed axes, which is three.js order 'ZYX'.
 */

import * as THREE from 'three'
import type { SceneObject, Vec3Tuple } from '../types/index.js'

export const EULER_ORDER: THREE.EulerOrder = 'ZYX'

const UP = new THREE.Vector3(0, 0, 1)
const FALLBACK_UP = new THREE.Vector3(1, 0, 0)
const Z_AXIS = new THREE.Vector3(0, 0, 1)

export function toEuler(rotation: THREE.Vector3): THREE.Euler {
    return new THREE.Euler(rotation.x, rotation.y, rotation.z, EULER_ORDER)
}

export function fromEuler(euler: THREE.Euler): THREE.Vector3 {
    const reordered = euler.order === EULER_ORDER
        ? euler
        : new THREE.Euler().setFromQuaternion(new THREE.Quaternion().setFromEuler(euler), EULER_ORDER)
    return new THREE.Vector3(reordered.x, reordered.y, reordered.z)
}

export function vec3(tuple: Vec3Tuple): THREE.Vector3 {
    return new THREE.Vector3(tuple[0], tuple[1], tuple[2])
}

export function tuple(v: THREE.Vector3): Vec3Tuple {
    return [v.x, v.y, v.z]
}

export function degreesToRadians(v: Vec3Tuple): THREE.Vector3 {
    return new THREE.Vector3(
        THREE.MathUtils.degToRad(v[0]),
        THREE.MathUtils.degToRad(v[1]),
        THREE.MathUtils.degToRad(v[2])
    )
}

/** Rotate a vector (in place) by Euler angles stored in a Vector3 */
export function rotateBy(v: THREE.Vector3, rotation: THREE.Vector3): THREE.Vector3 {
    return v.applyEuler(toEuler(rotation))
}

/** Rotate Euler angles about their own local Z axis */
export function rotateAboutLocalZ(rotation: THREE.Vector3, angle: number): THREE.Vector3 {
    const q = new THREE.Quaternion().setFromEuler(toEuler(rotation))
    q.multiply(new THREE.Quaternion().setFromAxisAngle(Z_AXIS, angle))
    return fromEuler(new THREE.Euler().setFromQuaternion(q, EULER_ORDER))
}

/**
 * Rotation whose local +Y axis points along `direction`, with +Z as the
 * up hint. Returns null for a zero-length direction.
 */
export function trackRotation(direction: THREE.Vector3): THREE.Vector3 | null {
    if (direction.lengthSq() === 0) return null

    const yAxis = direction.clone().normalize()
    const xAxis = new THREE.Vector3().crossVectors(yAxis, UP)
    if (xAxis.lengthSq() < 1e-12) {
        xAxis.crossVectors(yAxis, FALLBACK_UP)
    }
    xAxis.normalize()
    const zAxis = new THREE.Vector3().crossVectors(xAxis, yAxis)

    const basis = new THREE.Matrix4().makeBasis(xAxis, yAxis, zAxis)
    return fromEuler(new THREE.Euler().setFromRotationMatrix(basis, EULER_ORDER))
}

/** Object-to-world matrix from a scene snapshot */
export function objectMatrix(obj: SceneObject): THREE.Matrix4 {
    return composeMatrix(vec3(obj.location), vec3(obj.rotation), vec3(obj.scale))
}

/** Same as objectMatrix but without the translation */
export function objectLinearMatrix(obj: SceneObject): THREE.Matrix4 {
    return composeMatrix(new THREE.Vector3(), vec3(obj.rotation), vec3(obj.scale))
}

export function composeMatrix(
    position: THREE.Vector3,
    rotation: THREE.Vector3,
    scale: THREE.Vector3
): THREE.Matrix4 {
    const q = new THREE.Quaternion().setFromEuler(toEuler(rotation))
    return new THREE.Matrix4().compose(position, q, scale)
}

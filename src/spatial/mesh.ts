/**
 * Small readers over MeshData.
 */

import * as THREE from 'three'
import type { MeshData } from '../types/index.js'

/** Every vertex of the mesh, in the mesh's own space */
export function meshVertices(mesh: MeshData): THREE.Vector3[] {
    const vertices: THREE.Vector3[] = []
    for (let i = 0; i + 2 < mesh.positions.length; i += 3) {
        vertices.push(new THREE.Vector3(mesh.positions[i], mesh.positions[i + 1], mesh.positions[i + 2]))
    }
    return vertices
}

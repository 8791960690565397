import * as THREE from 'three'
import type { Ray } from './Ray'
import type { Material } from './Material'

export interface HitRecord {
    point: THREE.Vector3
    normal: THREE.Vector3       // Unit length, always opposes the incoming ray
    t: number
    frontFace: boolean
    material: Material
}

/**
 * `outwardNormal` must be unit length.
 */
export function createHitRecord(ray: Ray, t: number, outwardNormal: THREE.Vector3, material: Material): HitRecord {
    const frontFace = ray.direction.dot(outwardNormal) < 0

    return {
        point: ray.at(t),
        normal: frontFace ? outwardNormal : outwardNormal.clone().negate(),
        t,
        frontFace,
        material
    }
}

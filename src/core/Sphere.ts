import * as THREE from 'three'
import type { Ray } from './Ray'
import type { Material } from './Material'
import { createHitRecord, type HitRecord } from './HitRecord'

export class Sphere {
    readonly center: THREE.Vector3
    readonly radius: number
    readonly material: Material

    constructor(center: THREE.Vector3, radius: number, material: Material) {
        if (!Number.isFinite(radius) || radius <= 0) {
            throw new Error(`Sphere radius must be a finite positive number, got ${radius}`)
        }

        this.center = center.clone()
        this.radius = radius
        this.material = material
    }

    /**
     * Solves |O + tD - C|² = r² in the reduced form (h = D·(C - O)).
     * Returns the nearest root strictly inside (tMin, tMax), or null.
     */
    hit(ray: Ray, tMin: number, tMax: number): HitRecord | null {
        const oc = this.center.clone().sub(ray.origin)
        const a = ray.direction.lengthSq()
        const h = ray.direction.dot(oc)
        const c = oc.lengthSq() - this.radius * this.radius

        const discriminant = h * h - a * c
        if (discriminant < 0) {
            return null
        }

        const sqrtD = Math.sqrt(discriminant)

        let root = (h - sqrtD) / a
        if (root <= tMin || root >= tMax) {
            root = (h + sqrtD) / a
            if (root <= tMin || root >= tMax) {
                return null
            }
        }

        const outwardNormal = ray.at(root).sub(this.center).divideScalar(this.radius)
        return createHitRecord(ray, root, outwardNormal, this.material)
    }
}

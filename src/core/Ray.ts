import * as THREE from 'three'

export class Ray {
    origin: THREE.Vector3
    direction: THREE.Vector3

    /**
     * The direction is kept as given (not normalised): sphere intersection and the
     * camera both work with unnormalised directions.
     */
    constructor(origin: THREE.Vector3, direction: THREE.Vector3) {
        this.origin = origin
        this.direction = direction
    }

    /**
     * Point on the ray at parameter t: p(t) = origin + t * direction
     */
    at(t: number): THREE.Vector3 {
        return this.direction.clone().multiplyScalar(t).add(this.origin)
    }
}

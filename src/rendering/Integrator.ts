import * as THREE from 'three';
import type { Ray } from '../core/Ray';
import type { Rng } from '../core/Random';
import { scatter } from '../core/Material';
import type { Scene } from '../scene/Scene';
import { toColor } from '../core/VectorMath';
import { INTEGRATOR_CONFIG } from '../utils/Constants';

const BACKGROUND_BOTTOM = toColor(INTEGRATOR_CONFIG.BACKGROUND.BOTTOM);
const BACKGROUND_TOP = toColor(INTEGRATOR_CONFIG.BACKGROUND.TOP);

/**
 * Vertical white-to-sky gradient seen by rays that leave the scene.
 */
export function backgroundColor(direction: THREE.Vector3): THREE.Color {
    const unitDirection = direction.clone().normalize();
    const a = 0.5 * (unitDirection.y + 1.0);
    return new THREE.Color().lerpColors(BACKGROUND_BOTTOM, BACKGROUND_TOP, a);
}

/**
 * Radiance along `ray`, following at most `depth` bounces.
 * Always returns a fresh Color owned by the caller.
 */
export function rayColor(rng: Rng, depth: number, ray: Ray, scene: Scene): THREE.Color {
    if (depth <= 0) {
        return new THREE.Color(0, 0, 0);
    }

    const hit = scene.hit(ray, INTEGRATOR_CONFIG.T_MIN, Infinity);
    if (hit) {
        const scattered = scatter(hit.material, rng, ray, hit);
        if (!scattered) {
            return new THREE.Color(0, 0, 0);
        }
        return rayColor(rng, depth - 1, scattered.scattered, scene).multiply(scattered.attenuation);
    }

    return backgroundColor(ray.direction);
}

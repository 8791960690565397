import * as THREE from 'three';
import type { Rng } from './Random';
import { INTEGRATOR_CONFIG } from '../utils/Constants';

export type Vec3Like = { x: number; y: number; z: number };
export type RGBLike = { r: number; g: number; b: number };

export function toVector3(v: Vec3Like): THREE.Vector3 {
    return new THREE.Vector3(v.x, v.y, v.z);
}

export function toColor(c: RGBLike): THREE.Color {
    return new THREE.Color(c.r, c.g, c.b);
}

export function randomVector(rng: Rng, min: number, max: number): THREE.Vector3 {
    return new THREE.Vector3(
        rng.uniformF64Range(min, max),
        rng.uniformF64Range(min, max),
        rng.uniformF64Range(min, max)
    );
}

export function randomUnitVector(rng: Rng): THREE.Vector3 {
    for (;;) {
        const p = randomVector(rng, -1, 1);
        const lengthSq = p.lengthSq();
        if (lengthSq > 1e-160 && lengthSq <= 1) {
            return p.divideScalar(Math.sqrt(lengthSq));
        }
    }
}

export function randomInUnitDisk(rng: Rng): THREE.Vector3 {
    for (;;) {
        const p = new THREE.Vector3(rng.uniformF64Range(-1, 1), rng.uniformF64Range(-1, 1), 0);
        if (p.lengthSq() < 1) {
            return p;
        }
    }
}

export function nearZero(v: THREE.Vector3): boolean {
    const s = INTEGRATOR_CONFIG.NEAR_ZERO;
    return Math.abs(v.x) < s && Math.abs(v.y) < s && Math.abs(v.z) < s;
}

/**
 * Mirror `v` about a surface with unit normal `n`. Returns a new vector.
 */
export function reflect(v: THREE.Vector3, n: THREE.Vector3): THREE.Vector3 {
    return v.clone().reflect(n);
}

/**
 * Snell refraction of the unit direction `uv` through a surface with unit normal `n`
 * that opposes it. `etaRatio` is eta_incident / eta_transmitted.
 */
export function refract(uv: THREE.Vector3, n: THREE.Vector3, etaRatio: number): THREE.Vector3 {
    const cosTheta = Math.min(-uv.dot(n), 1.0);
    const rOutPerp = n.clone().multiplyScalar(cosTheta).add(uv).multiplyScalar(etaRatio);
    const rOutParallel = n.clone().multiplyScalar(-Math.sqrt(Math.abs(1.0 - rOutPerp.lengthSq())));
    return rOutPerp.add(rOutParallel);
}

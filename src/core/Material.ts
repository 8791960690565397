import * as THREE from 'three';
import { Ray } from './Ray';
import type { Rng } from './Random';
import type { HitRecord } from './HitRecord';
import { nearZero, randomUnitVector, reflect, refract, type RGBLike } from './VectorMath';

/**
 * 🎨 Material - closed set of surface models
 *
 * Materials are frozen once created and shared by every sphere and every strip
 * worker that references them. `Object.freeze` does not reach into the albedo
 * colour, so scatter hands out copies and never the material's own instance.
 */

export interface Lambertian {
    readonly kind: 'lambertian';
    readonly albedo: THREE.Color;
}

export interface Metal {
    readonly kind: 'metal';
    readonly albedo: THREE.Color;
    readonly fuzz: number;
}

export interface Dielectric {
    readonly kind: 'dielectric';
    readonly refractionIndex: number;
}

export type Material = Lambertian | Metal | Dielectric;

export interface ScatterRecord {
    attenuation: THREE.Color;   // Owned by the caller
    scattered: Ray;
}

const WHITE = new THREE.Color(1, 1, 1);

function colorFrom(albedo: THREE.Color | RGBLike): THREE.Color {
    return new THREE.Color(albedo.r, albedo.g, albedo.b);
}

export function lambertian(albedo: THREE.Color | RGBLike): Lambertian {
    return Object.freeze({ kind: 'lambertian', albedo: colorFrom(albedo) });
}

export function metal(albedo: THREE.Color | RGBLike, fuzz: number): Metal {
    if (!(fuzz >= 0 && fuzz <= 1)) {
        throw new Error(`Metal fuzz must be within [0, 1], got ${fuzz}`);
    }
    return Object.freeze({ kind: 'metal', albedo: colorFrom(albedo), fuzz });
}

export function dielectric(refractionIndex: number): Dielectric {
    if (!Number.isFinite(refractionIndex) || refractionIndex <= 0) {
        throw new Error(`Refraction index must be a finite positive number, got ${refractionIndex}`);
    }
    return Object.freeze({ kind: 'dielectric', refractionIndex });
}

/**
 * Schlick's approximation of Fresnel reflectance.
 */
export function reflectance(cosine: number, refractionIndex: number): number {
    let r0 = (1 - refractionIndex) / (1 + refractionIndex);
    r0 = r0 * r0;
    return r0 + (1 - r0) * Math.pow(1 - cosine, 5);
}

function scatterLambertian(material: Lambertian, rng: Rng, hit: HitRecord): ScatterRecord {
    let direction = hit.normal.clone().add(randomUnitVector(rng));

    // Degenerate when the random vector almost cancels the normal
    if (nearZero(direction)) {
        direction = hit.normal.clone();
    }

    return {
        attenuation: material.albedo.clone(),
        scattered: new Ray(hit.point, direction)
    };
}

function scatterMetal(material: Metal, rng: Rng, rayIn: Ray, hit: HitRecord): ScatterRecord | null {
    const reflected = reflect(rayIn.direction, hit.normal)
        .normalize()
        .add(randomUnitVector(rng).multiplyScalar(material.fuzz));

    if (reflected.dot(hit.normal) <= 0) {
        return null;
    }

    return {
        attenuation: material.albedo.clone(),
        scattered: new Ray(hit.point, reflected)
    };
}

function scatterDielectric(material: Dielectric, rng: Rng, rayIn: Ray, hit: HitRecord): ScatterRecord {
    const ri = hit.frontFace ? 1 / material.refractionIndex : material.refractionIndex;

    const unitDirection = rayIn.direction.clone().normalize();
    const cosTheta = Math.min(-unitDirection.dot(hit.normal), 1);
    const sinTheta = Math.sqrt(1 - cosTheta * cosTheta);

    const cannotRefract = ri * sinTheta > 1;
    const direction = cannotRefract || reflectance(cosTheta, ri) > rng.uniformF64()
        ? reflect(unitDirection, hit.normal)
        : refract(unitDirection, hit.normal, ri);

    return {
        attenuation: WHITE.clone(),
        scattered: new Ray(hit.point, direction)
    };
}

/**
 * Returns null when the ray is absorbed.
 */
export function scatter(material: Material, rng: Rng, rayIn: Ray, hit: HitRecord): ScatterRecord | null {
    switch (material.kind) {
        case 'lambertian':
            return scatterLambertian(material, rng, hit);
        case 'metal':
            return scatterMetal(material, rng, rayIn, hit);
        case 'dielectric':
            return scatterDielectric(material, rng, rayIn, hit);
        default: {
            const unreachable: never = material;
            throw new Error(`Unknown material: ${JSON.stringify(unreachable)}`);
        }
    }
}

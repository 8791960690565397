import * as THREE from 'three';
import { toSeed64, type Seed } from './Random';
import type { Vec3Like } from './VectorMath';
import { CAMERA_CONFIG, RENDER_CONFIG } from '../utils/Constants';

/**
 * Everything the renderer needs at construction time.
 */
export interface RenderOptions {
    imageWidth: number;
    aspectRatio: number;
    maxDepth: number;
    vfov: number;               // Degrees
    lookFrom: Vec3Like;
    lookAt: Vec3Like;
    vup: Vec3Like;
    defocusAngle: number;       // Degrees
    focusDist: number;
    workerCount: number;
    seed: bigint;
}

export type RenderOptionsInput = Partial<Omit<RenderOptions, 'seed'>> & { seed?: Seed };

export function computeImageHeight(imageWidth: number, aspectRatio: number): number {
    return Math.max(1, Math.floor(imageWidth / aspectRatio));
}

function requireInteger(name: string, value: number, min: number, max: number = Number.MAX_SAFE_INTEGER): void {
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new Error(`${name} must be an integer in [${min}, ${max}], got ${value}`);
    }
}

function requireFinite(name: string, v: Vec3Like): void {
    if (![v.x, v.y, v.z].every(Number.isFinite)) {
        throw new Error(`${name} must have finite components, got (${v.x}, ${v.y}, ${v.z})`);
    }
}

/**
 * Fills defaults and validates. Throws on any invalid combination.
 */
export function resolveRenderOptions(input: RenderOptionsInput = {}): RenderOptions {
    const options: RenderOptions = {
        imageWidth: input.imageWidth ?? RENDER_CONFIG.DEFAULT_WIDTH,
        aspectRatio: input.aspectRatio ?? RENDER_CONFIG.DEFAULT_ASPECT_RATIO,
        maxDepth: input.maxDepth ?? RENDER_CONFIG.DEFAULT_MAX_DEPTH,
        vfov: input.vfov ?? CAMERA_CONFIG.VFOV,
        lookFrom: { ...(input.lookFrom ?? CAMERA_CONFIG.LOOK_FROM) },
        lookAt: { ...(input.lookAt ?? CAMERA_CONFIG.LOOK_AT) },
        vup: { ...(input.vup ?? CAMERA_CONFIG.VUP) },
        defocusAngle: input.defocusAngle ?? CAMERA_CONFIG.DEFOCUS_ANGLE,
        focusDist: input.focusDist ?? CAMERA_CONFIG.FOCUS_DIST,
        workerCount: input.workerCount ?? 1,
        seed: toSeed64(input.seed ?? RENDER_CONFIG.DEFAULT_SEED),
    };

    requireInteger('imageWidth', options.imageWidth, 1);
    if (!Number.isFinite(options.aspectRatio) || options.aspectRatio <= 0) {
        throw new Error(`aspectRatio must be a finite positive number, got ${options.aspectRatio}`);
    }
    requireInteger('maxDepth', options.maxDepth, 1);
    if (!(options.vfov > 0 && options.vfov < 180)) {
        throw new Error(`vfov must be within (0, 180) degrees, got ${options.vfov}`);
    }
    if (!(options.defocusAngle >= 0 && options.defocusAngle < 180)) {
        throw new Error(`defocusAngle must be within [0, 180) degrees, got ${options.defocusAngle}`);
    }
    if (!Number.isFinite(options.focusDist) || options.focusDist <= 0) {
        throw new Error(`focusDist must be a finite positive number, got ${options.focusDist}`);
    }
    requireInteger('workerCount', options.workerCount, 1, options.imageWidth);

    requireFinite('lookFrom', options.lookFrom);
    requireFinite('lookAt', options.lookAt);
    requireFinite('vup', options.vup);

    const forward = new THREE.Vector3(options.lookFrom.x, options.lookFrom.y, options.lookFrom.z)
        .sub(new THREE.Vector3(options.lookAt.x, options.lookAt.y, options.lookAt.z));
    if (forward.lengthSq() === 0) {
        throw new Error('lookFrom and lookAt must differ');
    }
    const side = new THREE.Vector3(options.vup.x, options.vup.y, options.vup.z).cross(forward);
    if (side.lengthSq() === 0) {
        throw new Error('vup must not be parallel to the view direction');
    }

    return options;
}

import { describe, expect, it } from 'vitest';
import { computeImageHeight, resolveRenderOptions } from '../core/RenderOptions';
import { CAMERA_CONFIG, RENDER_CONFIG } from '../utils/Constants';

describe('resolveRenderOptions', () => {
    it('fills in the defaults', () => {
        const options = resolveRenderOptions();

        expect(options.imageWidth).toBe(RENDER_CONFIG.DEFAULT_WIDTH);
        expect(options.maxDepth).toBe(50);
        expect(options.workerCount).toBe(1);
        expect(options.seed).toBe(0x5eedn);
        expect(options.lookFrom).toEqual({ x: -2, y: 2, z: 1 });
        expect(options.lookFrom).not.toBe(CAMERA_CONFIG.LOOK_FROM);
    });

    it('accepts number and bigint seeds', () => {
        expect(resolveRenderOptions({ seed: 12 }).seed).toBe(12n);
        expect(resolveRenderOptions({ seed: (1n << 64n) + 5n }).seed).toBe(5n);
        expect(() => resolveRenderOptions({ seed: -1 })).toThrow(/Seed/);
    });

    it('rejects invalid sizes and counts', () => {
        expect(() => resolveRenderOptions({ imageWidth: 0 })).toThrow(/imageWidth/);
        expect(() => resolveRenderOptions({ imageWidth: 10.5 })).toThrow(/imageWidth/);
        expect(() => resolveRenderOptions({ aspectRatio: 0 })).toThrow(/aspectRatio/);
        expect(() => resolveRenderOptions({ maxDepth: 0 })).toThrow(/maxDepth/);
        expect(() => resolveRenderOptions({ imageWidth: 8, workerCount: 9 })).toThrow(/workerCount/);
        expect(() => resolveRenderOptions({ workerCount: 0 })).toThrow(/workerCount/);
    });

    it('rejects degenerate camera setups', () => {
        expect(() => resolveRenderOptions({ vfov: 180 })).toThrow(/vfov/);
        expect(() => resolveRenderOptions({ focusDist: 0 })).toThrow(/focusDist/);
        expect(() => resolveRenderOptions({ defocusAngle: -1 })).toThrow(/defocusAngle/);
        expect(() => resolveRenderOptions({ lookFrom: { x: 0, y: 0, z: -1 } })).toThrow(/must differ/);
        expect(() => resolveRenderOptions({
            lookFrom: { x: 0, y: 5, z: 0 },
            lookAt: { x: 0, y: 0, z: 0 },
            vup: { x: 0, y: 1, z: 0 }
        })).toThrow(/parallel/);
        expect(() => resolveRenderOptions({ lookAt: { x: Number.NaN, y: 0, z: 0 } })).toThrow(/lookAt/);
    });
});

describe('computeImageHeight', () => {
    it('floors and clamps to one row', () => {
        expect(computeImageHeight(10, 3)).toBe(3);
        expect(computeImageHeight(4, 2)).toBe(2);
        expect(computeImageHeight(1, 16 / 9)).toBe(1);
    });
});

import { Camera } from '../core/Camera';
import { Rng } from '../core/Random';
import type { RenderOptions } from '../core/RenderOptions';
import type { Scene } from '../scene/Scene';
import { rayColor } from './Integrator';
import type { PauseFlag } from './PauseFlag';
import type { StripBuffer } from './StripBuffer';
import { DISPLAY_CONFIG } from '../utils/Constants';

export type ViewWorkerOptions = Pick<RenderOptions,
    'imageWidth' | 'aspectRatio' | 'maxDepth' | 'vfov' | 'lookFrom' | 'lookAt' | 'vup' |
    'defocusAngle' | 'focusDist' | 'seed'>;

/**
 * Seed of the generator that renders strip `stripIndex`.
 */
export function stripSeed(seed: bigint, stripIndex: number): bigint {
    return BigInt.asUintN(64, seed + BigInt(stripIndex));
}

export function toDisplayByte(sum: number, passes: number): number {
    return Math.min(DISPLAY_CONFIG.OPAQUE_ALPHA, Math.trunc(Math.sqrt(sum / passes) * DISPLAY_CONFIG.GAMMA_SCALE));
}

/**
 * ViewWorker - progressive renderer for one vertical strip
 *
 * Owns the strip's accumulator, its RNG and the row cursor of the pass in
 * progress. A pass can stop at any row boundary and resume later from the same
 * row. Not thread-safe: exactly one thread drives a given instance.
 */
export class ViewWorker {
    private readonly scene: Scene;
    private readonly options: ViewWorkerOptions;
    private readonly buffer: StripBuffer;
    private readonly camera: Camera;
    private readonly rng: Rng;
    private readonly accumulator: Float64Array;
    private readonly rowScratch: Uint8Array;

    private startRow: number = 0;
    private completedPasses: number = 0;

    constructor(scene: Scene, options: ViewWorkerOptions, buffer: StripBuffer) {
        if (!scene.isFrozen()) {
            throw new Error('Scene must be frozen before a view worker can render it');
        }

        this.scene = scene;
        this.options = options;
        this.buffer = buffer;

        this.camera = new Camera(options);
        const { layout } = buffer;

        if (layout.height !== this.camera.getImageHeight()) {
            throw new Error(`Strip height ${layout.height} does not match image height ${this.camera.getImageHeight()}`);
        }
        if (layout.offsetX < 0 || layout.offsetX + layout.width > this.camera.getImageWidth()) {
            throw new Error(`Strip ${layout.index} lies outside the ${this.camera.getImageWidth()} px wide image`);
        }

        this.rng = new Rng(stripSeed(options.seed, layout.index));
        this.accumulator = new Float64Array(layout.width * layout.height * 3);
        this.rowScratch = new Uint8Array(buffer.rowBytes);
    }

    public getRenderPasses(): number {
        return this.completedPasses;
    }

    public getStartRow(): number {
        return this.startRow;
    }

    /**
     * Renders the row under the cursor, then advances it. Finishing the last row
     * completes a pass and wraps the cursor to the top.
     */
    public renderRow(): void {
        const { offsetX, width, height } = this.buffer.layout;
        const y = this.startRow;
        const passes = this.completedPasses + 1;
        const row = this.rowScratch;

        for (let x = 0; x < width; x++) {
            const ray = this.camera.getRay(this.rng, offsetX + x, y);
            const color = rayColor(this.rng, this.options.maxDepth, ray, this.scene);

            const i = (y * width + x) * 3;
            this.accumulator[i] += color.r;
            this.accumulator[i + 1] += color.g;
            this.accumulator[i + 2] += color.b;

            const p = x * DISPLAY_CONFIG.CHANNELS;
            row[p] = toDisplayByte(this.accumulator[i], passes);
            row[p + 1] = toDisplayByte(this.accumulator[i + 1], passes);
            row[p + 2] = toDisplayByte(this.accumulator[i + 2], passes);
            row[p + 3] = DISPLAY_CONFIG.OPAQUE_ALPHA;
        }

        this.buffer.writeRow(y, row);

        this.startRow++;
        if (this.startRow >= height) {
            this.startRow = 0;
            this.completedPasses++;
        }
    }

    /**
     * Works towards `passesWanted` completed passes. Renders at least one row
     * unless the target is already met, then stops at the first row boundary
     * where the pause flag is set. Returns the completed pass count.
     */
    public renderPasses(passesWanted: number, pause: PauseFlag): number {
        if (this.completedPasses >= passesWanted) {
            return this.completedPasses;
        }

        do {
            this.renderRow();
        } while (this.completedPasses < passesWanted && !pause.isSet());

        return this.completedPasses;
    }

    /**
     * Averaged linear colour of strip-local pixel (x, y) over the completed
     * passes, or null before the first pass completes.
     */
    public getNormalizedColor(x: number, y: number): [number, number, number] | null {
        if (this.completedPasses === 0) {
            return null;
        }

        const { width, height } = this.buffer.layout;
        if (x < 0 || x >= width || y < 0 || y >= height) {
            throw new Error(`Pixel (${x}, ${y}) is outside the ${width}x${height} strip`);
        }

        // Rows above the cursor already hold one extra sample
        const samples = y < this.startRow ? this.completedPasses + 1 : this.completedPasses;
        const i = (y * width + x) * 3;
        return [
            this.accumulator[i] / samples,
            this.accumulator[i + 1] / samples,
            this.accumulator[i + 2] / samples
        ];
    }
}

import { Logger } from '../utils/Logger';
import { DISPLAY_CONFIG } from '../utils/Constants';
import type { StripView } from './RenderCoordinator';

/**
 * FrameBuffer - full-image RGBA target the strips are uploaded into
 *
 * Plays the role of the display texture: the host uploads every strip once per
 * frame, each under that strip's lock, and presents or saves the result.
 */
export class FrameBuffer {
    private logger: Logger;
    private readonly pixels: Uint8Array;

    private readonly width: number;
    private readonly height: number;
    private uploads: number = 0;

    constructor(width: number, height: number) {
        if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
            throw new Error(`Frame buffer size must be positive integers, got ${width}x${height}`);
        }

        this.logger = Logger.getInstance();
        this.width = width;
        this.height = height;
        this.pixels = new Uint8Array(width * height * DISPLAY_CONFIG.CHANNELS);
    }

    public upload(strips: readonly StripView[]): void {
        for (const { layout, buffer } of strips) {
            if (layout.height !== this.height || layout.offsetX + layout.width > this.width) {
                throw new Error(`Strip ${layout.index} (${layout.width}x${layout.height} at x=${layout.offsetX}) does not fit the ${this.width}x${this.height} frame`);
            }

            buffer.read((stripPixels) => {
                const stripRowBytes = layout.width * DISPLAY_CONFIG.CHANNELS;
                const frameRowBytes = this.width * DISPLAY_CONFIG.CHANNELS;

                for (let y = 0; y < layout.height; y++) {
                    const source = stripPixels.subarray(y * stripRowBytes, (y + 1) * stripRowBytes);
                    this.pixels.set(source, y * frameRowBytes + layout.offsetX * DISPLAY_CONFIG.CHANNELS);
                }
            });
        }

        this.uploads++;
    }

    public getPixels(): Uint8Array {
        return this.pixels;
    }

    public getPixel(x: number, y: number): [number, number, number, number] {
        if (x < 0 || x >= this.width || y < 0 || y >= this.height) {
            throw new Error(`Pixel (${x}, ${y}) is outside the ${this.width}x${this.height} frame`);
        }

        const i = (y * this.width + x) * DISPLAY_CONFIG.CHANNELS;
        return [this.pixels[i], this.pixels[i + 1], this.pixels[i + 2], this.pixels[i + 3]];
    }

    public getDimensions(): { width: number; height: number } {
        return {
            width: this.width,
            height: this.height
        };
    }

    public getUploadCount(): number {
        return this.uploads;
    }

    /**
     * Binary PPM (P6), alpha dropped.
     */
    public toPPM(): Buffer {
        const header = Buffer.from(`P6\n${this.width} ${this.height}\n255\n`, 'ascii');
        const body = Buffer.alloc(this.width * this.height * 3);

        for (let p = 0, q = 0; p < this.pixels.length; p += DISPLAY_CONFIG.CHANNELS, q += 3) {
            body[q] = this.pixels[p];
            body[q + 1] = this.pixels[p + 1];
            body[q + 2] = this.pixels[p + 2];
        }

        this.logger.debug(`Encoded ${this.width}x${this.height} PPM (${header.length + body.length} bytes)`);
        return Buffer.concat([header, body]);
    }

    public clear(): void {
        this.pixels.fill(0);
        this.uploads = 0;
    }
}

import { DISPLAY_CONFIG, WORKER_CONFIG } from '../utils/Constants';

export interface StripLayout {
    index: number;
    offsetX: number;            // First image column covered by the strip
    width: number;
    height: number;
}

/**
 * Splits the image into `count` vertical strips. Strip i covers columns
 * [floor(i·W/n), floor((i+1)·W/n)), so widths differ by at most one column.
 */
export function partitionStrips(imageWidth: number, imageHeight: number, count: number): StripLayout[] {
    if (!Number.isInteger(count) || count < 1 || count > imageWidth) {
        throw new Error(`Strip count must be an integer in [1, ${imageWidth}], got ${count}`);
    }

    const strips: StripLayout[] = [];
    for (let index = 0; index < count; index++) {
        const start = Math.floor(index * imageWidth / count);
        const end = Math.floor((index + 1) * imageWidth / count);
        strips.push({ index, offsetX: start, width: end - start, height: imageHeight });
    }
    return strips;
}

const HEADER_BYTES = 8;

/**
 * StripBuffer - RGBA display bytes of one strip behind a mutex
 *
 * Pixels and lock word share one SharedArrayBuffer so the same memory can be
 * handed to a worker thread. The writer holds the lock for exactly one row; a
 * reader holding it therefore never sees a half-written pixel.
 */
export class StripBuffer {
    readonly layout: StripLayout;
    readonly shared: SharedArrayBuffer;
    private readonly lockWord: Int32Array;
    private readonly pixels: Uint8Array;

    constructor(layout: StripLayout, shared?: SharedArrayBuffer) {
        const byteLength = layout.width * layout.height * DISPLAY_CONFIG.CHANNELS;
        this.layout = layout;
        this.shared = shared ?? new SharedArrayBuffer(HEADER_BYTES + byteLength);

        if (this.shared.byteLength !== HEADER_BYTES + byteLength) {
            throw new Error(
                `Shared buffer of ${this.shared.byteLength} bytes does not fit a ${layout.width}x${layout.height} strip`
            );
        }

        this.lockWord = new Int32Array(this.shared, 0, 1);
        this.pixels = new Uint8Array(this.shared, HEADER_BYTES, byteLength);
    }

    public get rowBytes(): number {
        return this.layout.width * DISPLAY_CONFIG.CHANNELS;
    }

    public get byteLength(): number {
        return this.pixels.byteLength;
    }

    private lock(): void {
        while (Atomics.compareExchange(this.lockWord, 0, WORKER_CONFIG.LOCK_UNLOCKED, WORKER_CONFIG.LOCK_LOCKED)
            !== WORKER_CONFIG.LOCK_UNLOCKED) {
            Atomics.wait(this.lockWord, 0, WORKER_CONFIG.LOCK_LOCKED);
        }
    }

    private unlock(): void {
        Atomics.store(this.lockWord, 0, WORKER_CONFIG.LOCK_UNLOCKED);
        Atomics.notify(this.lockWord, 0, 1);
    }

    public writeRow(y: number, row: Uint8Array): void {
        if (!Number.isInteger(y) || y < 0 || y >= this.layout.height) {
            throw new Error(`Row ${y} is outside strip ${this.layout.index} (height ${this.layout.height})`);
        }
        if (row.byteLength !== this.rowBytes) {
            throw new Error(`Row must be ${this.rowBytes} bytes, got ${row.byteLength}`);
        }

        this.lock();
        try {
            this.pixels.set(row, y * this.rowBytes);
        } finally {
            this.unlock();
        }
    }

    /**
     * Runs `reader` with the lock held. The view is only valid inside the callback.
     */
    public read<T>(reader: (pixels: Uint8Array, layout: StripLayout) => T): T {
        this.lock();
        try {
            return reader(this.pixels, this.layout);
        } finally {
            this.unlock();
        }
    }

    public snapshot(): Uint8Array {
        return this.read(pixels => pixels.slice());
    }
}

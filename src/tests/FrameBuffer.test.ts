import { describe, expect, it } from 'vitest';
import { FrameBuffer } from '../rendering/FrameBuffer';
import { StripBuffer } from '../rendering/StripBuffer';

function twoStrips() {
    const left = new StripBuffer({ index: 0, offsetX: 0, width: 2, height: 1 });
    const right = new StripBuffer({ index: 1, offsetX: 2, width: 1, height: 1 });
    left.writeRow(0, Uint8Array.from([10, 11, 12, 255, 20, 21, 22, 255]));
    right.writeRow(0, Uint8Array.from([30, 31, 32, 255]));
    return [
        { layout: left.layout, buffer: left },
        { layout: right.layout, buffer: right }
    ];
}

describe('FrameBuffer', () => {
    it('places every strip at its column offset', () => {
        const frame = new FrameBuffer(3, 1);
        frame.upload(twoStrips());

        expect(frame.getPixel(0, 0)).toEqual([10, 11, 12, 255]);
        expect(frame.getPixel(1, 0)).toEqual([20, 21, 22, 255]);
        expect(frame.getPixel(2, 0)).toEqual([30, 31, 32, 255]);
        expect(frame.getUploadCount()).toBe(1);
    });

    it('encodes a binary PPM without alpha', () => {
        const frame = new FrameBuffer(3, 1);
        frame.upload(twoStrips());

        const ppm = frame.toPPM();
        const header = 'P6\n3 1\n255\n';
        expect(ppm.subarray(0, header.length).toString('ascii')).toBe(header);
        expect(Array.from(ppm.subarray(header.length))).toEqual([10, 11, 12, 20, 21, 22, 30, 31, 32]);
    });

    it('rejects strips that do not fit', () => {
        const frame = new FrameBuffer(2, 1);
        expect(() => frame.upload(twoStrips())).toThrow(/does not fit/);
        expect(() => new FrameBuffer(0, 1)).toThrow(/positive integers/);
        expect(() => frame.getPixel(2, 0)).toThrow(/outside/);
    });

    it('clears pixels and the upload count', () => {
        const frame = new FrameBuffer(3, 1);
        frame.upload(twoStrips());
        frame.clear();

        expect(Array.from(frame.getPixels())).toEqual(new Array(12).fill(0));
        expect(frame.getUploadCount()).toBe(0);
        expect(frame.getDimensions()).toEqual({ width: 3, height: 1 });
    });
});

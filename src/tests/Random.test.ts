import { describe, expect, it } from 'vitest';
import { Rng, toSeed64 } from '../core/Random';

describe('Rng', () => {
    it('produces the reference xoshiro256+ stream for seed 0', () => {
        const rng = new Rng(0);
        expect(rng.nextU64()).toBe(0xdaac60e1ed6a4f9bn);
        expect(rng.nextU64()).toBe(0x3156a1da0dc08435n);
        expect(rng.nextU64()).toBe(0xf9ba3e3285d046abn);
    });

    it('maps the stream onto [0, 1)', () => {
        const rng = new Rng(0);
        expect(rng.uniformF64()).toBe(0.8541927863674711);
        expect(rng.uniformF64()).toBe(0.1927281529767715);
    });

    it('matches the bounded integer draw it is defined by', () => {
        const fast = new Rng(2024);
        const exact = new Rng(2024);
        const bound = (1n << 53n) - 2n;
        const divisor = 2 ** 53 - 1;

        for (let i = 0; i < 20_000; i++) {
            expect(fast.uniformF64()).toBe(Number(exact.boundedU64(bound)) / divisor);
        }
    });

    it('keeps uniformF64 inside [0, 1) over a million draws', () => {
        const rng = new Rng(12345);
        let min = Infinity;
        let max = -Infinity;
        let sum = 0;
        const draws = 1_000_000;

        for (let i = 0; i < draws; i++) {
            const x = rng.uniformF64();
            if (x < min) min = x;
            if (x > max) max = x;
            sum += x;
        }

        expect(min).toBeGreaterThanOrEqual(0);
        expect(max).toBeLessThan(1);
        expect(sum / draws).toBeCloseTo(0.5, 2);
    });

    it('replays the same sequence for the same seed', () => {
        const a = new Rng(42n);
        const b = new Rng(42);
        for (let i = 0; i < 64; i++) {
            expect(a.nextU64()).toBe(b.nextU64());
        }
    });

    it('diverges for neighbouring seeds', () => {
        const a = new Rng(7);
        const b = new Rng(8);
        const first = Array.from({ length: 64 }, () => a.nextU64());
        const second = Array.from({ length: 64 }, () => b.nextU64());

        expect(first).not.toEqual(second);
        expect(first.filter((value, i) => value === second[i])).toHaveLength(0);
    });

    it('samples bounded integers without leaving the range', () => {
        const rng = new Rng(0);
        expect([0, 1, 2, 3, 4].map(() => rng.boundedU64(10n))).toEqual([8n, 1n, 9n, 3n, 2n]);

        const counts = new Array<number>(6).fill(0);
        for (let i = 0; i < 6000; i++) {
            const value = Number(rng.boundedU64(6n));
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(6);
            counts[value]++;
        }
        for (const count of counts) {
            expect(count).toBeGreaterThan(800);
        }

        expect(rng.boundedU64(1n)).toBe(0n);
        expect(() => rng.boundedU64(0n)).toThrow();
    });

    it('scales uniformF64Range into [lo, hi)', () => {
        const rng = new Rng(3);
        for (let i = 0; i < 1000; i++) {
            const x = rng.uniformF64Range(-2, 5);
            expect(x).toBeGreaterThanOrEqual(-2);
            expect(x).toBeLessThan(5);
        }
    });

    it('rejects seeds that are not 64-bit unsigned integers', () => {
        expect(() => toSeed64(-1)).toThrow();
        expect(() => toSeed64(1.5)).toThrow();
        expect(() => toSeed64(-1n)).toThrow();
        expect(toSeed64((1n << 64n) + 5n)).toBe(5n);
    });
});

import { describe, expect, it } from 'vitest';
import { PerformanceMonitor } from '../utils/PerformanceMonitor';

describe('PerformanceMonitor', () => {
    it('summarises tick times and throughput', () => {
        const monitor = new PerformanceMonitor(100);
        monitor.recordTick({ durationMs: 10, completedPasses: 1 });
        monitor.recordTick({ durationMs: 30, completedPasses: 2 });
        monitor.recordTick({ durationMs: 0, completedPasses: 2 });

        const stats = monitor.getStats();
        expect(stats.tickTime).toEqual({ current: 30, average: 20, min: 10, max: 30 });
        expect(stats.ticks).toBe(3);
        expect(stats.elapsedMs).toBe(40);
        expect(stats.completedPasses).toBe(2);
        expect(stats.passesPerSecond).toBeCloseTo(50, 9);
        expect(stats.samplesPerSecond).toBeCloseTo(5000, 6);
    });

    it('keeps a sliding window of tick times', () => {
        const monitor = new PerformanceMonitor(1);
        for (let ms = 1; ms <= 121; ms++) {
            monitor.recordTick({ durationMs: ms, completedPasses: ms });
        }

        const stats = monitor.getStats();
        expect(stats.tickTime.min).toBe(2);
        expect(stats.tickTime.max).toBe(121);
        expect(stats.ticks).toBe(121);
    });

    it('reports zeros before the first tick and after a reset', () => {
        const monitor = new PerformanceMonitor(10);
        expect(monitor.getStats().passesPerSecond).toBe(0);

        monitor.recordTick({ durationMs: 5, completedPasses: 1 });
        monitor.reset();

        const stats = monitor.getStats();
        expect(stats.tickTime).toEqual({ current: 0, average: 0, min: 0, max: 0 });
        expect(stats.ticks).toBe(0);
        expect(stats.completedPasses).toBe(0);
    });
});

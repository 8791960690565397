import { Logger } from './Logger';
import { TICK_CONFIG } from './Constants';

export interface TickSample {
    durationMs: number;
    completedPasses: number;    // Passes complete on every strip after the tick
}

export interface PerformanceStats {
    tickTime: {
        current: number;
        average: number;
        min: number;
        max: number;
    };
    ticks: number;
    completedPasses: number;
    elapsedMs: number;
    passesPerSecond: number;
    samplesPerSecond: number;
}

/**
 * 📊 PerformanceMonitor - tick timing and throughput
 *
 * Tracks:
 * - Tick duration (current, min, max, average over a sliding window)
 * - Passes completed on every strip
 * - Samples (camera rays) per second across the whole image
 */
export class PerformanceMonitor {
    private logger: Logger;

    // ===== PERFORMANCE DATA =====
    private tickTimes: number[] = [];
    private maxTickHistory: number = TICK_CONFIG.MAX_TICK_HISTORY;
    private totalTicks: number = 0;
    private totalElapsedMs: number = 0;
    private completedPasses: number = 0;
    private pixelCount: number;

    constructor(pixelCount: number) {
        this.logger = Logger.getInstance();
        this.pixelCount = pixelCount;
    }

    /**
     * ⏱️ Record one finished tick
     */
    public recordTick(sample: TickSample): void {
        // Zero-length ticks are timer artefacts
        if (sample.durationMs > 0) {
            this.tickTimes.push(sample.durationMs);

            if (this.tickTimes.length > this.maxTickHistory) {
                this.tickTimes.shift();
            }
        }

        this.totalTicks++;
        this.totalElapsedMs += Math.max(0, sample.durationMs);
        this.completedPasses = Math.max(this.completedPasses, sample.completedPasses);
    }

    public getStats(): PerformanceStats {
        const times = this.tickTimes;

        const current = times.length > 0 ? times[times.length - 1] : 0;
        const average = times.length > 0 ? times.reduce((a, b) => a + b, 0) / times.length : 0;
        const min = times.length > 0 ? Math.min(...times) : 0;
        const max = times.length > 0 ? Math.max(...times) : 0;

        const seconds = this.totalElapsedMs / 1000;
        const passesPerSecond = seconds > 0 ? this.completedPasses / seconds : 0;

        return {
            tickTime: { current, average, min, max },
            ticks: this.totalTicks,
            completedPasses: this.completedPasses,
            elapsedMs: this.totalElapsedMs,
            passesPerSecond,
            samplesPerSecond: passesPerSecond * this.pixelCount
        };
    }

    /**
     * 📋 Print detailed statistics
     */
    public logDetailedStats(): void {
        const stats = this.getStats();

        this.logger.info('='.repeat(50));
        this.logger.info('📊 RENDER STATISTICS');
        this.logger.info('='.repeat(50));
        this.logger.info(`Ticks:                ${stats.ticks}`);
        this.logger.info(`Passes (all strips):  ${stats.completedPasses}`);
        this.logger.info(`Elapsed:              ${(stats.elapsedMs / 1000).toFixed(2)}s`);
        this.logger.info(`Tick time (avg):      ${stats.tickTime.average.toFixed(2)}ms`);
        this.logger.info(`Tick time (min/max):  ${stats.tickTime.min.toFixed(2)}ms / ${stats.tickTime.max.toFixed(2)}ms`);
        this.logger.info(`Passes/s:             ${stats.passesPerSecond.toFixed(2)}`);
        this.logger.info(`Samples/s:            ${Math.round(stats.samplesPerSecond).toLocaleString('en-US')}`);
        this.logger.info('='.repeat(50));
    }

    public reset(): void {
        this.tickTimes = [];
        this.totalTicks = 0;
        this.totalElapsedMs = 0;
        this.completedPasses = 0;
    }
}

// src/core/RaytracerApp.ts - progressive path tracer session

import { writeFile } from 'node:fs/promises';
import type { Scene } from '../scene/Scene';
import type { RenderOptions, RenderOptionsInput } from './RenderOptions';
import { RenderCoordinator, now, type TickResult } from '../rendering/RenderCoordinator';
import { FrameBuffer } from '../rendering/FrameBuffer';
import { InlineStripChannel } from '../rendering/InlineStripChannel';
import { ThreadedStripChannel } from '../rendering/ThreadedStripChannel';
import type { StripLayout } from '../rendering/StripBuffer';
import { PerformanceMonitor } from '../utils/PerformanceMonitor';
import { Logger } from '../utils/Logger';
import { TICK_CONFIG } from '../utils/Constants';

export interface AppConfig {
    render: RenderOptionsInput;
    threaded: boolean;          // Worker thread per strip; off renders inline on the main thread
    frameBudgetMs: number;
}

export interface RunLimits {
    passes?: number;            // Stop once this many passes are complete everywhere
    timeLimitMs?: number;       // Stop after this much wall-clock time
}

export class RaytracerApp {
    private readonly config: AppConfig;
    private readonly scene: Scene;
    private coordinator: RenderCoordinator | null = null;
    private frameBuffer: FrameBuffer | null = null;
    private performanceMonitor: PerformanceMonitor | null = null;

    private logger: Logger;
    private initialized: boolean = false;

    constructor(scene: Scene, config: Partial<AppConfig> = {}) {
        this.logger = Logger.getInstance();
        this.scene = scene;
        this.config = {
            render: config.render ?? {},
            threaded: config.threaded ?? false,
            frameBudgetMs: config.frameBudgetMs ?? TICK_CONFIG.FRAME_BUDGET_MS,
        };

        if (!Number.isFinite(this.config.frameBudgetMs) || this.config.frameBudgetMs < 0) {
            throw new Error(`Frame budget must be a non-negative number of milliseconds, got ${this.config.frameBudgetMs}`);
        }
    }

    public initialize(): void {
        if (this.initialized) {
            return;
        }

        try {
            this.coordinator = RenderCoordinator.create(
                this.scene,
                this.config.render,
                this.config.threaded ? ThreadedStripChannel.create : InlineStripChannel.create
            );

            const width = this.coordinator.getImageWidth();
            const height = this.coordinator.getImageHeight();
            this.frameBuffer = new FrameBuffer(width, height);
            this.performanceMonitor = new PerformanceMonitor(width * height);

            this.initialized = true;
            this.logger.success(`Renderer running (${this.config.threaded ? 'worker threads' : 'inline'})`);
        } catch (error) {
            this.logger.error('Initialization failed:', error);
            throw error;
        }
    }

    private requireCoordinator(): RenderCoordinator {
        if (!this.initialized || !this.coordinator) {
            throw new Error('App not initialized');
        }
        return this.coordinator;
    }

    private requireFrameBuffer(): FrameBuffer {
        if (!this.frameBuffer) {
            throw new Error('App not initialized');
        }
        return this.frameBuffer;
    }

    private requireMonitor(): PerformanceMonitor {
        if (!this.performanceMonitor) {
            throw new Error('App not initialized');
        }
        return this.performanceMonitor;
    }

    /**
     * One host frame: render for the frame budget, then upload every strip.
     */
    public async renderFrame(budgetMs: number = this.config.frameBudgetMs): Promise<TickResult> {
        const coordinator = this.requireCoordinator();
        const start = now();

        const result = await coordinator.render(start + budgetMs);
        this.requireFrameBuffer().upload(coordinator.getStrips());

        const monitor = this.requireMonitor();
        monitor.recordTick({ durationMs: now() - start, completedPasses: coordinator.getCompletedPasses() });

        if (result.tick % TICK_CONFIG.STATS_INTERVAL === 0) {
            const stats = monitor.getStats();
            this.logger.info(`${stats.completedPasses} passes after ${result.tick} ticks (${stats.passesPerSecond.toFixed(2)} passes/s)`);
        }

        return result;
    }

    /**
     * Renders frames until a limit is hit. At least one limit is required.
     */
    public async run(limits: RunLimits): Promise<number> {
        const coordinator = this.requireCoordinator();
        const { passes, timeLimitMs } = limits;

        if (passes === undefined && timeLimitMs === undefined) {
            throw new Error('run() needs a pass target or a time limit');
        }
        if (passes !== undefined && (!Number.isInteger(passes) || passes < 1)) {
            throw new Error(`Pass target must be a positive integer, got ${passes}`);
        }

        const stopAt = timeLimitMs === undefined ? Infinity : now() + timeLimitMs;

        while (now() < stopAt) {
            if (passes !== undefined && coordinator.getCompletedPasses() >= passes) {
                break;
            }
            await this.renderFrame();
        }

        return coordinator.getCompletedPasses();
    }

    public async saveImage(outputPath: string): Promise<void> {
        const frameBuffer = this.requireFrameBuffer();
        frameBuffer.upload(this.requireCoordinator().getStrips());
        await writeFile(outputPath, frameBuffer.toPPM());
        this.logger.success(`Image written to ${outputPath}`);
    }

    // ===== ACCESSORS =====

    public getOptions(): RenderOptions {
        return this.requireCoordinator().getOptions();
    }

    public getImageSize(): { width: number; height: number } {
        return this.requireFrameBuffer().getDimensions();
    }

    public getStripLayouts(): StripLayout[] {
        return this.requireCoordinator().getStrips().map(strip => strip.layout);
    }

    public getSphereCount(): number {
        return this.scene.getSphereCount();
    }

    public isThreaded(): boolean {
        return this.config.threaded;
    }

    public getFrameBuffer(): FrameBuffer {
        return this.requireFrameBuffer();
    }

    public getCoordinator(): RenderCoordinator {
        return this.requireCoordinator();
    }

    public getPerformanceMonitor(): PerformanceMonitor {
        return this.requireMonitor();
    }

    public async cleanup(): Promise<void> {
        if (this.coordinator) {
            await this.coordinator.shutdown();
            this.coordinator = null;
        }

        this.frameBuffer = null;
        this.performanceMonitor = null;
        this.initialized = false;
    }
}

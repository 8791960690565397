import { setTimeout as sleep } from 'node:timers/promises';
import { Camera } from '../core/Camera';
import { resolveRenderOptions, type RenderOptions, type RenderOptionsInput } from '../core/RenderOptions';
import type { Scene } from '../scene/Scene';
import { InlineStripChannel } from './InlineStripChannel';
import { PauseFlag } from './PauseFlag';
import { partitionStrips, type StripBuffer, type StripLayout } from './StripBuffer';
import type { StripChannel, StripChannelFactory } from './StripChannel';
import { Logger } from '../utils/Logger';

export interface TickResult {
    tick: number;
    targetPasses: number;       // Target that was requested during this tick
    reportedPasses: number[];   // Per strip, in strip order
    advanced: boolean;          // Every strip reached the target
}

export interface StripView {
    layout: StripLayout;
    buffer: StripBuffer;
}

/**
 * Wall-clock time in milliseconds, on the same clock as `render(deadline)`.
 */
export function now(): number {
    return performance.now();
}

/**
 * RenderCoordinator - pass-synchronised, time-boxed driver of the strip workers
 *
 * Each `render(deadline)` tick hands every strip the current target pass count,
 * lets them work until the deadline, pauses them at their next row boundary and
 * collects their pass counts. The target only moves on once every strip has
 * reached it, so all strips refine in lock-step.
 */
export class RenderCoordinator {
    private readonly options: RenderOptions;
    private readonly camera: Camera;
    private readonly channels: StripChannel[];
    private readonly pause: PauseFlag;
    private readonly logger: Logger;

    private targetPasses: number = 1;
    private tickCount: number = 0;
    private rendering: boolean = false;
    private shutDown: boolean = false;
    private failure: unknown = null;    // First strip failure; fatal for the session

    private constructor(options: RenderOptions, camera: Camera, channels: StripChannel[], pause: PauseFlag) {
        this.options = options;
        this.camera = camera;
        this.channels = channels;
        this.pause = pause;
        this.logger = Logger.getInstance();
    }

    /**
     * Freezes the scene, validates the options and starts one channel per strip.
     *
     * Without a `channelFactory` every strip renders inline on the calling
     * thread. Pass `ThreadedStripChannel.create` to give each strip its own
     * worker thread (needs the built `strip.worker.js`).
     */
    public static create(
        scene: Scene,
        input: RenderOptionsInput = {},
        channelFactory: StripChannelFactory = InlineStripChannel.create
    ): RenderCoordinator {
        const options = resolveRenderOptions(input);
        scene.freeze();

        const camera = new Camera(options);
        const pause = new PauseFlag();
        const layouts = partitionStrips(camera.getImageWidth(), camera.getImageHeight(), options.workerCount);

        const channels: StripChannel[] = [];
        try {
            for (const layout of layouts) {
                channels.push(channelFactory({ scene, options, layout, pause }));
            }
        } catch (error) {
            for (const channel of channels) {
                channel.terminate().catch(terminateError => {
                    Logger.getInstance().error(`Failed to stop strip ${channel.layout.index}`, terminateError);
                });
            }
            throw error;
        }

        Logger.getInstance().init(
            `Coordinator ready: ${camera.getImageWidth()}x${camera.getImageHeight()} px, ` +
            `${channels.length} strip(s), ${scene.getSphereCount()} spheres, max depth ${options.maxDepth}`
        );

        return new RenderCoordinator(options, camera, channels, pause);
    }

    /**
     * One coordination tick. Returns once every strip has stopped at or after
     * `deadline` (a `now()` timestamp). A deadline in the past still renders at
     * least one row per strip that is short of the target.
     *
     * A strip failure is fatal: the other strips are paused and drained, the
     * failure is rethrown, and every later tick rethrows the same error.
     */
    public async render(deadline: number): Promise<TickResult> {
        if (this.failure !== null) {
            throw this.failure;
        }
        if (this.shutDown) {
            throw new Error('RenderCoordinator has been shut down');
        }
        if (this.rendering) {
            throw new Error('render() called while a previous tick is still running');
        }

        this.rendering = true;
        const tick = ++this.tickCount;
        const targetPasses = this.targetPasses;

        try {
            const reports = this.channels.map(channel => channel.requestPasses(targetPasses));
            // Rejections are awaited below; keep them from surfacing as unhandled meanwhile
            for (const report of reports) {
                report.catch(() => undefined);
            }

            const remaining = deadline - now();
            if (remaining > 0) {
                await sleep(remaining);
            }

            this.pause.set();

            let reportedPasses: number[];
            try {
                reportedPasses = await Promise.all(reports);
            } catch (error) {
                this.failure = error;
                this.logger.error(`Tick ${tick} failed, render pipeline stalled`, error);
                // Surviving strips see the pause flag at their next row
                await Promise.allSettled(reports);
                throw error;
            }

            const advanced = reportedPasses.every(passes => passes >= targetPasses);
            if (advanced) {
                this.targetPasses++;
            }

            this.logger.tick(tick, `target ${targetPasses}, strips at [${reportedPasses.join(', ')}]${advanced ? ' -> advanced' : ''}`);

            return { tick, targetPasses, reportedPasses, advanced };
        } finally {
            if (this.failure === null) {
                this.pause.clear();
            }
            this.rendering = false;
        }
    }

    public getImageWidth(): number {
        return this.camera.getImageWidth();
    }

    public getImageHeight(): number {
        return this.camera.getImageHeight();
    }

    public getOptions(): RenderOptions {
        return this.options;
    }

    /**
     * Next target pass count. Passes below it are complete on every strip.
     */
    public getTargetPasses(): number {
        return this.targetPasses;
    }

    public getCompletedPasses(): number {
        return this.targetPasses - 1;
    }

    public getTickCount(): number {
        return this.tickCount;
    }

    public getStrips(): StripView[] {
        return this.channels.map(channel => ({ layout: channel.layout, buffer: channel.buffer }));
    }

    public getChannels(): readonly StripChannel[] {
        return this.channels;
    }

    public async shutdown(): Promise<void> {
        if (this.shutDown) return;
        this.shutDown = true;
        await Promise.all(this.channels.map(channel => channel.terminate()));
        this.logger.info(`Coordinator shut down after ${this.tickCount} ticks`);
    }
}

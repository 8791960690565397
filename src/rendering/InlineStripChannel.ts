import type { PauseFlag } from './PauseFlag';
import { StripBuffer, type StripLayout } from './StripBuffer';
import type { StripChannel, StripChannelContext } from './StripChannel';
import { ViewWorker } from './ViewWorker';
import { StripWorkerError } from '../utils/Errors';

/**
 * Runs a strip's view worker on the calling thread, one row per event-loop turn.
 *
 * Same protocol as the threaded channel: at least one row per request, pause
 * polled at every row boundary. The coordinator's deadline timer gets to run
 * between rows, so this works without any extra thread.
 */
export class InlineStripChannel implements StripChannel {
    readonly layout: StripLayout;
    readonly buffer: StripBuffer;
    private readonly viewWorker: ViewWorker;
    private readonly pause: PauseFlag;
    private pending: boolean = false;
    private terminated: boolean = false;

    constructor(context: StripChannelContext) {
        this.layout = context.layout;
        this.buffer = new StripBuffer(context.layout);
        this.pause = context.pause;
        this.viewWorker = new ViewWorker(context.scene, context.options, this.buffer);
    }

    public static create(context: StripChannelContext): InlineStripChannel {
        return new InlineStripChannel(context);
    }

    public requestPasses(passesWanted: number): Promise<number> {
        if (this.terminated) {
            return Promise.reject(new StripWorkerError(this.layout.index, 'channel already terminated'));
        }
        if (this.pending) {
            return Promise.reject(new StripWorkerError(this.layout.index, 'previous request still outstanding'));
        }

        this.pending = true;

        return new Promise<number>((resolve, reject) => {
            const finish = (): void => {
                this.pending = false;
                resolve(this.viewWorker.getRenderPasses());
            };

            const step = (): void => {
                try {
                    if (this.terminated || this.viewWorker.getRenderPasses() >= passesWanted) {
                        finish();
                        return;
                    }

                    this.viewWorker.renderRow();

                    if (this.viewWorker.getRenderPasses() >= passesWanted || this.pause.isSet()) {
                        finish();
                    } else {
                        setImmediate(step);
                    }
                } catch (error) {
                    this.pending = false;
                    reject(new StripWorkerError(this.layout.index, 'render failed', error));
                }
            };

            setImmediate(step);
        });
    }

    public async terminate(): Promise<void> {
        this.terminated = true;
    }
}

import path from 'node:path';
import { Worker } from 'node:worker_threads';
import { StripBuffer, type StripLayout } from './StripBuffer';
import {
    isStripWorkerReply,
    type RenderRequest,
    type StripChannel,
    type StripChannelContext,
    type StripWorkerInit
} from './StripChannel';
import { StripWorkerError } from '../utils/Errors';
import { Logger } from '../utils/Logger';
import { WORKER_CONFIG } from '../utils/Constants';

interface PendingRequest {
    resolve: (renderPasses: number) => void;
    reject: (error: Error) => void;
}

/**
 * Compiled worker entry next to this module. Only exists after `npm run build`.
 */
export function defaultWorkerScript(): string {
    return path.join(__dirname, WORKER_CONFIG.SCRIPT);
}

/**
 * ThreadedStripChannel - one OS thread per strip
 *
 * The display buffer and the pause flag live in SharedArrayBuffers, so the
 * worker writes pixels the coordinator can read without copying. Requests and
 * reports are plain messages; a dead worker fails the pending request.
 */
export class ThreadedStripChannel implements StripChannel {
    readonly layout: StripLayout;
    readonly buffer: StripBuffer;
    private readonly worker: Worker;
    private readonly logger: Logger;
    private pending: PendingRequest | null = null;
    private failure: StripWorkerError | null = null;
    private terminating: boolean = false;

    constructor(context: StripChannelContext, scriptPath: string = defaultWorkerScript()) {
        this.logger = Logger.getInstance();
        this.layout = context.layout;
        this.buffer = new StripBuffer(context.layout);

        const init: StripWorkerInit = {
            layout: context.layout,
            options: context.options,
            scene: context.scene.toDescriptor(),
            pixels: this.buffer.shared,
            pause: context.pause.shared
        };

        this.worker = new Worker(scriptPath, { workerData: init });
        this.worker.on('message', (message: unknown) => this.handleMessage(message));
        this.worker.on('error', (error: Error) => this.fail(new StripWorkerError(this.layout.index, 'crashed', error)));
        this.worker.on('exit', (code: number) => {
            if (!this.terminating) {
                this.fail(new StripWorkerError(this.layout.index, `exited unexpectedly with code ${code}`));
            }
        });

        this.logger.worker(this.layout.index, `Thread started for columns ${this.layout.offsetX}..${this.layout.offsetX + this.layout.width - 1}`);
    }

    public static create(context: StripChannelContext): ThreadedStripChannel {
        return new ThreadedStripChannel(context);
    }

    public requestPasses(passesWanted: number): Promise<number> {
        if (this.failure) {
            return Promise.reject(this.failure);
        }
        if (this.terminating) {
            return Promise.reject(new StripWorkerError(this.layout.index, 'channel already terminated'));
        }
        if (this.pending) {
            return Promise.reject(new StripWorkerError(this.layout.index, 'previous request still outstanding'));
        }

        return new Promise<number>((resolve, reject) => {
            this.pending = { resolve, reject };
            const request: RenderRequest = { type: 'render', passesWanted };
            this.worker.postMessage(request);
        });
    }

    public async terminate(): Promise<void> {
        if (this.terminating) return;
        this.terminating = true;

        if (this.pending) {
            this.pending.reject(new StripWorkerError(this.layout.index, 'terminated with a request outstanding'));
            this.pending = null;
        }

        await this.worker.terminate();
        this.logger.worker(this.layout.index, 'Thread stopped');
    }

    private handleMessage(message: unknown): void {
        if (!isStripWorkerReply(message)) {
            this.fail(new StripWorkerError(this.layout.index, `sent an unknown message: ${JSON.stringify(message)}`));
            return;
        }

        if (message.type === 'failure') {
            const cause = new Error(message.message);
            if (message.stack) cause.stack = message.stack;
            this.fail(new StripWorkerError(this.layout.index, 'render failed', cause));
            return;
        }

        const pending = this.pending;
        if (!pending) {
            this.logger.warning(`Strip ${this.layout.index} reported ${message.renderPasses} passes without a request`);
            return;
        }

        this.pending = null;
        pending.resolve(message.renderPasses);
    }

    private fail(error: StripWorkerError): void {
        if (!this.failure) {
            this.failure = error;
            this.logger.error(error.message);
        }

        if (this.pending) {
            this.pending.reject(error);
            this.pending = null;
        }
    }
}

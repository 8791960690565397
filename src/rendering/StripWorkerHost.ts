import type { MessagePort } from 'node:worker_threads';
import { Scene } from '../scene/Scene';
import { PauseFlag } from './PauseFlag';
import { StripBuffer } from './StripBuffer';
import { isRenderRequest, type StripWorkerInit, type StripWorkerReply } from './StripChannel';
import { ViewWorker } from './ViewWorker';

/**
 * Answers render requests arriving on `port` with reports from one view worker.
 *
 * Runs inside a strip's worker thread on `parentPort`. Anything that is not a
 * render request is ignored; a render error goes back as a `failure` reply.
 */
export function serveStripRequests(port: MessagePort, init: StripWorkerInit): void {
    const scene = Scene.fromDescriptor(init.scene);
    const buffer = new StripBuffer(init.layout, init.pixels);
    const pause = new PauseFlag(init.pause);
    const viewWorker = new ViewWorker(scene, init.options, buffer);

    port.on('message', (message: unknown) => {
        if (!isRenderRequest(message)) {
            return;
        }

        let reply: StripWorkerReply;
        try {
            const renderPasses = viewWorker.renderPasses(message.passesWanted, pause);
            reply = { type: 'report', stripIndex: init.layout.index, renderPasses };
        } catch (error) {
            const failure = error instanceof Error ? error : new Error(String(error));
            reply = { type: 'failure', stripIndex: init.layout.index, message: failure.message, stack: failure.stack };
        }

        port.postMessage(reply);
    });
}

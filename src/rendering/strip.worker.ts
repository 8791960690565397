import { parentPort, workerData } from 'node:worker_threads';
import { isStripWorkerInit } from './StripChannel';
import { serveStripRequests } from './StripWorkerHost';

// Worker-thread entry: owns one strip and answers render requests.

const port = parentPort;
if (!port) {
    throw new Error('strip.worker must be started as a worker thread');
}

const init: unknown = workerData;
if (!isStripWorkerInit(init)) {
    throw new Error('strip.worker started without valid init data');
}

serveStripRequests(port, init);

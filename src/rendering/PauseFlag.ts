import { WORKER_CONFIG } from '../utils/Constants';

/**
 * Advisory pause signal shared by the coordinator and every strip worker.
 * Workers poll it once per row, so a stale read only costs one extra row.
 */
export class PauseFlag {
    readonly shared: SharedArrayBuffer;
    private readonly word: Int32Array;

    constructor(shared?: SharedArrayBuffer) {
        this.shared = shared ?? new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
        this.word = new Int32Array(this.shared, 0, 1);
    }

    public set(): void {
        Atomics.store(this.word, 0, WORKER_CONFIG.PAUSE_SET);
    }

    public clear(): void {
        Atomics.store(this.word, 0, WORKER_CONFIG.PAUSE_CLEAR);
    }

    public isSet(): boolean {
        return Atomics.load(this.word, 0) === WORKER_CONFIG.PAUSE_SET;
    }
}

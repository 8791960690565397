/**
 * Error that wraps a lower-level failure and keeps its stack below our own.
 */
export class RethrownError extends Error {
    readonly originalError: Error | null;

    constructor(message: string, error?: unknown) {
        super(message);
        this.name = this.constructor.name;
        this.originalError = error instanceof Error ? error : null;

        if (this.originalError) {
            const messageLines = (this.message.match(/\n/g) || []).length + 1;
            this.stack =
                this.stack
                    ?.split('\n')
                    .slice(0, messageLines + 1)
                    .join('\n') +
                '\n' +
                this.originalError.stack;
        } else if (error !== undefined) {
            this.message = `${message}: ${String(error)}`;
        }
    }
}

/**
 * A strip worker failed or went away. Fatal for the render session.
 */
export class StripWorkerError extends RethrownError {
    readonly stripIndex: number;

    constructor(stripIndex: number, message: string, error?: unknown) {
        super(`Strip worker ${stripIndex}: ${message}`, error);
        this.stripIndex = stripIndex;
    }
}

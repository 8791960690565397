import { describe, expect, it } from 'vitest';
import { RethrownError, StripWorkerError } from '../utils/Errors';

describe('RethrownError', () => {
    it('keeps the wrapped error and its stack', () => {
        const inner = new Error('inner failure');
        const error = new StripWorkerError(2, 'render failed', inner);

        expect(error).toBeInstanceOf(RethrownError);
        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('StripWorkerError');
        expect(error.message).toBe('Strip worker 2: render failed');
        expect(error.stripIndex).toBe(2);
        expect(error.originalError).toBe(inner);
        expect(error.stack).toContain('inner failure');
    });

    it('folds non-Error causes into the message', () => {
        const error = new RethrownError('load failed', 'disk on fire');
        expect(error.message).toBe('load failed: disk on fire');
        expect(error.originalError).toBeNull();
    });

    it('leaves the message alone without a cause', () => {
        expect(new StripWorkerError(0, 'gone').message).toBe('Strip worker 0: gone');
    });
});

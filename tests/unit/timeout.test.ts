import { describe, it, expect } from 'vitest';
import { isTimeoutError, TimeoutError, withTimeout } from '../../src/utils/timeout';

describe('withTimeout', () => {
    it('resolves with the task result', async () => {
        await expect(withTimeout('fast call', 1000, async () => 'done')).resolves.toBe('done');
    });

    it('rejects with TimeoutError and aborts the signal', async () => {
        let observed: AbortSignal | undefined;

        const pending = withTimeout('slow call', 20, (signal) => {
            observed = signal;
            return new Promise<string>(() => undefined);
        });

        await expect(pending).rejects.toThrow('slow call timed out after 20ms');
        expect(observed?.aborted).toBe(true);
    });

    it('passes task errors through', async () => {
        await expect(withTimeout('failing call', 1000, async () => {
            throw new Error('provider error');
        })).rejects.toThrow('provider error');
    });
});

describe('isTimeoutError', () => {
    it('recognises timeouts and aborts', () => {
        const aborted = new Error('The operation was aborted');
        aborted.name = 'AbortError';

        expect(isTimeoutError(new TimeoutError('call', 10))).toBe(true);
        expect(isTimeoutError(aborted)).toBe(true);
        expect(isTimeoutError(new Error('other'))).toBe(false);
        expect(isTimeoutError('timeout')).toBe(false);
    });
});

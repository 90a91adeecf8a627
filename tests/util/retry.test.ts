import { describe, it, expect, vi } from 'vitest';
import { withRetry } from '@/util/retry';
import { ProviderRejectedError, TransientNetworkError } from '@/errors';

const noSleep = () => Promise.resolve();

describe('withRetry', () => {
    it('returns the first successful result', async () => {
        const fn = vi.fn().mockResolvedValue('ok');
        await expect(withRetry(fn, { sleep: noSleep })).resolves.toBe('ok');
        expect(fn).toHaveBeenCalledTimes(1);
    });

    it('retries transient errors with exponential backoff', async () => {
        const fn = vi.fn()
            .mockRejectedValueOnce(new TransientNetworkError('reset'))
            .mockRejectedValueOnce(new TransientNetworkError('reset'))
            .mockResolvedValue('done');
        const delays: number[] = [];

        const result = await withRetry(fn, {
            maxAttempts: 3,
            baseDelayMs: 100,
            random: () => 0.5,
            sleep: async (ms) => {
                delays.push(ms);
            },
        });

        expect(result).toBe('done');
        expect(delays).toEqual([100, 200]);
    });

    it('gives up after maxAttempts', async () => {
        const fn = vi.fn().mockRejectedValue(new TransientNetworkError('still down'));
        await expect(withRetry(fn, { maxAttempts: 2, sleep: noSleep })).rejects.toThrow('still down');
        expect(fn).toHaveBeenCalledTimes(2);
    });

    it('does not retry errors that are not transient', async () => {
        const fn = vi.fn().mockRejectedValue(new ProviderRejectedError('bad request'));
        const onRetry = vi.fn();
        await expect(withRetry(fn, { sleep: noSleep, onRetry })).rejects.toThrow('bad request');
        expect(fn).toHaveBeenCalledTimes(1);
        expect(onRetry).not.toHaveBeenCalled();
    });

    it('honours a retry-after header', async () => {
        const rateLimited = Object.assign(new Error('Too Many Requests'), { status: 429, headers: { 'retry-after': '2' } });
        const fn = vi.fn().mockRejectedValueOnce(rateLimited).mockResolvedValue('ok');
        const onRetry = vi.fn();

        await withRetry(fn, { sleep: noSleep, onRetry });

        expect(onRetry).toHaveBeenCalledWith(1, rateLimited, 2000);
    });
});

import { describe, it, expect, vi } from 'vitest';
import { withRetry } from '../retry.js';

class Flaky extends Error {}

describe('withRetry', () => {
    it('returns the first success', async () => {
        const fn = vi.fn()
            .mockRejectedValueOnce(new Flaky('once'))
            .mockResolvedValueOnce('ok');

        await expect(withRetry(fn, { retries: 3, baseDelayMs: 0, shouldRetry: () => true })).resolves.toBe('ok');
        expect(fn).toHaveBeenCalledTimes(2);
    });

    it('gives up after the configured retries with the last error', async () => {
        const fn = vi.fn()
            .mockRejectedValueOnce(new Flaky('first'))
            .mockRejectedValueOnce(new Flaky('second'))
            .mockRejectedValueOnce(new Flaky('third'));

        await expect(withRetry(fn, { retries: 2, baseDelayMs: 0, shouldRetry: () => true })).rejects.toThrow('third');
        expect(fn).toHaveBeenCalledTimes(3);
    });

    it('does not retry errors the predicate rejects', async () => {
        const fn = vi.fn().mockRejectedValue(new TypeError('bug'));

        await expect(withRetry(fn, {
            retries: 5,
            baseDelayMs: 0,
            shouldRetry: (error) => error instanceof Flaky,
        })).rejects.toThrow(TypeError);
        expect(fn).toHaveBeenCalledTimes(1);
    });

    it('doubles the delay on every attempt', async () => {
        const delays: number[] = [];
        const fn = vi.fn().mockRejectedValue(new Flaky('down'));

        await expect(withRetry(fn, {
            retries: 3,
            baseDelayMs: 1,
            shouldRetry: () => true,
            onRetry: (_error, attempt, delayMs) => delays.push(attempt * 1000 + delayMs),
        })).rejects.toThrow('down');

        expect(delays).toEqual([1001, 2002, 3004]);
    });
});

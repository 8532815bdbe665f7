import { describe, it, expect } from 'vitest';
import { promisePool } from '../promise-pool.js';

const wait = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('promisePool', () => {
    it('keeps input order when items finish out of order', async () => {
        const delays = [30, 5, 15, 0];

        const results = await promisePool(delays, 4, async (ms, i) => {
            await wait(ms);
            return `item-${i}`;
        });

        expect(results).toEqual(['item-0', 'item-1', 'item-2', 'item-3']);
    });

    it('never runs more than the concurrency limit', async () => {
        let active = 0;
        let peak = 0;

        await promisePool([1, 2, 3, 4, 5, 6, 7], 3, async () => {
            active++;
            peak = Math.max(peak, active);
            await wait(5);
            active--;
        });

        expect(peak).toBe(3);
    });

    it('returns an empty array for no items', async () => {
        await expect(promisePool([], 4, async () => 1)).resolves.toEqual([]);
    });

    it('rethrows the first failure and stops taking new items', async () => {
        const started: number[] = [];

        const run = promisePool([0, 1, 2, 3, 4], 1, async (n) => {
            started.push(n);
            if (n === 1) {
                throw new Error('item 1 failed');
            }
            return n;
        });

        await expect(run).rejects.toThrow('item 1 failed');
        expect(started).toEqual([0, 1]);
    });
});

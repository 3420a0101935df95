import { describe, expect, it } from 'vitest';
import { mapWithConcurrency } from '../../src/traversal/pool.js';

function tick(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('mapWithConcurrency', () => {
    it('keeps outcomes in item order and never exceeds the limit', async () => {
        let active = 0;
        let peak = 0;

        const outcomes = await mapWithConcurrency([30, 5, 20, 1, 10], 2, async (ms) => {
            active += 1;
            peak = Math.max(peak, active);
            await tick(ms);
            active -= 1;
            return ms * 2;
        });

        expect(outcomes).toEqual([60, 10, 40, 2, 20].map((value) => ({ status: 'fulfilled', value })));
        expect(peak).toBe(2);
    });

    it('records a failing item without stopping the others', async () => {
        const boom = new Error('boom');

        const outcomes = await mapWithConcurrency(['a', 'b', 'c'], 3, async (item) => {
            if (item === 'b') {
                throw boom;
            }
            return item.toUpperCase();
        });

        expect(outcomes).toEqual([
            { status: 'fulfilled', value: 'A' },
            { status: 'rejected', reason: boom },
            { status: 'fulfilled', value: 'C' },
        ]);
    });

    it('skips the remaining items once told to stop', async () => {
        let started = 0;

        const outcomes = await mapWithConcurrency(
            [1, 2, 3, 4],
            1,
            async (item) => {
                started += 1;
                return item;
            },
            () => started < 2
        );

        expect(outcomes).toEqual([
            { status: 'fulfilled', value: 1 },
            { status: 'fulfilled', value: 2 },
            { status: 'skipped' },
            { status: 'skipped' },
        ]);
    });

    it('returns nothing for no items', async () => {
        await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
    });
});

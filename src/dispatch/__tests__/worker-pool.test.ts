import { describe, it, expect } from 'vitest';
import { setTimeout as delay } from 'node:timers/promises';
import { mapWithConcurrency } from '../worker-pool.js';

describe('mapWithConcurrency', () => {
  it('keeps results in input order regardless of completion order', async () => {
    const results = await mapWithConcurrency([30, 10, 20], 3, async (ms, index) => {
      await delay(ms);
      return `${index}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:10', '2:20']);
  });

  it('never runs more than the given number of mappers at once', async () => {
    let active = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
    });

    expect(peak).toBe(2);
  });

  it('lets the other items finish before surfacing a rejection', async () => {
    const finished: number[] = [];

    await expect(
      mapWithConcurrency([1, 2, 3], 3, async (n) => {
        if (n === 1) throw new Error('boom');
        await delay(5);
        finished.push(n);
      }),
    ).rejects.toThrow('boom');

    expect(finished.sort()).toEqual([2, 3]);
  });

  it('returns an empty list for no items', async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});

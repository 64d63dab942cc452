import { describe, it, expect } from 'vitest';
import { mapPool } from '../pool';

const tick = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('mapPool', () => {
  it('returns results in input order', async () => {
    const results = await mapPool([30, 10, 20, 0], 2, async (ms, index) => {
      await tick(ms);
      return `${index}:${ms}`;
    });
    expect(results).toEqual(['0:30', '1:10', '2:20', '3:0']);
  });

  it('never exceeds the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    await mapPool([1, 2, 3, 4, 5, 6], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await tick(1);
      active--;
    });
    expect(peak).toBe(2);
  });

  it('handles an empty list', async () => {
    await expect(mapPool([], 4, async () => 1)).resolves.toEqual([]);
  });

  it('stops claiming items once asked to', async () => {
    const started: number[] = [];
    const results = await mapPool(
      ['a', 'b', 'c', 'd'],
      1,
      async (item, index) => {
        started.push(index);
        return item.toUpperCase();
      },
      {
        shouldStop: () => started.length >= 2,
        onSkipped: (item) => `skipped ${item}`,
      }
    );
    expect(started).toEqual([0, 1]);
    expect(results).toEqual(['A', 'B', 'skipped c', 'skipped d']);
  });

  it('requires onSkipped when it may stop early', async () => {
    await expect(
      mapPool([1, 2], 1, async (n) => n, { shouldStop: () => true })
    ).rejects.toThrow('pool stopped before item 0 and no onSkipped handler was given');
  });

  it('propagates task failures', async () => {
    await expect(
      mapPool([1, 2], 2, async (n) => {
        if (n === 2) throw new Error('boom');
        return n;
      })
    ).rejects.toThrow('boom');
  });

  it('stops claiming items after a task fails', async () => {
    const started: number[] = [];
    await expect(
      mapPool([1, 2, 3, 4, 5], 2, async (n, index) => {
        started.push(index);
        if (n === 2) throw new Error('boom');
        await tick(5);
        return n;
      })
    ).rejects.toThrow('boom');
    await tick(20);
    expect(started).toEqual([0, 1]);
  });

  it('validates concurrency', async () => {
    await expect(mapPool([1], 0, async (n) => n)).rejects.toThrow(RangeError);
  });
});

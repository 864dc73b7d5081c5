import { describe, it, expect } from 'vitest';
import { runBounded } from '@/lib/pool.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('runBounded', () => {
  it('should keep input order regardless of completion order', async () => {
    const results = await runBounded([30, 10, 20], 3, async (ms) => {
      await new Promise((r) => setTimeout(r, ms));
      return ms * 2;
    });

    expect(results).toEqual([60, 20, 40]);
  });

  it('should never run more than the limit at once', async () => {
    let active = 0;
    let peak = 0;

    await runBounded([1, 2, 3, 4, 5], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((r) => setTimeout(r, 5));
      active--;
    });

    expect(peak).toBe(2);
  });

  it('should stop scheduling after the first failure and rethrow it', async () => {
    const started: number[] = [];

    await expect(
      runBounded([1, 2, 3, 4], 1, async (item) => {
        started.push(item);
        if (item === 2) throw new Error('item 2 failed');
        return item;
      })
    ).rejects.toThrow('item 2 failed');

    expect(started).toEqual([1, 2]);
  });

  it('should wait for tasks already in flight before rejecting', async () => {
    const slow = deferred();
    let slowFinished = false;

    const run = runBounded(['slow', 'fails'], 2, async (item) => {
      if (item === 'fails') throw new Error('fast failure');
      await slow.promise;
      slowFinished = true;
      return item;
    });

    setTimeout(() => slow.resolve(), 10);
    await expect(run).rejects.toThrow('fast failure');
    expect(slowFinished).toBe(true);
  });

  it('should return an empty list for no items', async () => {
    expect(await runBounded([], 4, async () => 1)).toEqual([]);
  });
});

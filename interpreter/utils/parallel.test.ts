import { describe, it, expect } from 'vitest';
import { runWithConcurrency } from './parallel';

function sleep(ms: number) {
  return new Promise(res => setTimeout(res, ms));
}

describe('parallel utils', () => {
  it('places results at the index of their item', async () => {
    const items = [3, 1, 2, 0];
    const results = await runWithConcurrency(items, 2, async (n) => {
      await sleep(n);
      return n * 2;
    });
    expect(results).toEqual([6, 2, 4, 0]);
  });

  it('never runs more tasks than the limit', async () => {
    let running = 0;
    let peak = 0;
    await runWithConcurrency(Array.from({ length: 8 }, (_, i) => i), 3, async () => {
      running++;
      peak = Math.max(peak, running);
      await sleep(2);
      running--;
    });
    expect(peak).toBe(3);
  });

  it('stops starting tasks once the signal is aborted', async () => {
    const controller = new AbortController();
    const started: number[] = [];
    const results = await runWithConcurrency([0, 1, 2, 3], 1, async (n) => {
      started.push(n);
      if (n === 1) controller.abort();
      return n;
    }, { signal: controller.signal });

    expect(started).toEqual([0, 1]);
    expect(results).toEqual([0, 1, undefined, undefined]);
  });

  it('returns an empty list for no items', async () => {
    expect(await runWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});

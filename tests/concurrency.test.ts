import { setTimeout as sleep } from 'node:timers/promises';
import { describe, expect, it } from 'vitest';
import { mapWithConcurrency } from '../src/services/concurrency.js';

describe('mapWithConcurrency', () => {
  it('keeps at most `limit` calls in flight and preserves order', async () => {
    let inFlight = 0;
    let peak = 0;
    const out = await mapWithConcurrency([30, 5, 20, 1, 10, 2], 2, async (ms, i) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(ms);
      inFlight--;
      return `${i}:${ms}`;
    });
    expect(peak).toBe(2);
    expect(out).toEqual(['0:30', '1:5', '2:20', '3:1', '4:10', '5:2']);
  });

  it('treats a limit below one as one', async () => {
    let peak = 0;
    let inFlight = 0;
    await mapWithConcurrency([1, 2, 3], 0, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(1);
      inFlight--;
    });
    expect(peak).toBe(1);
  });

  it('rejects with the first failure', async () => {
    await expect(
      mapWithConcurrency(['a', 'b'], 2, async (s) => {
        if (s === 'b') throw new Error('bad b');
        return s;
      }),
    ).rejects.toThrow('bad b');
  });

  it('handles an empty list', async () => {
    expect(await mapWithConcurrency([], 3, async () => 1)).toEqual([]);
  });
});

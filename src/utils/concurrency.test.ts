import { describe, it, expect } from 'vitest';
import { mapWithConcurrency, WorkerPool } from './concurrency';

const tick = (): Promise<void> => new Promise(resolve => setTimeout(resolve, 5));

describe('mapWithConcurrency', () => {
  it('keeps the input order of results', async () => {
    const results = await mapWithConcurrency([30, 10, 20], 2, async (delay, index) => {
      await new Promise(resolve => setTimeout(resolve, delay));
      return `${index}:${delay}`;
    });
    expect(results).toEqual(['0:30', '1:10', '2:20']);
  });

  it('never runs more tasks than the limit', async () => {
    let running = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      running++;
      peak = Math.max(peak, running);
      await tick();
      running--;
    });
    expect(peak).toBe(2);
  });
});

describe('WorkerPool', () => {
  it('passes task failures to the caller and keeps working', async () => {
    const pool = new WorkerPool(1);
    const failing = pool.execute(async () => {
      throw new Error('boom');
    });
    const next = pool.execute(async () => 'next');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('next');
    expect(pool.getStats()).toEqual({ active: 0, queued: 0, max: 1 });
  });

  it('needs at least one worker', () => {
    expect(() => new WorkerPool(0)).toThrow(RangeError);
  });
});

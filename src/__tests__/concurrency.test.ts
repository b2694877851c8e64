import { describe, it, expect } from 'vitest';
import { settleInChunks } from '../utils/batch';
import { KeyedLock } from '../utils/keyed-lock';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe('settleInChunks', () => {
  it('settles every item in input order', async () => {
    const results = await settleInChunks([3, 0, 2], 2, async (value, index) => {
      if (value === 0) {
        throw new Error(`item ${index}`);
      }
      return value * 10;
    });

    expect(results).toEqual([
      { status: 'fulfilled', value: 30 },
      { status: 'rejected', reason: new Error('item 1') },
      { status: 'fulfilled', value: 20 }
    ]);
  });

  it('never runs more than `concurrency` workers at once', async () => {
    let running = 0;
    let peak = 0;

    await settleInChunks([1, 2, 3, 4, 5], 2, async () => {
      running += 1;
      peak = Math.max(peak, running);
      await tick();
      running -= 1;
    });

    expect(peak).toBe(2);
  });

  it('treats a concurrency below 1 as 1', async () => {
    const order: number[] = [];
    await settleInChunks([1, 2], 0, async (value) => {
      order.push(value);
    });
    expect(order).toEqual([1, 2]);
  });
});

describe('KeyedLock', () => {
  it('runs work for one key in call order', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run('a', async () => {
        events.push('first:start');
        await tick();
        events.push('first:end');
      }),
      lock.run('a', async () => {
        events.push('second');
      })
    ]);

    expect(events).toEqual(['first:start', 'first:end', 'second']);
    expect(lock.pending).toBe(0);
  });

  it('lets different keys overlap', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run('a', async () => {
        events.push('a:start');
        await tick();
        events.push('a:end');
      }),
      lock.run('b', async () => {
        events.push('b');
      })
    ]);

    expect(events.indexOf('b')).toBeLessThan(events.indexOf('a:end'));
  });

  it('releases the key when the work fails', async () => {
    const lock = new KeyedLock();

    await expect(lock.run('a', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(await lock.run('a', async () => 'next')).toBe('next');
    expect(lock.pending).toBe(0);
  });
});

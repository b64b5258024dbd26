/**
 * Tests for mutex and condition primitives
 */

import { describe, expect, it } from 'vitest';
import { createCondition, createMutex } from './mutex.js';

const tick = (ms = 10): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

describe('Mutex', () => {
  it('should acquire and release lock', async () => {
    const mutex = createMutex();
    const release = await mutex.acquire();
    expect(mutex.locked).toBe(true);
    release();
    expect(mutex.locked).toBe(false);
  });

  it('should ignore a second call of the same release', async () => {
    const mutex = createMutex();
    const first = await mutex.acquire();
    first();
    const second = await mutex.acquire();
    first();
    expect(mutex.locked).toBe(true);
    second();
    expect(mutex.locked).toBe(false);
  });

  it('should queue concurrent operations in order', async () => {
    const mutex = createMutex();
    const results: number[] = [];

    await Promise.all(
      Array.from({ length: 5 }, (_, i) =>
        mutex.runExclusive(async () => {
          await tick(5);
          results.push(i);
        })
      )
    );

    expect(results).toEqual([0, 1, 2, 3, 4]);
  });

  it('should release the lock when the function throws', async () => {
    const mutex = createMutex();

    await expect(
      mutex.runExclusive(() => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(mutex.locked).toBe(false);
  });
});

describe('Condition', () => {
  it('should park waiters until notifyAll and hand back the lock', async () => {
    const mutex = createMutex();
    const condition = createCondition();
    const order: string[] = [];

    const waiter = (async () => {
      const release = await mutex.acquire();
      const reacquired = await condition.wait(mutex, release);
      order.push(`woken locked=${String(mutex.locked)}`);
      reacquired();
    })();

    await tick();
    expect(condition.waiting).toBe(1);
    expect(mutex.locked).toBe(false);

    await mutex.runExclusive(() => {
      order.push('notify');
      expect(condition.notifyAll()).toBe(1);
    });
    await waiter;

    expect(order).toEqual(['notify', 'woken locked=true']);
    expect(condition.waiting).toBe(0);
    expect(mutex.locked).toBe(false);
  });

  it('should wake every parked waiter at once', async () => {
    const mutex = createMutex();
    const condition = createCondition();
    let woken = 0;

    const waiters = Array.from({ length: 3 }, async () => {
      const release = await mutex.acquire();
      const reacquired = await condition.wait(mutex, release);
      woken += 1;
      reacquired();
    });

    await tick();
    expect(condition.waiting).toBe(3);
    expect(condition.notifyAll()).toBe(3);
    await Promise.all(waiters);

    expect(woken).toBe(3);
  });

  it('should report zero when nobody waits', () => {
    expect(createCondition().notifyAll()).toBe(0);
  });
});

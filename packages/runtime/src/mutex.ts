/**
 * Mutex and condition primitives built on promises
 *
 * The test process is single-threaded, but its background tasks interleave
 * at every await. Code that must not interleave with another task around a
 * suspension point takes the mutex; code that must park until another task
 * changes shared state waits on a condition paired with that mutex.
 */

export type Release = () => void;

export type Mutex = {
  acquire(): Promise<Release>;
  runExclusive<T>(fn: () => Promise<T> | T): Promise<T>;
  readonly locked: boolean;
};

export function createMutex(): Mutex {
  const queue: Array<() => void> = [];
  let locked = false;

  const release = (): void => {
    const next = queue.shift();
    if (next) {
      // Ownership moves straight to the next waiter; the lock stays taken
      next();
    } else {
      locked = false;
    }
  };

  const acquire = (): Promise<Release> =>
    new Promise<Release>((resolve) => {
      let released = false;
      const grant = (): void => {
        locked = true;
        resolve(() => {
          if (released) return;
          released = true;
          release();
        });
      };

      if (locked) {
        queue.push(grant);
      } else {
        grant();
      }
    });

  const runExclusive = async <T>(fn: () => Promise<T> | T): Promise<T> => {
    const releaseLock = await acquire();
    try {
      return await fn();
    } finally {
      releaseLock();
    }
  };

  return {
    acquire,
    runExclusive,
    get locked() {
      return locked;
    }
  };
}

/**
 * Broadcast condition variable
 *
 * wait() must be called while holding the paired mutex. The waiter is
 * registered before the mutex is released, so a notifyAll issued by the
 * next lock holder can never be missed.
 */
export type Condition = {
  wait(mutex: Mutex, release: Release): Promise<Release>;
  notifyAll(): number;
  readonly waiting: number;
};

export function createCondition(): Condition {
  let parked: Array<() => void> = [];

  const wait = async (mutex: Mutex, release: Release): Promise<Release> => {
    const woken = new Promise<void>((resolve) => {
      parked.push(resolve);
    });
    release();
    await woken;
    return mutex.acquire();
  };

  const notifyAll = (): number => {
    const waking = parked;
    parked = [];
    for (const wake of waking) {
      wake();
    }
    return waking.length;
  };

  return {
    wait,
    notifyAll,
    get waiting() {
      return parked.length;
    }
  };
}

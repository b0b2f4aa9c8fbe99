import { createSemaphore, type Semaphore } from './semaphore';

/**
 * Serializes async work per key. Work under different keys runs concurrently.
 * Entries are dropped once no caller holds or waits on a key.
 *
 * @example
 * ```typescript
 * const locks = createKeyedMutex();
 * await locks.runExclusive(`${restaurantId}/${tableId}/${date}`, () => commit());
 * ```
 */
export interface KeyedMutex {
  runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T>;
  /** Keys currently held or awaited. */
  readonly size: number;
}

export function createKeyedMutex(): KeyedMutex {
  const locks = new Map<string, Semaphore>();

  return {
    async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
      let lock = locks.get(key);
      if (!lock) {
        lock = createSemaphore(1);
        locks.set(key, lock);
      }

      await lock.acquire();
      try {
        return await fn();
      } finally {
        lock.release();
        if (lock.pending === 0) {
          locks.delete(key);
        }
      }
    },

    get size(): number {
      return locks.size;
    },
  };
}

/**
 * A simple semaphore for limiting concurrent operations.
 *
 * @example
 * ```typescript
 * const semaphore = createSemaphore(3); // Allow 3 concurrent operations
 *
 * async function doWork(id: number) {
 *   await semaphore.acquire();
 *   try {
 *     await someAsyncOperation(id);
 *   } finally {
 *     semaphore.release();
 *   }
 * }
 * ```
 */
export interface Semaphore {
  /**
   * Acquires a slot from the semaphore.
   * If no slots are available, waits until one is released.
   */
  acquire(): Promise<void>;

  /**
   * Releases a slot back to the semaphore.
   * Must be called after acquire() completes, typically in a finally block.
   */
  release(): void;

  /** Slots held plus callers waiting for one. */
  readonly pending: number;
}

/**
 * Creates a semaphore with the specified concurrency limit.
 */
export function createSemaphore(limit: number): Semaphore {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`);
  }

  let running = 0;
  const waiting: Array<() => void> = [];

  return {
    async acquire(): Promise<void> {
      if (running < limit) {
        running++;
        return;
      }
      return new Promise<void>((resolve) => {
        waiting.push(resolve);
      });
    },

    release(): void {
      running--;
      const next = waiting.shift();
      if (next) {
        running++;
        next();
      }
    },

    get pending(): number {
      return running + waiting.length;
    },
  };
}

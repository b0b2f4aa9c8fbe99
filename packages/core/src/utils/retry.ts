import { TablewiseError } from '../errors';

export interface RetryOptions {
  /** Total attempts including the first. */
  maxAttempts: number;
  /** Delay before the second attempt; doubles after each further failure. */
  baseDelayMs: number;
  /** Defaults to `TablewiseError.isRetryable`. */
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  sleep?: (ms: number) => Promise<void>;
}

export interface RetryResult<T> {
  value: T;
  attempts: number;
}

export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown
  ) {
    super(`Gave up after ${attempts} attempts`);
    this.name = 'RetryExhaustedError';
  }
}

const defaultIsRetryable = (error: unknown): boolean =>
  error instanceof TablewiseError && error.isRetryable;

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Runs `fn` until it succeeds, fails with a non-retryable error,
 * or `maxAttempts` is reached.
 *
 * A non-retryable error is rethrown as-is. Exhausting the attempts on a
 * retryable error throws that last error as-is too; callers that need the
 * attempt count read it from `onRetry` or catch `RetryExhaustedError` via
 * {@link withRetryResult}.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const { value } = await withRetryResult(fn, options).catch((error: unknown) => {
    throw error instanceof RetryExhaustedError ? error.lastError : error;
  });
  return value;
}

/**
 * Like {@link withRetry} but reports the attempt count, and wraps the final
 * retryable failure in `RetryExhaustedError`.
 */
export async function withRetryResult<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const isRetryable = options.isRetryable ?? defaultIsRetryable;
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return { value: await fn(attempt), attempts: attempt };
    } catch (error) {
      if (!isRetryable(error)) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        throw new RetryExhaustedError(attempt, error);
      }
      const delayMs = options.baseDelayMs * 2 ** (attempt - 1);
      options.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs);
    }
  }
}

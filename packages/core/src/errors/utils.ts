import type { TablewiseError, TablewiseErrorOptions } from './types';

/**
 * Wraps an unknown thrown value as a specific TablewiseError subclass,
 * keeping the original error as `cause`.
 *
 * @internal
 */
export function wrapAsError<T extends TablewiseError<TCode>, TCode extends string>(
  error: unknown,
  ErrorClass: new (message: string, options: TablewiseErrorOptions<TCode>) => T,
  options: { code: TCode; context?: Record<string, unknown> }
): T {
  const cause = error instanceof Error ? error : new Error(String(error));
  return new ErrorClass(cause.message, { ...options, cause });
}

/**
 * Normalizes an unknown thrown value to an Error instance.
 */
export function normalizeError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * True when the error (or the given signal) indicates an abort.
 */
export function isAbortError(error: unknown, signal?: AbortSignal): boolean {
  if (error instanceof Error && error.name === 'AbortError') {
    return true;
  }
  return signal?.aborted ?? false;
}

/**
 * Execution types.
 * An execution runs a function against a session and reports how it ended.
 */

import type { SessionSummary } from '../session/types';

/**
 * Options for simpleExecution.
 */
export interface ExecutionOptions {
  /**
   * AbortSignal for cancellation.
   * Combined with the internal AbortController - both can trigger cancellation.
   *
   * @example
   * ```typescript
   * const controller = new AbortController();
   * const execution = provider.simpleExecution(fn, { signal: controller.signal });
   *
   * // Cancel externally
   * controller.abort();
   * ```
   */
  signal?: AbortSignal;
}

export type ExecutionStatus = 'succeeded' | 'failed' | 'canceled';

/**
 * Outcome of a SimpleExecution. Never thrown; switch on `status`.
 */
export type SimpleResult<TResult> =
  | { status: 'succeeded'; value: TResult; summary: SessionSummary }
  | { status: 'failed'; error: Error; summary: SessionSummary }
  | { status: 'canceled'; summary: SessionSummary };

/**
 * Non-streaming execution with cancellation support.
 *
 * @example
 * ```typescript
 * const execution = provider.simpleExecution(async (session) => {
 *   const { text } = await session.generateText({ messages });
 *   return text;
 * });
 *
 * const result = await execution.result();
 * if (result.status === 'succeeded') {
 *   console.log(result.value);
 * }
 * ```
 */
export interface SimpleExecution<TResult> {
  /**
   * Request cancellation of the execution.
   * Aborts the current LLM call if in progress. No-op once completed.
   */
  cancel(): void;

  /** Outcome with status and summary. */
  result(): Promise<SimpleResult<TResult>>;

  /**
   * Resolves with the value, or throws the failure.
   * A canceled execution throws an ExecutionError with code CANCELLED.
   */
  toResult(): Promise<TResult>;

  getSummary(): Promise<SessionSummary>;
}

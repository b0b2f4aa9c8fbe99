import type { SessionSummary } from '../session/types';
import type { SimpleSession } from '../session/simple-session';
import { ExecutionError, ExecutionErrorCode, isAbortError, normalizeError } from '../errors';
import type { SimpleExecution, SimpleResult } from './types';
import { combineSignals } from './utils';

/**
 * Internal result structure for tracking execution outcome.
 * Used to avoid throwing errors in the execution flow.
 */
type InternalResult<T> =
  | { success: true; result: T; summary: SessionSummary }
  | { success: false; error: Error; aborted: boolean; summary: SessionSummary };

/**
 * SimpleExecutionHost implements the SimpleExecution interface for eager execution.
 *
 * Execution starts immediately on construction.
 * If a user signal is provided it is combined with the internal AbortController,
 * so both cancel() and the user signal cancel the in-flight LLM call.
 */
export class SimpleExecutionHost<TResult> implements SimpleExecution<TResult> {
  private readonly abortController = new AbortController();
  private readonly effectiveSignal: AbortSignal;
  private readonly consumerPromise: Promise<InternalResult<TResult>>;
  private readonly startTime = Date.now();
  private cancelRequested = false;

  constructor(
    createSession: (signal?: AbortSignal) => SimpleSession,
    fn: (session: SimpleSession) => Promise<TResult>,
    userSignal?: AbortSignal
  ) {
    this.effectiveSignal = userSignal
      ? combineSignals(userSignal, this.abortController.signal)
      : this.abortController.signal;

    this.consumerPromise = this.execute(createSession, fn);
  }

  private async execute(
    createSession: (signal?: AbortSignal) => SimpleSession,
    fn: (session: SimpleSession) => Promise<TResult>
  ): Promise<InternalResult<TResult>> {
    const session = createSession(this.effectiveSignal);
    session.notifyExecutionStart();

    try {
      const result = await fn(session);
      session.notifyExecutionDone(result, this.startTime);

      return { success: true, result, summary: session.getSummary() };
    } catch (error) {
      const errorObj = normalizeError(error);
      const isCancellation = isAbortError(error, this.effectiveSignal);

      // Cancellation is not reported as an execution error
      if (!isCancellation) {
        session.notifyExecutionError(errorObj, this.startTime);
      }

      return {
        success: false,
        error: errorObj,
        aborted: isCancellation,
        summary: session.getSummary(),
      };
    }
  }

  cancel(): void {
    this.cancelRequested = true;
    this.abortController.abort();
  }

  async result(): Promise<SimpleResult<TResult>> {
    const internal = await this.consumerPromise;

    if (internal.success) {
      return { status: 'succeeded', value: internal.result, summary: internal.summary };
    }

    if (this.cancelRequested || internal.aborted) {
      return { status: 'canceled', summary: internal.summary };
    }

    return { status: 'failed', error: internal.error, summary: internal.summary };
  }

  async toResult(): Promise<TResult> {
    const outcome = await this.result();
    switch (outcome.status) {
      case 'succeeded':
        return outcome.value;
      case 'canceled':
        throw new ExecutionError('Execution was cancelled', { code: ExecutionErrorCode.CANCELLED });
      case 'failed':
        throw outcome.error;
    }
  }

  async getSummary(): Promise<SessionSummary> {
    const internal = await this.consumerPromise;
    return internal.summary;
  }
}

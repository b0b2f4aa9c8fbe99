import type { Logger } from '../observability/logger';
import type { SimpleExecution, ExecutionOptions } from '../execution/types';
import type { SimpleSession } from '../session/simple-session';
import type { GenerationOptions } from '../session/types';

export type ProviderType = 'openai' | 'google' | 'mock';

/** Provider interface with fluent configuration for AI model operations */
export interface Provider {
  readonly type: ProviderType;

  withDefaultModel(modelId: string): Provider;
  withLogger(logger: Logger): Provider;
  withDefaultGenerationOptions(options: GenerationOptions): Provider;

  /**
   * Execute a function against a fresh session.
   * Returns immediately (sync) - execution starts in the background.
   *
   * @example
   * ```typescript
   * const execution = provider.simpleExecution(async (session) => {
   *   const { text } = await session.generateText({ messages });
   *   return text;
   * });
   * execution.cancel(); // aborts an in-progress LLM call
   * const result = await execution.result();
   * ```
   */
  simpleExecution<TResult>(
    fn: (session: SimpleSession) => Promise<TResult>,
    options?: ExecutionOptions
  ): SimpleExecution<TResult>;
}

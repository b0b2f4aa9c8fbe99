import type { Logger } from '../observability/logger';
import type { SimpleExecution, ExecutionOptions } from '../execution/types';
import { SimpleExecutionHost } from '../execution/simple-host';
import type { SimpleSession } from '../session/simple-session';
import type { GenerationOptions } from '../session/types';
import type { Provider, ProviderType } from './types';

/**
 * Abstract base class for AI providers.
 *
 * Provides the common simpleExecution implementation.
 * Subclasses implement session creation and fluent configuration methods.
 */
export abstract class BaseProvider implements Provider {
  abstract readonly type: ProviderType;

  /**
   * Create a SimpleSession for one execution.
   * @param signal - AbortSignal for cancellation support
   */
  protected abstract createSimpleSession(signal?: AbortSignal): SimpleSession;

  abstract withDefaultModel(modelId: string): Provider;

  abstract withLogger(logger: Logger): Provider;

  abstract withDefaultGenerationOptions(options: GenerationOptions): Provider;

  simpleExecution<TResult>(
    fn: (session: SimpleSession) => Promise<TResult>,
    options?: ExecutionOptions
  ): SimpleExecution<TResult> {
    return new SimpleExecutionHost(
      (signal) => this.createSimpleSession(signal),
      fn,
      options?.signal
    );
  }
}

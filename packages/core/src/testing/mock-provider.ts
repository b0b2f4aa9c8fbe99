/**
 * MockProvider - test provider backed by MockLanguageModelV3.
 *
 * Extends BaseProvider to provide mock LLM responses with call tracking.
 * Use `mock.provider()` factory for convenient creation.
 *
 * @example
 * ```typescript
 * const provider = mock.provider(mock.text('Hello!'));
 * const execution = provider.simpleExecution(async (session) => {
 *   const { text } = await session.generateText({ messages: [{ role: 'user', content: 'hi' }] });
 *   return text;
 * });
 *
 * expect(await execution.toResult()).toBe('Hello!');
 * expect(provider.getCalls()).toHaveLength(1);
 * ```
 */

import { MockLanguageModelV3 } from 'ai/test';
import type { Logger } from '../observability/logger';
import { noopLogger } from '../observability/logger';
import { BaseProvider } from '../provider/base-provider';
import { SimpleSession } from '../session/simple-session';
import type { GenerationOptions } from '../session/types';

export type ModelFactory = (modelId: string) => MockLanguageModelV3;

export interface MockProviderConfig {
  model?: MockLanguageModelV3;
  modelFactory?: ModelFactory;
  logger?: Logger;
}

export interface MockCall {
  modelId: string;
  timestamp: number;
  params: unknown;
}

interface MockProviderState {
  modelSource: MockLanguageModelV3 | ModelFactory;
  logger: Logger;
  defaultModelId: string | null;
  defaultGenOptions?: GenerationOptions;
  /** Shared between fluent copies so tracking survives withX() calls. */
  calls: MockCall[];
}

export class MockProvider extends BaseProvider {
  readonly type = 'mock' as const;
  private readonly state: MockProviderState;

  constructor(config: MockProviderConfig | MockProviderState) {
    super();
    if ('modelSource' in config) {
      this.state = config;
      return;
    }
    const modelSource = config.modelFactory ?? config.model;
    if (!modelSource) {
      throw new Error('MockProvider requires either model or modelFactory');
    }
    this.state = {
      modelSource,
      logger: config.logger ?? noopLogger,
      defaultModelId: null,
      calls: [],
    };
  }

  getCalls(): MockCall[] {
    return [...this.state.calls];
  }

  clearCalls(): void {
    this.state.calls.length = 0;
  }

  withDefaultModel(modelId: string): MockProvider {
    return new MockProvider({ ...this.state, defaultModelId: modelId });
  }

  withLogger(logger: Logger): MockProvider {
    return new MockProvider({ ...this.state, logger });
  }

  withDefaultGenerationOptions(options: GenerationOptions): MockProvider {
    return new MockProvider({ ...this.state, defaultGenOptions: options });
  }

  protected createSimpleSession(signal?: AbortSignal): SimpleSession {
    return new SimpleSession({
      defaultLanguageModel: this.createTrackingModel(this.state.defaultModelId ?? 'default'),
      modelFactory: (modelId: string) => this.createTrackingModel(modelId),
      defaultGenerationOptions: this.state.defaultGenOptions,
      logger: this.state.logger,
      signal,
    });
  }

  private getBaseModel(modelId: string): MockLanguageModelV3 {
    if (typeof this.state.modelSource === 'function') {
      return this.state.modelSource(modelId);
    }
    return this.state.modelSource;
  }

  private createTrackingModel(modelId: string): MockLanguageModelV3 {
    const baseModel = this.getBaseModel(modelId);
    const calls = this.state.calls;

    return new MockLanguageModelV3({
      provider: baseModel.provider,
      modelId,
      doGenerate: async (params) => {
        calls.push({ modelId, timestamp: Date.now(), params });
        return baseModel.doGenerate(params);
      },
    });
  }
}

export function createMockProvider(
  configOrModel: MockProviderConfig | MockLanguageModelV3 | ModelFactory
): MockProvider {
  if (typeof configOrModel === 'function') {
    return new MockProvider({ modelFactory: configOrModel });
  }

  if (configOrModel instanceof MockLanguageModelV3) {
    return new MockProvider({ model: configOrModel });
  }

  return new MockProvider(configOrModel);
}

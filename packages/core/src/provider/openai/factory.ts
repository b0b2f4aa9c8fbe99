import { createOpenAI } from '@ai-sdk/openai';
import type { Logger } from '../../observability/logger';
import { noopLogger } from '../../observability/logger';
import type { GenerationOptions } from '../../session/types';
import { SimpleSession } from '../../session/simple-session';
import { BaseProvider } from '../base-provider';

export interface OpenAIProviderConfig {
  apiKey: string;
  baseURL?: string;
  organization?: string;
}

interface OpenAIProviderState {
  apiKey: string;
  defaultModelId: string | null;
  logger: Logger;
  baseURL?: string;
  organization?: string;
  defaultGenOptions?: GenerationOptions;
}

export class OpenAIProvider extends BaseProvider {
  readonly type = 'openai' as const;
  private readonly openai: ReturnType<typeof createOpenAI>;

  constructor(private readonly config: OpenAIProviderState) {
    super();
    this.openai = createOpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      organization: config.organization,
    });
  }

  withDefaultModel(modelId: string): OpenAIProvider {
    return new OpenAIProvider({ ...this.config, defaultModelId: modelId });
  }

  withLogger(newLogger: Logger): OpenAIProvider {
    return new OpenAIProvider({ ...this.config, logger: newLogger });
  }

  withDefaultGenerationOptions(options: GenerationOptions): OpenAIProvider {
    return new OpenAIProvider({ ...this.config, defaultGenOptions: options });
  }

  protected createSimpleSession(signal?: AbortSignal): SimpleSession {
    return new SimpleSession({
      defaultLanguageModel: this.config.defaultModelId
        ? this.openai(this.config.defaultModelId)
        : null,
      modelFactory: (modelId: string) => this.openai(modelId),
      defaultGenerationOptions: this.config.defaultGenOptions,
      logger: this.config.logger,
      signal,
    });
  }
}

export function createOpenAIProvider(config: OpenAIProviderConfig): OpenAIProvider {
  return new OpenAIProvider({
    apiKey: config.apiKey,
    defaultModelId: null,
    logger: noopLogger,
    baseURL: config.baseURL,
    organization: config.organization,
  });
}

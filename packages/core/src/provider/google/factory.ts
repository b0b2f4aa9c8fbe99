import { createGoogleGenerativeAI } from '@ai-sdk/google';
import type { Logger } from '../../observability/logger';
import { noopLogger } from '../../observability/logger';
import type { GenerationOptions } from '../../session/types';
import { SimpleSession } from '../../session/simple-session';
import { BaseProvider } from '../base-provider';

export interface GoogleProviderConfig {
  apiKey: string;
  baseURL?: string;
}

interface GoogleProviderState {
  apiKey: string;
  defaultModelId: string | null;
  logger: Logger;
  baseURL?: string;
  defaultGenOptions?: GenerationOptions;
}

export class GoogleProvider extends BaseProvider {
  readonly type = 'google' as const;
  private readonly google: ReturnType<typeof createGoogleGenerativeAI>;

  constructor(private readonly config: GoogleProviderState) {
    super();
    this.google = createGoogleGenerativeAI({ apiKey: config.apiKey, baseURL: config.baseURL });
  }

  withDefaultModel(modelId: string): GoogleProvider {
    return new GoogleProvider({ ...this.config, defaultModelId: modelId });
  }

  withLogger(newLogger: Logger): GoogleProvider {
    return new GoogleProvider({ ...this.config, logger: newLogger });
  }

  withDefaultGenerationOptions(options: GenerationOptions): GoogleProvider {
    return new GoogleProvider({ ...this.config, defaultGenOptions: options });
  }

  protected createSimpleSession(signal?: AbortSignal): SimpleSession {
    return new SimpleSession({
      defaultLanguageModel: this.config.defaultModelId
        ? this.google(this.config.defaultModelId)
        : null,
      modelFactory: (modelId: string) => this.google(modelId),
      defaultGenerationOptions: this.config.defaultGenOptions,
      logger: this.config.logger,
      signal,
    });
  }
}

export function createGoogleProvider(config: GoogleProviderConfig): GoogleProvider {
  return new GoogleProvider({
    apiKey: config.apiKey,
    defaultModelId: null,
    logger: noopLogger,
    baseURL: config.baseURL,
  });
}

import { generateText as aiGenerateText } from 'ai';
import type { LanguageModel, ToolSet } from 'ai';
import type { Logger } from '../observability/logger';
import { noopLogger } from '../observability/logger';
import { ProviderError, ProviderErrorCode, isAbortError, normalizeError } from '../errors';
import { toProviderError } from '../provider/errors';
import {
  SessionSummary,
  type GenerateTextParams,
  type GenerationOptions,
  type LLMCallRecord,
} from './types';
import { toTokenUsage } from './usage';

export interface SimpleSessionOptions {
  defaultLanguageModel?: LanguageModel | null;
  modelFactory?: (modelId: string) => LanguageModel;
  defaultGenerationOptions?: GenerationOptions;
  logger?: Logger;
  startTime?: number;
  /**
   * AbortSignal for cancelling AI SDK calls.
   * When aborted, an ongoing generateText call is cancelled.
   */
  signal?: AbortSignal;
}

export class SimpleSession {
  private readonly defaultLanguageModel: LanguageModel | null;
  private readonly modelFactory: ((modelId: string) => LanguageModel) | null;
  private readonly defaultGenerationOptions: GenerationOptions;
  private readonly logger: Logger;
  private readonly sessionStartTime: number;
  private readonly signal?: AbortSignal;

  private summary: SessionSummary;

  constructor(options: SimpleSessionOptions) {
    this.defaultLanguageModel = options.defaultLanguageModel ?? null;
    this.modelFactory = options.modelFactory ?? null;
    this.defaultGenerationOptions = options.defaultGenerationOptions ?? {};
    this.logger = options.logger ?? noopLogger;
    this.sessionStartTime = options.startTime ?? Date.now();
    this.signal = options.signal;
    this.summary = SessionSummary.empty(this.sessionStartTime);
  }

  private getModel(requestedModelId?: string): LanguageModel {
    if (requestedModelId) {
      if (!this.modelFactory) {
        throw new ProviderError(
          `Model '${requestedModelId}' requested but no modelFactory provided.`,
          { code: ProviderErrorCode.NO_MODEL, context: { model: requestedModelId } }
        );
      }
      return this.modelFactory(requestedModelId);
    }

    if (!this.defaultLanguageModel) {
      throw new ProviderError(
        'No model specified and no default model set. ' +
          'Either specify a model in the call or configure the provider with withDefaultModel().',
        { code: ProviderErrorCode.NO_MODEL }
      );
    }
    return this.defaultLanguageModel;
  }

  private extractModelId(model: LanguageModel): string {
    return typeof model === 'string' ? model : model.modelId;
  }

  async generateText<TOOLS extends ToolSet = ToolSet>(params: GenerateTextParams<TOOLS>) {
    const callStartTime = Date.now();
    const languageModel = this.getModel(params.model);
    const modelId = this.extractModelId(languageModel);

    this.logger.onLLMCallStart?.({
      type: 'llm_call_start',
      modelId,
      timestamp: callStartTime,
      request: {
        params: {
          system: params.system,
          messageCount: params.messages.length,
          tools: Object.keys(params.tools ?? {}),
        },
      },
    });

    try {
      const result = await aiGenerateText({
        model: languageModel,
        system: params.system,
        messages: params.messages,
        tools: params.tools,
        toolChoice: params.toolChoice,
        temperature: params.temperature ?? this.defaultGenerationOptions.temperature,
        maxOutputTokens: params.maxOutputTokens ?? this.defaultGenerationOptions.maxOutputTokens,
        maxRetries: params.maxRetries,
        abortSignal: this.signal,
      });
      const callEndTime = Date.now();
      const usage = toTokenUsage(result.totalUsage);

      this.recordLLMCall({
        startTime: callStartTime,
        endTime: callEndTime,
        duration: callEndTime - callStartTime,
        usage,
        model: modelId,
      });

      this.logger.onLLMCallEnd?.({
        type: 'llm_call_end',
        modelId,
        timestamp: callEndTime,
        response: {
          duration: callEndTime - callStartTime,
          usage,
          raw: result.response,
        },
      });

      return result;
    } catch (error) {
      const callEndTime = Date.now();

      this.logger.onLLMCallEnd?.({
        type: 'llm_call_end',
        modelId,
        timestamp: callEndTime,
        response: {
          duration: callEndTime - callStartTime,
          raw: null,
          error: normalizeError(error),
        },
      });

      if (isAbortError(error, this.signal)) {
        throw error;
      }
      throw toProviderError(error, { model: modelId });
    }
  }

  recordLLMCall(call: LLMCallRecord): void {
    this.summary = this.summary.withLLMCall(call);
  }

  getSummary(): SessionSummary {
    return this.summary;
  }

  /**
   * Notifies Logger of execution start.
   * @internal Called by SimpleExecutionHost - not intended for direct use.
   */
  notifyExecutionStart(): void {
    this.logger.onExecutionStart?.({
      type: 'execution_start',
      timestamp: Date.now(),
    });
  }

  /**
   * @internal Called by SimpleExecutionHost - not intended for direct use.
   */
  notifyExecutionDone<T>(data: T, startTime: number): void {
    this.logger.onExecutionDone?.({
      type: 'execution_done',
      timestamp: Date.now(),
      duration: Date.now() - startTime,
      data,
      summary: this.summary,
    });
  }

  /**
   * @internal Called by SimpleExecutionHost - not intended for direct use.
   */
  notifyExecutionError(error: Error, startTime: number): void {
    this.logger.onExecutionError?.({
      type: 'execution_error',
      timestamp: Date.now(),
      duration: Date.now() - startTime,
      error,
      summary: this.summary,
    });
  }
}

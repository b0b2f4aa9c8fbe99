/**
 * Session module types.
 * Tracks LLM calls made inside one execution and the parameters a session accepts.
 */

import type { CallSettings, ModelMessage, ToolChoice, ToolSet } from 'ai';

import type { TokenUsage } from '../observability/types';
import { mergeUsages } from './usage';

/**
 * Generation settings that can be set as defaults at the Provider level.
 * Per-call values win.
 */
export type GenerationOptions = Pick<CallSettings, 'maxOutputTokens' | 'temperature'>;

/**
 * Parameters for session.generateText().
 * The model is injected by the session; `model` here selects a non-default model id.
 */
export interface GenerateTextParams<TOOLS extends ToolSet = ToolSet> extends GenerationOptions {
  model?: string;
  system?: string;
  messages: ModelMessage[];
  tools?: TOOLS;
  toolChoice?: ToolChoice<TOOLS>;
  maxRetries?: number;
}

export type { ToolSet };

export interface LLMCallRecord {
  startTime: number;
  endTime: number;
  duration: number;
  usage: TokenUsage;
  model: string;
}

/**
 * Aggregated summary of the LLM activity within an execution session.
 *
 * This is an immutable Value Object. All mutation methods return new instances.
 */
export class SessionSummary {
  readonly totalUsage: TokenUsage;
  readonly llmCalls: readonly LLMCallRecord[];

  private readonly startTime: number;

  private constructor(llmCalls: readonly LLMCallRecord[], startTime: number) {
    this.startTime = startTime;
    this.llmCalls = Object.freeze([...llmCalls]);
    this.totalUsage = mergeUsages(llmCalls.map((c) => c.usage));
  }

  static empty(startTime: number): SessionSummary {
    return new SessionSummary([], startTime);
  }

  get llmCallCount(): number {
    return this.llmCalls.length;
  }

  /**
   * Total duration from session start to now (computed dynamically).
   */
  get totalDuration(): number {
    return Date.now() - this.startTime;
  }

  withLLMCall(call: LLMCallRecord): SessionSummary {
    return new SessionSummary([...this.llmCalls, call], this.startTime);
  }

  toJSON(): Record<string, unknown> {
    return {
      llmCallCount: this.llmCallCount,
      totalUsage: this.totalUsage,
      totalDuration: this.totalDuration,
    };
  }
}

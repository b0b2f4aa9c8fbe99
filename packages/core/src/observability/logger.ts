import type { TokenUsage } from './types';
import type { SessionSummary } from '../session/types';

/**
 * Logger interface for observability.
 * All methods are optional - implement only the events you care about.
 *
 * @example
 * ```typescript
 * const myLogger: Logger = {
 *   onLLMCallEnd(event) {
 *     console.log(`${event.modelId}: ${event.response.duration}ms`);
 *   },
 *   onToolCallEnd(event) {
 *     console.log(`${event.toolName} ok=${event.success}`);
 *   },
 * };
 * ```
 */
export interface Logger {
  onLLMCallStart?(event: LLMCallStartEvent): void;
  onLLMCallEnd?(event: LLMCallEndEvent): void;
  onExecutionStart?(event: ExecutionStartEvent): void;
  onExecutionDone?<TResult>(event: ExecutionDoneEvent<TResult>): void;
  onExecutionError?(event: ExecutionErrorEvent): void;
  onToolCallStart?(event: ToolCallStartEvent): void;
  onToolCallEnd?(event: ToolCallEndEvent): void;
  onStateTransition?(event: StateTransitionEvent): void;
  log?(level: LogLevel, message: string, data?: Record<string, unknown>): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LLMCallStartEvent {
  type: 'llm_call_start';
  modelId: string;
  timestamp: number;
  request: {
    params: Record<string, unknown>;
  };
}

/**
 * Event emitted when an LLM call ends (success or error).
 *
 * @example Error case:
 * ```typescript
 * logger.onLLMCallEnd?.({
 *   type: 'llm_call_end',
 *   modelId: 'gpt-4o-mini',
 *   timestamp: Date.now(),
 *   response: {
 *     duration: 500,
 *     error: new Error('Rate limit exceeded'),
 *     raw: null,
 *   },
 * });
 * ```
 */
export interface LLMCallEndEvent {
  type: 'llm_call_end';
  modelId: string;
  timestamp: number;
  response: {
    duration: number;
    usage?: TokenUsage;
    raw: unknown;
    error?: Error;
  };
}

export interface ExecutionStartEvent {
  type: 'execution_start';
  timestamp: number;
}

export interface ExecutionDoneEvent<TResult = unknown> {
  type: 'execution_done';
  timestamp: number;
  duration: number;
  data: TResult;
  summary: SessionSummary;
}

export interface ExecutionErrorEvent {
  type: 'execution_error';
  timestamp: number;
  duration: number;
  error: Error;
  summary?: SessionSummary;
}

export interface ToolCallStartEvent {
  type: 'tool_call_start';
  toolName: string;
  sessionId?: string;
  timestamp: number;
  arguments: unknown;
}

export interface ToolCallEndEvent {
  type: 'tool_call_end';
  toolName: string;
  sessionId?: string;
  timestamp: number;
  duration: number;
  attempts: number;
  success: boolean;
  errorCode?: string;
}

export interface StateTransitionEvent {
  type: 'state_transition';
  sessionId: string;
  from: string;
  to: string;
  timestamp: number;
}

/**
 * No-op logger (default when no logger provided).
 */
export const noopLogger: Logger = {};

/**
 * Helper to create a logger with only the handlers you need.
 *
 * @example
 * ```typescript
 * const metricsLogger = createLogger({
 *   onLLMCallEnd(event) {
 *     metrics.recordLatency(event.response.duration);
 *   },
 * });
 * ```
 */
export function createLogger(handlers: Partial<Logger>): Logger {
  return handlers;
}

/**
 * Fans every event out to several loggers, in order.
 */
export function combineLoggers(...loggers: Logger[]): Logger {
  return {
    onLLMCallStart: (event) => loggers.forEach((l) => l.onLLMCallStart?.(event)),
    onLLMCallEnd: (event) => loggers.forEach((l) => l.onLLMCallEnd?.(event)),
    onExecutionStart: (event) => loggers.forEach((l) => l.onExecutionStart?.(event)),
    onExecutionDone<TResult>(event: ExecutionDoneEvent<TResult>) {
      loggers.forEach((l) => l.onExecutionDone?.(event));
    },
    onExecutionError: (event) => loggers.forEach((l) => l.onExecutionError?.(event)),
    onToolCallStart: (event) => loggers.forEach((l) => l.onToolCallStart?.(event)),
    onToolCallEnd: (event) => loggers.forEach((l) => l.onToolCallEnd?.(event)),
    onStateTransition: (event) => loggers.forEach((l) => l.onStateTransition?.(event)),
    log: (level, message, data) => loggers.forEach((l) => l.log?.(level, message, data)),
  };
}

export type {
  Logger,
  LogLevel,
  LLMCallStartEvent,
  LLMCallEndEvent,
  ExecutionStartEvent,
  ExecutionDoneEvent,
  ExecutionErrorEvent,
  ToolCallStartEvent,
  ToolCallEndEvent,
  StateTransitionEvent,
} from './logger';
export { noopLogger, createLogger, combineLoggers, LOG_LEVEL_ORDER } from './logger';

export { createConsoleLogger, type ConsoleLoggerOptions } from './console-logger';

export type { TokenUsage, ExecutionMetadata } from './types';

import type {
  Logger,
  LLMCallEndEvent,
  LLMCallStartEvent,
  LogLevel,
  StateTransitionEvent,
  ToolCallEndEvent,
  ToolCallStartEvent,
} from '../observability/logger';

export type RecordedEvent =
  | LLMCallStartEvent
  | LLMCallEndEvent
  | ToolCallStartEvent
  | ToolCallEndEvent
  | StateTransitionEvent
  | { type: 'log'; level: LogLevel; message: string; data?: Record<string, unknown> };

/**
 * Logger that keeps every event it receives, in order, for assertions.
 *
 * @example
 * ```typescript
 * const logger = createRecordingLogger();
 * await runSomething({ logger });
 * expect(logger.ofType('tool_call_end')).toHaveLength(1);
 * ```
 */
export function createRecordingLogger(): Logger & {
  events: RecordedEvent[];
  ofType<T extends RecordedEvent['type']>(type: T): Extract<RecordedEvent, { type: T }>[];
} {
  const events: RecordedEvent[] = [];

  return {
    events,
    ofType<T extends RecordedEvent['type']>(type: T) {
      return events.filter((e): e is Extract<RecordedEvent, { type: T }> => e.type === type);
    },
    onLLMCallStart: (event) => events.push(event),
    onLLMCallEnd: (event) => events.push(event),
    onToolCallStart: (event) => events.push(event),
    onToolCallEnd: (event) => events.push(event),
    onStateTransition: (event) => events.push(event),
    log: (level, message, data) => events.push({ type: 'log', level, message, data }),
  };
}

import { LOG_LEVEL_ORDER, type Logger, type LogLevel } from './logger';

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLOR: Record<LogLevel, keyof typeof colors> = {
  debug: 'gray',
  info: 'cyan',
  warn: 'yellow',
  error: 'red',
};

export interface ConsoleLoggerOptions {
  /** Minimum level written. Defaults to 'info'. */
  level?: LogLevel;
  /** Line sink, mainly for tests. Defaults to stderr. */
  write?: (line: string) => void;
  /** Force color on or off. Defaults to TTY detection and NO_COLOR. */
  color?: boolean;
}

function formatData(data?: Record<string, unknown>): string {
  if (!data || Object.keys(data).length === 0) {
    return '';
  }
  return ' ' + JSON.stringify(data);
}

/**
 * Logger that prints one line per event.
 * LLM, tool and state events are written at debug level.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LOG_LEVEL_ORDER[options.level ?? 'info'];
  const write = options.write ?? ((line: string) => process.stderr.write(line + '\n'));
  const useColor = options.color ?? (Boolean(process.stderr.isTTY) && !process.env.NO_COLOR);

  const paint = (color: keyof typeof colors, text: string): string =>
    useColor ? `${colors[color]}${text}${colors.reset}` : text;

  const emit = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (LOG_LEVEL_ORDER[level] < threshold) {
      return;
    }
    const tag = paint(LEVEL_COLOR[level], level.toUpperCase().padEnd(5));
    write(`${tag} ${message}${paint('dim', formatData(data))}`);
  };

  return {
    log: emit,
    onLLMCallEnd(event) {
      if (event.response.error) {
        emit('warn', `llm ${event.modelId} failed after ${event.response.duration}ms`, {
          error: event.response.error.message,
        });
        return;
      }
      emit('debug', `llm ${event.modelId} ${event.response.duration}ms`, {
        tokens: event.response.usage?.totalTokens,
      });
    },
    onToolCallEnd(event) {
      emit(event.success ? 'debug' : 'info', `tool ${event.toolName} ${event.success ? 'ok' : 'failed'}`, {
        attempts: event.attempts,
        durationMs: event.duration,
        errorCode: event.errorCode,
      });
    },
    onStateTransition(event) {
      emit('debug', `session ${event.sessionId}: ${event.from} -> ${event.to}`);
    },
  };
}

import { wrapAsError } from './utils';

export enum ExecutionErrorCode {
  EXECUTION_ERROR = 'EXECUTION_ERROR',
  CANCELLED = 'CANCELLED',
  TIMEOUT = 'TIMEOUT',
}

export enum ConfigurationErrorCode {
  CONFIG_ERROR = 'CONFIG_ERROR',
  MISSING_API_KEY = 'MISSING_API_KEY',
  INVALID_CONFIG = 'INVALID_CONFIG',
  MISSING_REQUIRED = 'MISSING_REQUIRED',
}

export enum ProviderErrorCode {
  PROVIDER_ERROR = 'PROVIDER_ERROR',
  API_ERROR = 'API_ERROR',
  RATE_LIMIT = 'RATE_LIMIT',
  TIMEOUT = 'TIMEOUT',
  UNAVAILABLE = 'UNAVAILABLE',
  NO_MODEL = 'NO_MODEL',
}

export type CoreErrorCode = ExecutionErrorCode | ConfigurationErrorCode | ProviderErrorCode;

export interface TablewiseErrorOptions<TCode extends string = string> {
  code: TCode;
  cause?: Error;
  context?: Record<string, unknown>;
}

export interface ErrorOptions<TCode extends string> {
  code?: TCode;
  cause?: Error;
  context?: Record<string, unknown>;
}

export type ExecutionErrorOptions = ErrorOptions<ExecutionErrorCode>;
export type ConfigurationErrorOptions = ErrorOptions<ConfigurationErrorCode>;
export type ProviderErrorOptions = ErrorOptions<ProviderErrorCode>;

/**
 * Base error class for all Tablewise errors.
 * Carries a machine-readable code and optional debugging context.
 *
 * Packages extend it with their own code enums, so `TCode` is only
 * constrained to strings here.
 */
export class TablewiseError<TCode extends string = CoreErrorCode> extends Error {
  readonly code: TCode;
  override readonly cause?: Error;
  readonly context?: Record<string, unknown>;

  constructor(message: string, options: TablewiseErrorOptions<TCode>) {
    super(message);
    this.name = 'TablewiseError';
    this.code = options.code;
    this.cause = options.cause;
    this.context = options.context;

    // V8-specific stack trace capture
    const ErrorWithCapture = Error as typeof Error & {
      captureStackTrace?: (targetObject: object, constructorOpt?: Function) => void;
    };
    ErrorWithCapture.captureStackTrace?.(this, this.constructor);
  }

  get isRetryable(): boolean {
    return false;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      isRetryable: this.isRetryable,
      context: this.context,
      cause: this.cause?.message,
      stack: this.stack,
    };
  }
}

/**
 * Error thrown while running an execution (cancellation, deadline, unexpected failure).
 */
export class ExecutionError extends TablewiseError<ExecutionErrorCode> {
  constructor(message: string, options: ExecutionErrorOptions = {}) {
    super(message, {
      code: options.code ?? ExecutionErrorCode.EXECUTION_ERROR,
      cause: options.cause,
      context: options.context,
    });
    this.name = 'ExecutionError';
  }

  static from(
    error: unknown,
    code: ExecutionErrorCode = ExecutionErrorCode.EXECUTION_ERROR,
    context?: Record<string, unknown>
  ): ExecutionError {
    if (error instanceof ExecutionError) {
      return error;
    }
    return wrapAsError(error, ExecutionError, { code, context });
  }
}

/**
 * Error thrown when configuration is invalid or missing (API keys, model names, files).
 */
export class ConfigurationError extends TablewiseError<ConfigurationErrorCode> {
  constructor(message: string, options: ConfigurationErrorOptions = {}) {
    super(message, {
      code: options.code ?? ConfigurationErrorCode.CONFIG_ERROR,
      cause: options.cause,
      context: options.context,
    });
    this.name = 'ConfigurationError';
  }

  static from(
    error: unknown,
    code: ConfigurationErrorCode = ConfigurationErrorCode.CONFIG_ERROR,
    context?: Record<string, unknown>
  ): ConfigurationError {
    if (error instanceof ConfigurationError) {
      return error;
    }
    return wrapAsError(error, ConfigurationError, { code, context });
  }
}

const RETRYABLE_PROVIDER_CODES: ReadonlySet<ProviderErrorCode> = new Set([
  ProviderErrorCode.RATE_LIMIT,
  ProviderErrorCode.TIMEOUT,
  ProviderErrorCode.UNAVAILABLE,
]);

/**
 * Error raised by a language-model provider call.
 * Rate limits, timeouts and unavailability are retryable.
 */
export class ProviderError extends TablewiseError<ProviderErrorCode> {
  constructor(message: string, options: ProviderErrorOptions = {}) {
    super(message, {
      code: options.code ?? ProviderErrorCode.PROVIDER_ERROR,
      cause: options.cause,
      context: options.context,
    });
    this.name = 'ProviderError';
  }

  override get isRetryable(): boolean {
    return RETRYABLE_PROVIDER_CODES.has(this.code);
  }

  static from(
    error: unknown,
    code: ProviderErrorCode = ProviderErrorCode.PROVIDER_ERROR,
    context?: Record<string, unknown>
  ): ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }
    return wrapAsError(error, ProviderError, { code, context });
  }
}

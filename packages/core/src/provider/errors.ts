import { APICallError, RetryError } from 'ai';
import { ProviderError, ProviderErrorCode } from '../errors';

function codeForStatus(statusCode: number | undefined, retryable: boolean): ProviderErrorCode {
  if (statusCode === 429) {
    return ProviderErrorCode.RATE_LIMIT;
  }
  if (statusCode === 408) {
    return ProviderErrorCode.TIMEOUT;
  }
  if ((statusCode !== undefined && statusCode >= 500) || retryable) {
    return ProviderErrorCode.UNAVAILABLE;
  }
  return ProviderErrorCode.API_ERROR;
}

/**
 * Maps whatever the AI SDK threw onto a ProviderError.
 * HTTP 429, 408 and 5xx responses become retryable codes; a RetryError
 * is classified by its last attempt.
 */
export function toProviderError(error: unknown, context?: Record<string, unknown>): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  if (RetryError.isInstance(error)) {
    const last = toProviderError(error.lastError, context);
    return new ProviderError(error.message, { code: last.code, cause: error, context });
  }
  if (APICallError.isInstance(error)) {
    return ProviderError.from(error, codeForStatus(error.statusCode, error.isRetryable), {
      ...context,
      statusCode: error.statusCode,
    });
  }
  return ProviderError.from(error, ProviderErrorCode.API_ERROR, context);
}

import { describe, it, expect } from 'vitest';
import {
  TablewiseError,
  ExecutionError,
  ConfigurationError,
  ProviderError,
  ExecutionErrorCode,
  ConfigurationErrorCode,
  ProviderErrorCode,
} from './types';
import { isAbortError, normalizeError } from './utils';

describe('Error Classes', () => {
  describe('TablewiseError', () => {
    it('should create error with message and code', () => {
      const error = new TablewiseError('test message', {
        code: ExecutionErrorCode.EXECUTION_ERROR,
      });

      expect(error.message).toBe('test message');
      expect(error.name).toBe('TablewiseError');
      expect(error.code).toBe(ExecutionErrorCode.EXECUTION_ERROR);
      expect(error).toBeInstanceOf(Error);
    });

    it('should accept package-specific string codes', () => {
      const error = new TablewiseError<'SLOT_CONFLICT'>('taken', { code: 'SLOT_CONFLICT' });

      expect(error.code).toBe('SLOT_CONFLICT');
    });

    it('should support error chaining with cause', () => {
      const cause = new Error('original error');
      const error = new TablewiseError('wrapped error', {
        code: ExecutionErrorCode.EXECUTION_ERROR,
        cause,
      });

      expect(error.cause).toBe(cause);
    });

    it('should serialize to JSON correctly', () => {
      const error = new TablewiseError('request failed', {
        code: ProviderErrorCode.API_ERROR,
        cause: new Error('network error'),
        context: { retries: 3 },
      });

      const json = error.toJSON();

      expect(json.name).toBe('TablewiseError');
      expect(json.message).toBe('request failed');
      expect(json.code).toBe('API_ERROR');
      expect(json.isRetryable).toBe(false);
      expect(json.context).toEqual({ retries: 3 });
      expect(json.cause).toBe('network error');
      expect(json.stack).toBeDefined();
    });
  });

  describe('ExecutionError', () => {
    it('should default to EXECUTION_ERROR code', () => {
      const error = new ExecutionError('generic error');

      expect(error.name).toBe('ExecutionError');
      expect(error.code).toBe(ExecutionErrorCode.EXECUTION_ERROR);
      expect(error).toBeInstanceOf(TablewiseError);
    });

    it('should handle cancellation', () => {
      const error = new ExecutionError('session expired', {
        code: ExecutionErrorCode.CANCELLED,
        context: { sessionId: 's-1' },
      });

      expect(error.code).toBe(ExecutionErrorCode.CANCELLED);
      expect(error.context).toEqual({ sessionId: 's-1' });
    });

    it('should wrap unknown values and keep existing instances', () => {
      const wrapped = ExecutionError.from('boom', ExecutionErrorCode.TIMEOUT);
      expect(wrapped.message).toBe('boom');
      expect(wrapped.code).toBe(ExecutionErrorCode.TIMEOUT);

      const existing = new ExecutionError('existing');
      expect(ExecutionError.from(existing)).toBe(existing);
    });
  });

  describe('ConfigurationError', () => {
    it('should handle missing API key', () => {
      const error = new ConfigurationError('OPENAI_API_KEY not set', {
        code: ConfigurationErrorCode.MISSING_API_KEY,
        context: { envVar: 'OPENAI_API_KEY' },
      });

      expect(error.name).toBe('ConfigurationError');
      expect(error.code).toBe(ConfigurationErrorCode.MISSING_API_KEY);
      expect(error.context).toEqual({ envVar: 'OPENAI_API_KEY' });
    });

    it('should wrap errors with a specific code', () => {
      const error = ConfigurationError.from(new Error('bad yaml'), ConfigurationErrorCode.INVALID_CONFIG);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error.code).toBe(ConfigurationErrorCode.INVALID_CONFIG);
      expect(error.cause?.message).toBe('bad yaml');
    });
  });

  describe('ProviderError', () => {
    it('should be retryable for transient codes only', () => {
      expect(new ProviderError('slow down', { code: ProviderErrorCode.RATE_LIMIT }).isRetryable).toBe(true);
      expect(new ProviderError('timed out', { code: ProviderErrorCode.TIMEOUT }).isRetryable).toBe(true);
      expect(new ProviderError('down', { code: ProviderErrorCode.UNAVAILABLE }).isRetryable).toBe(true);
      expect(new ProviderError('bad request', { code: ProviderErrorCode.API_ERROR }).isRetryable).toBe(false);
      expect(new ProviderError('generic').isRetryable).toBe(false);
    });
  });

  describe('isRetryable', () => {
    it('should return false by default for non-provider errors', () => {
      const errors = [
        new TablewiseError('test', { code: ExecutionErrorCode.EXECUTION_ERROR }),
        new ExecutionError('test'),
        new ConfigurationError('test'),
      ];

      for (const error of errors) {
        expect(error.isRetryable).toBe(false);
      }
    });
  });

  describe('utils', () => {
    it('normalizeError should wrap non-errors', () => {
      const error = normalizeError(42);

      expect(error).toBeInstanceOf(Error);
      expect(error.message).toBe('42');
    });

    it('isAbortError should detect AbortError names and aborted signals', () => {
      const abortError = new Error('aborted');
      abortError.name = 'AbortError';
      const controller = new AbortController();
      controller.abort();

      expect(isAbortError(abortError)).toBe(true);
      expect(isAbortError(new Error('other'), controller.signal)).toBe(true);
      expect(isAbortError(new Error('other'))).toBe(false);
    });
  });
});

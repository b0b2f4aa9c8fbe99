export { type Provider, type ProviderType } from './types';

export type {
  ExecutionOptions,
  ExecutionStatus,
  SimpleExecution,
  SimpleResult,
} from '../execution';

export { combineSignals } from '../execution';

export { BaseProvider } from './base-provider';

export { createGoogleProvider, GoogleProvider, type GoogleProviderConfig } from './google';

export { createOpenAIProvider, OpenAIProvider, type OpenAIProviderConfig } from './openai';

export { toProviderError } from './errors';

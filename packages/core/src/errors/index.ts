export {
  ExecutionErrorCode,
  ConfigurationErrorCode,
  ProviderErrorCode,
  type CoreErrorCode,
} from './types';

export type {
  TablewiseErrorOptions,
  ErrorOptions,
  ExecutionErrorOptions,
  ConfigurationErrorOptions,
  ProviderErrorOptions,
} from './types';

export { TablewiseError, ExecutionError, ConfigurationError, ProviderError } from './types';

export { wrapAsError, normalizeError, isAbortError } from './utils';

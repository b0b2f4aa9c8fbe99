import {
  ConfigurationError,
  ConfigurationErrorCode,
  createGoogleProvider,
  createOpenAIProvider,
  type Provider,
} from '@tablewise/core'
import { API_KEY_ENV } from './loader'
import type { BookingConfig } from './schema'

/**
 * @throws ConfigurationError MISSING_API_KEY when no key was configured
 */
export function createProviderFromConfig(config: BookingConfig): Provider {
  const { llm } = config

  if (!llm.apiKey) {
    throw new ConfigurationError(
      `API key not found for ${llm.provider}.\n\n` +
        `Set the ${API_KEY_ENV[llm.provider]} environment variable or provide llm.apiKey in config.`,
      { code: ConfigurationErrorCode.MISSING_API_KEY, context: { provider: llm.provider } }
    )
  }

  if (llm.provider === 'openai') {
    return createOpenAIProvider({ apiKey: llm.apiKey }).withDefaultModel(llm.model)
  }
  return createGoogleProvider({ apiKey: llm.apiKey }).withDefaultModel(llm.model)
}

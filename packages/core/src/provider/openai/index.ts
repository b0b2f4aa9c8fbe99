/**
 * OpenAI Provider Module
 */

export { createOpenAIProvider, OpenAIProvider, type OpenAIProviderConfig } from './factory';

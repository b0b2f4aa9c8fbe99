export {
  SessionSummary,
  type LLMCallRecord,
  type GenerateTextParams,
  type GenerationOptions,
  type ToolSet,
} from './types';

export { mergeUsages, createZeroUsage, toTokenUsage } from './usage';

export { SimpleSession, type SimpleSessionOptions } from './simple-session';

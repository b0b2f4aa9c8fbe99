import type { LanguageModelUsage } from 'ai';
import type { TokenUsage } from '../observability/types';

export function createZeroUsage(): TokenUsage {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
}

/**
 * Flattens the AI SDK usage shape. Missing figures count as zero.
 */
export function toTokenUsage(usage: LanguageModelUsage | undefined): TokenUsage {
  if (!usage) {
    return createZeroUsage();
  }
  const inputTokens = usage.inputTokens ?? 0;
  const outputTokens = usage.outputTokens ?? 0;
  return {
    inputTokens,
    outputTokens,
    totalTokens: usage.totalTokens ?? inputTokens + outputTokens,
  };
}

export function mergeUsages(usages: readonly TokenUsage[]): TokenUsage {
  return usages.reduce<TokenUsage>(
    (acc, usage) => ({
      inputTokens: acc.inputTokens + usage.inputTokens,
      outputTokens: acc.outputTokens + usage.outputTokens,
      totalTokens: acc.totalTokens + usage.totalTokens,
    }),
    createZeroUsage()
  );
}

/**
 * Token counts for one or more LLM calls.
 * Providers that do not report a figure leave it at 0.
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Metadata collected during an execution.
 * Available after execution completes via `getSummary()`.
 */
export interface ExecutionMetadata {
  duration: number;
  usage?: TokenUsage;
  [key: string]: unknown;
}

import type { UserProfile } from '../profiles/types'
import type { ToolSpec } from '../tools/registry'
import type { ChatMessage } from './types'

/**
 * What the language model wants to do next. Untrusted: tool names and
 * arguments are validated by the orchestrator before anything runs.
 */
export type ModelDecision =
  | { type: 'reply'; text: string }
  | { type: 'tool_call'; tool: string; arguments: unknown }

export interface DecideRequest {
  history: ChatMessage[]
  tools: ToolSpec[]
  profile?: UserProfile
  /** Current date at the restaurants, YYYY-MM-DD. */
  today: string
  signal?: AbortSignal
}

export interface IntentModel {
  decide(request: DecideRequest): Promise<ModelDecision>
}

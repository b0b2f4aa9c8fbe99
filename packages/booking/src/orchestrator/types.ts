import type { Slot } from '../availability/slot'
import type { ToolResult } from '../tools/execute'
import type { ToolCall, ToolName } from '../tools/registry'

/**
 * A side-effect tool call waiting for the user's yes or no.
 */
export interface Proposal {
  id: string
  call: ToolCall
  /** book_table only: the hold placed when the booking was proposed. */
  holdToken?: string
  /** book_table only: derived from the session and proposal ids. */
  idempotencyKey?: string
  /** What the user is asked to confirm. */
  summary: string
}

export type OrchestratorState =
  | { kind: 'idle' }
  | { kind: 'resolving' }
  | { kind: 'awaiting_intent' }
  | { kind: 'tool_proposed'; proposal: Proposal }
  | { kind: 'tool_confirmed'; proposal: Proposal }
  | { kind: 'tool_executing'; call: ToolCall }
  | { kind: 'responding' }
  | { kind: 'expired' }

export type StateKind = OrchestratorState['kind']

export type ChatMessage =
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string }
  | { role: 'tool'; callId: string; tool: ToolName; args: unknown; result: ToolResult }

export interface ConversationSession {
  id: string
  userId: string | null
  state: OrchestratorState
  history: ChatMessage[]
  /** Slots this session has been shown by check_availability. */
  offers: Map<string, Slot>
  /** Aborted when the session expires. */
  controller: AbortController
  createdAt: number
  lastActiveAt: number
}

export type ConfirmAction = 'confirm' | 'decline'

export interface InboundMessage {
  sessionId: string
  text: string
  /** Contact string supplied by the transport, e.g. a signed-in email. */
  identity?: string
  /** Structured answer to a pending proposal, e.g. from a button. */
  action?: ConfirmAction
}

export interface OrchestratorReply {
  sessionId: string
  text: string
  state: StateKind
  suggestions: string[]
  toolResults: ToolResult[]
  /** The previous session under this id had expired. */
  renewed: boolean
}

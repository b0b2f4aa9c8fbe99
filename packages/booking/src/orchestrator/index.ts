export * from './types'
export * from './intent-model'
export * from './llm-intent-model'
export * from './replies'
export {
  SessionStore,
  DEFAULT_SESSION_TIMEOUT_MINUTES,
  DEFAULT_SWEEP_INTERVAL_SECONDS,
  type SessionStoreOptions,
} from './session-store'
export {
  ConversationOrchestrator,
  DEFAULT_HISTORY_WINDOW,
  DEFAULT_MAX_TOOL_STEPS,
  type OrchestratorOptions,
} from './orchestrator'

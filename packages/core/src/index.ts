// @tablewise/core
// Provider, session and execution plumbing over the AI SDK, plus the shared error,
// logging and concurrency primitives the booking engine is built on.

// =============================================================================
// Errors
// =============================================================================

export * from './errors';

// =============================================================================
// Provider
// =============================================================================

export * from './provider';

// =============================================================================
// Session
// =============================================================================

export * from './session';

// =============================================================================
// Observability
// =============================================================================

export * from './observability';

// =============================================================================
// Utilities
// =============================================================================

export * from './utils';

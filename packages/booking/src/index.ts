// @tablewise/booking
// Catalog, availability, reservation ledger, profiles and the tool-calling
// conversation orchestrator for restaurant bookings.

// =============================================================================
// Errors
// =============================================================================

export * from './errors'

// =============================================================================
// Domain
// =============================================================================

export * from './catalog'
export * from './availability'
export * from './ledger'
export * from './profiles'
export * from './recommender'

// =============================================================================
// Tools & orchestration
// =============================================================================

export * from './tools'
export * from './orchestrator'

// =============================================================================
// Configuration & wiring
// =============================================================================

export * from './config'
export { createBookingSystem, type BookingSystem, type BookingSystemOptions } from './system'
export { readJsonFile, writeJsonFileAtomic } from './storage/json-file'

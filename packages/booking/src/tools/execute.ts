import {
  ExecutionError,
  ExecutionErrorCode,
  RetryExhaustedError,
  noopLogger,
  withRetryResult,
  type Clock,
  type Logger,
  type RetryOptions,
} from '@tablewise/core'
import type { AvailabilityEngine, TimeWindow } from '../availability/availability-engine'
import type { Slot } from '../availability/slot'
import { dateFromClock } from '../availability/time'
import { requireRestaurant, type CatalogStore } from '../catalog/catalog-store'
import type { Restaurant } from '../catalog/schema'
import { BookingError, BookingErrorCode, ValidationError } from '../errors'
import type { Ack, Reservation } from '../ledger/types'
import type { ReservationLedger } from '../ledger/ledger'
import type { ProfileResolver } from '../profiles/profile-resolver'
import type { Recommendation, Recommender } from '../recommender/recommender'
import type { ToolArgs, ToolCall, ToolName } from './registry'

/** Slots surfaced per availability check. */
export const MAX_OFFERED_SLOTS = 5

export const DEFAULT_TOOL_RETRY: Pick<RetryOptions, 'maxAttempts' | 'baseDelayMs'> = {
  maxAttempts: 3,
  baseDelayMs: 100,
}

export interface BookingServices {
  catalog: CatalogStore
  engine: AvailabilityEngine
  ledger: ReservationLedger
  profiles: ProfileResolver
  recommender: Recommender
  clock: Clock
}

export interface ToolContext {
  services: BookingServices
  userId: string
  sessionId?: string
  /** Slots this session has been shown, by id. check_availability adds to it. */
  offers: Map<string, Slot>
  /** Present when a confirmed book_table runs against a hold. */
  booking?: { holdToken: string; idempotencyKey: string }
  retry?: Partial<RetryOptions>
  logger?: Logger
  signal?: AbortSignal
}

export interface RestaurantSummary {
  id: string
  name: string
  cuisine: string
  priceTier: Restaurant['priceTier']
  location: string
  rating: number
  features: string[]
}

export interface ToolOutputs {
  search_restaurants: { restaurants: RestaurantSummary[] }
  get_restaurant_details: { restaurant: Restaurant }
  check_availability: {
    restaurantId: string
    restaurantName: string
    date: string
    partySize: number
    slots: Slot[]
    /** More free slots exist beyond the ones surfaced. */
    more: boolean
  }
  recommend_restaurants: {
    recommendations: Array<{ restaurant: RestaurantSummary; score: number; matched: string[] }>
  }
  list_reservations: { reservations: Reservation[] }
  book_table: { reservation: Reservation }
  cancel_reservation: { ack: Ack }
  update_preferences: { dietaryPreferences: string[] }
}

export interface ToolFailure {
  code: BookingErrorCode
  message: string
  retryable: boolean
  suggestion?: string
  issues?: string[]
}

export type ToolSuccess<K extends ToolName = ToolName> = { [P in K]: { ok: true; tool: P; data: ToolOutputs[P] } }[K]

export type ToolResult =
  | ToolSuccess
  | { ok: false; tool: ToolName; error: ToolFailure }

export function summarizeRestaurant(restaurant: Restaurant): RestaurantSummary {
  const { id, name, cuisine, priceTier, location, rating, features } = restaurant
  return { id, name, cuisine, priceTier, location, rating, features }
}

function summarizeRecommendations(
  ranked: Recommendation[]
): ToolOutputs['recommend_restaurants']['recommendations'] {
  return ranked.map((r) => ({ restaurant: summarizeRestaurant(r.restaurant), score: r.score, matched: r.matched }))
}

const RESEARCH_SUGGESTION = 'Check availability again for another time or table'

export function toToolFailure(error: BookingError): ToolFailure {
  const failure: ToolFailure = {
    code: error.code,
    message: error.message,
    retryable: error.isRetryable,
  }
  switch (error.code) {
    case BookingErrorCode.SLOT_CONFLICT:
    case BookingErrorCode.HOLD_EXPIRED:
      failure.suggestion = RESEARCH_SUGGESTION
      break
    case BookingErrorCode.UPSTREAM_UNAVAILABLE:
      failure.message = 'The booking service is unavailable right now'
      failure.suggestion = 'Try again in a moment'
      break
    case BookingErrorCode.VALIDATION_ERROR:
      if (error instanceof ValidationError) {
        failure.issues = error.issues
      }
      break
  }
  return failure
}

/**
 * Runs a validated tool call. Booking errors come back as `{ ok: false }`
 * values; storage faults are retried with backoff first. An aborted signal
 * throws ExecutionError CANCELLED, and any other error propagates.
 */
export async function executeTool(call: ToolCall, context: ToolContext): Promise<ToolResult> {
  const logger = context.logger ?? noopLogger
  const startedAt = Date.now()
  let attempts = 0

  logger.onToolCallStart?.({
    type: 'tool_call_start',
    toolName: call.tool,
    sessionId: context.sessionId,
    timestamp: startedAt,
    arguments: call.args,
  })

  const finish = (success: boolean, errorCode?: string) =>
    logger.onToolCallEnd?.({
      type: 'tool_call_end',
      toolName: call.tool,
      sessionId: context.sessionId,
      timestamp: Date.now(),
      duration: Date.now() - startedAt,
      attempts,
      success,
      errorCode,
    })

  try {
    const { value } = await withRetryResult(
      async (attempt) => {
        attempts = attempt
        throwIfAborted(context.signal)
        return dispatch(call, context)
      },
      {
        ...DEFAULT_TOOL_RETRY,
        ...context.retry,
        onRetry: ({ attempt, delayMs, error }) => {
          logger.log?.('warn', `tool ${call.tool} retry ${attempt}`, {
            delayMs,
            error: error instanceof Error ? error.message : String(error),
          })
          context.retry?.onRetry?.({ attempt, delayMs, error })
        },
      }
    )
    finish(true)
    return value
  } catch (caught) {
    const error = caught instanceof RetryExhaustedError ? caught.lastError : caught
    if (error instanceof BookingError) {
      finish(false, error.code)
      return { ok: false, tool: call.tool, error: toToolFailure(error) }
    }
    finish(false, error instanceof ExecutionError ? error.code : undefined)
    throw error
  }
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new ExecutionError('Tool call cancelled', { code: ExecutionErrorCode.CANCELLED })
  }
}

type Handlers = { [K in ToolName]: (args: ToolArgs[K], context: ToolContext) => Promise<ToolOutputs[K]> }

const handlers: Handlers = {
  async search_restaurants(args, { services }) {
    const restaurants = await services.catalog.search(args)
    return { restaurants: restaurants.map(summarizeRestaurant) }
  },

  async get_restaurant_details(args, { services }) {
    return { restaurant: await requireRestaurant(services.catalog, args.restaurantId) }
  },

  async check_availability(args, context) {
    const { services } = context
    const restaurant = await requireRestaurant(services.catalog, args.restaurantId)
    const date = resolveDate(args.date, services.clock)
    const window: TimeWindow =
      args.time ?? (args.timeFrom && args.timeTo ? { from: args.timeFrom, to: args.timeTo } : { from: '00:00', to: '23:59' })

    const slots: Slot[] = []
    let more = false
    for await (const slot of services.engine.findSlots(restaurant.id, date, window, args.partySize)) {
      if (slots.length === MAX_OFFERED_SLOTS) {
        more = true
        break
      }
      slots.push(slot)
    }
    for (const slot of slots) {
      context.offers.set(slot.id, slot)
    }
    return { restaurantId: restaurant.id, restaurantName: restaurant.name, date, partySize: args.partySize, slots, more }
  },

  async recommend_restaurants({ similarTo, ...args }, { services, userId }) {
    if (similarTo) {
      const target = await requireRestaurant(services.catalog, similarTo)
      return { recommendations: summarizeRecommendations(await services.recommender.similarTo(target.id)) }
    }
    const profile = await services.profiles.get(userId)
    const past = await services.ledger.listForUser(userId, { includeInactive: true })
    const pastCuisines: string[] = []
    for (const reservation of past) {
      const restaurant = await services.catalog.get(reservation.restaurantId)
      if (restaurant) {
        pastCuisines.push(restaurant.cuisine)
      }
    }
    const ranked = await services.recommender.recommend({ ...args, profile, pastCuisines })
    return { recommendations: summarizeRecommendations(ranked) }
  },

  async list_reservations(_args, { services, userId }) {
    return { reservations: await services.ledger.listForUser(userId) }
  },

  async book_table(args, { services, userId, booking }) {
    if (!booking) {
      throw new ValidationError('book_table needs a confirmed hold')
    }
    const reservation = await services.ledger.commit(booking.holdToken, userId, booking.idempotencyKey, {
      partySize: args.partySize,
      specialRequests: args.specialRequests,
    })
    return { reservation }
  },

  async cancel_reservation(args, { services, userId }) {
    return { ack: await services.ledger.cancel(args.reservationId, userId) }
  },

  async update_preferences(args, { services, userId }) {
    const profile = await services.profiles.updatePreferences(userId, args.dietaryPreferences)
    return { dietaryPreferences: profile.dietaryPreferences }
  },
}

async function dispatch(call: ToolCall, context: ToolContext): Promise<ToolResult> {
  switch (call.tool) {
    case 'search_restaurants':
      return { ok: true, tool: call.tool, data: await handlers.search_restaurants(call.args, context) }
    case 'get_restaurant_details':
      return { ok: true, tool: call.tool, data: await handlers.get_restaurant_details(call.args, context) }
    case 'check_availability':
      return { ok: true, tool: call.tool, data: await handlers.check_availability(call.args, context) }
    case 'recommend_restaurants':
      return { ok: true, tool: call.tool, data: await handlers.recommend_restaurants(call.args, context) }
    case 'list_reservations':
      return { ok: true, tool: call.tool, data: await handlers.list_reservations(call.args, context) }
    case 'book_table':
      return { ok: true, tool: call.tool, data: await handlers.book_table(call.args, context) }
    case 'cancel_reservation':
      return { ok: true, tool: call.tool, data: await handlers.cancel_reservation(call.args, context) }
    case 'update_preferences':
      return { ok: true, tool: call.tool, data: await handlers.update_preferences(call.args, context) }
  }
}

function resolveDate(date: string, clock: Clock): string {
  if (date === 'today') {
    return dateFromClock(clock)
  }
  if (date === 'tomorrow') {
    return dateFromClock(clock, 1)
  }
  return date
}

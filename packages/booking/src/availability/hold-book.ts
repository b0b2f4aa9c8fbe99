import { randomUUID } from 'node:crypto'
import { EventEmitter } from 'node:events'
import { noopLogger, systemClock, type Clock, type Logger } from '@tablewise/core'
import { slotRange, type Slot } from './slot'
import { overlaps, type MinuteRange } from './time'

export const DEFAULT_HOLD_TTL_SECONDS = 180

/** How long a finished token is remembered, so a late commit can still be explained. */
const RETIRED_RETENTION_MS = 15 * 60 * 1000

export interface Hold {
  token: string
  slot: Slot
  ownerId: string
  createdAt: number
  expiresAt: number
}

export type RetiredReason = 'released' | 'expired' | 'converted'

export type HoldLookup =
  | { status: 'live'; hold: Hold }
  | { status: RetiredReason; hold: Hold }
  | { status: 'unknown' }

export type HoldEventMap = {
  'hold.created': [hold: Hold]
  'hold.released': [hold: Hold]
  'hold.expired': [hold: Hold]
  'hold.converted': [hold: Hold, reservationId: string]
}

export interface HoldBookOptions {
  clock?: Clock
  logger?: Logger
  /** Schedule unref'd timers that announce expiry. Reads purge lazily either way. */
  scheduleExpiry?: boolean
}

interface RetiredHold {
  hold: Hold
  reason: RetiredReason
  retiredAt: number
}

/**
 * Registry of short-lived exclusive claims on slots.
 *
 * Expired holds are treated as absent by every read. The book does not check
 * conflicts itself: callers take the table/day lock and ask {@link overlapping}
 * first, so that hold, commit and cancel observe one order per table.
 */
export class HoldBook {
  readonly events = new EventEmitter<HoldEventMap>()

  private readonly live = new Map<string, Hold>()
  private readonly retired = new Map<string, RetiredHold>()
  private readonly timers = new Map<string, NodeJS.Timeout>()
  private readonly clock: Clock
  private readonly logger: Logger
  private readonly scheduleTimers: boolean

  constructor(options: HoldBookOptions = {}) {
    this.clock = options.clock ?? systemClock
    this.logger = options.logger ?? noopLogger
    this.scheduleTimers = options.scheduleExpiry ?? true
  }

  create(slot: Slot, ownerId: string, ttlSeconds: number = DEFAULT_HOLD_TTL_SECONDS): Hold {
    this.purgeExpired()
    const now = this.clock.now()
    const hold: Hold = {
      token: randomUUID(),
      slot,
      ownerId,
      createdAt: now,
      expiresAt: now + ttlSeconds * 1000,
    }
    this.live.set(hold.token, hold)
    this.schedule(hold)
    this.logger.log?.('debug', `hold created ${slot.id}`, { token: hold.token, ownerId, ttlSeconds })
    this.events.emit('hold.created', hold)
    return hold
  }

  /** Live hold for the token, if any. */
  get(token: string): Hold | undefined {
    this.purgeExpired()
    return this.live.get(token)
  }

  lookup(token: string): HoldLookup {
    this.purgeExpired()
    const hold = this.live.get(token)
    if (hold) {
      return { status: 'live', hold }
    }
    const retired = this.retired.get(token)
    if (retired) {
      return { status: retired.reason, hold: retired.hold }
    }
    return { status: 'unknown' }
  }

  /**
   * Drops a live hold early. Returns false when the token is not live.
   */
  release(token: string): boolean {
    this.purgeExpired()
    const hold = this.live.get(token)
    if (!hold) {
      return false
    }
    this.retire(hold, 'released')
    this.logger.log?.('debug', `hold released ${hold.slot.id}`, { token })
    this.events.emit('hold.released', hold)
    return true
  }

  /**
   * Marks a hold as turned into a reservation. The caller checked it was live
   * under the table/day lock, so a deadline passing since then does not matter.
   */
  convert(hold: Hold, reservationId: string): void {
    this.retire(hold, 'converted')
    this.events.emit('hold.converted', hold, reservationId)
  }

  /** Live holds on the same table and date whose ranges intersect `range`. */
  overlapping(restaurantId: string, tableId: string, date: string, range: MinuteRange): Hold[] {
    this.purgeExpired()
    return [...this.live.values()].filter(
      (h) =>
        h.slot.restaurantId === restaurantId &&
        h.slot.tableId === tableId &&
        h.slot.date === date &&
        overlaps(slotRange(h.slot), range)
    )
  }

  hasLiveHolds(restaurantId: string, tableId: string): boolean {
    this.purgeExpired()
    return [...this.live.values()].some(
      (h) => h.slot.restaurantId === restaurantId && h.slot.tableId === tableId
    )
  }

  get size(): number {
    this.purgeExpired()
    return this.live.size
  }

  /**
   * Expires every live hold whose deadline has passed.
   * Called by every read; the timers only make the event prompt.
   */
  purgeExpired(): void {
    const now = this.clock.now()
    for (const hold of this.live.values()) {
      if (hold.expiresAt <= now) {
        this.retire(hold, 'expired')
        this.logger.log?.('info', `hold expired ${hold.slot.id}`, { token: hold.token })
        this.events.emit('hold.expired', hold)
      }
    }
    for (const [token, entry] of this.retired) {
      if (now - entry.retiredAt > RETIRED_RETENTION_MS) {
        this.retired.delete(token)
      }
    }
  }

  dispose(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer)
    }
    this.timers.clear()
    this.events.removeAllListeners()
  }

  private retire(hold: Hold, reason: RetiredReason): void {
    this.live.delete(hold.token)
    this.retired.set(hold.token, { hold, reason, retiredAt: this.clock.now() })
    const timer = this.timers.get(hold.token)
    if (timer) {
      clearTimeout(timer)
      this.timers.delete(hold.token)
    }
  }

  private schedule(hold: Hold): void {
    if (!this.scheduleTimers) {
      return
    }
    const delay = Math.max(0, hold.expiresAt - this.clock.now())
    const timer = setTimeout(() => {
      this.timers.delete(hold.token)
      this.purgeExpired()
    }, delay)
    timer.unref()
    this.timers.set(hold.token, timer)
  }
}

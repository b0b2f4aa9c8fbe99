import { createKeyedMutex, noopLogger, type KeyedMutex, type Logger } from '@tablewise/core'
import { catalogKey, requireRestaurant, type CatalogStore } from '../catalog/catalog-store'
import type { Restaurant } from '../catalog/schema'
import { NotFoundError, ValidationError } from '../errors'
import { DEFAULT_HOLD_TTL_SECONDS, type HoldBook } from './hold-book'
import { parseSlotId, slotId, slotRange, tableDayKey, type Slot } from './slot'
import { compareNatural, fromMinutes, isDate, toMinutes, type MinuteRange } from './time'

export const DEFAULT_SLOT_INTERVAL_MINUTES = 30
export const DEFAULT_DINING_MINUTES = 90

/**
 * A single 'HH:mm' asks for exactly that start time;
 * a `{ from, to }` window is inclusive at both ends.
 */
export type TimeWindow = string | { from: string; to: string }

/**
 * Occupancy lookup the engine consults. Implemented by the ledger.
 */
export interface BookedIndex {
  isBooked(restaurantId: string, tableId: string, date: string, range: MinuteRange): Promise<boolean>
  /** Booked, or claimed by a live hold. */
  isOccupied(restaurantId: string, tableId: string, date: string, range: MinuteRange): Promise<boolean>
}

export type HoldResult =
  | { status: 'held'; token: string; slot: Slot; expiresAt: number }
  | { status: 'conflict'; reason: 'booked' | 'held'; slot: Slot }

export interface HoldRequest {
  ownerId: string
  ttlSeconds?: number
}

/**
 * Lazy, restartable sequence of free slots.
 * Nothing is read until iteration starts; each iteration recomputes from current state.
 */
export interface SlotQuery extends AsyncIterable<Slot> {
  toArray(): Promise<Slot[]>
}

export interface AvailabilityEngineOptions {
  catalog: CatalogStore
  holds: HoldBook
  booked: BookedIndex
  /** Shared with the ledger so hold, commit and cancel serialize per table and day. */
  locks?: KeyedMutex
  slotIntervalMinutes?: number
  diningMinutes?: number
  holdTtlSeconds?: number
  logger?: Logger
}

interface Candidate {
  time: string
  tableId: string
  seats: number
}

export class AvailabilityEngine {
  readonly locks: KeyedMutex
  readonly diningMinutes: number
  private readonly catalog: CatalogStore
  private readonly holds: HoldBook
  private readonly booked: BookedIndex
  private readonly slotIntervalMinutes: number
  private readonly holdTtlSeconds: number
  private readonly logger: Logger

  constructor(options: AvailabilityEngineOptions) {
    this.catalog = options.catalog
    this.holds = options.holds
    this.booked = options.booked
    this.locks = options.locks ?? createKeyedMutex()
    this.slotIntervalMinutes = options.slotIntervalMinutes ?? DEFAULT_SLOT_INTERVAL_MINUTES
    this.diningMinutes = options.diningMinutes ?? DEFAULT_DINING_MINUTES
    this.holdTtlSeconds = options.holdTtlSeconds ?? DEFAULT_HOLD_TTL_SECONDS
    this.logger = options.logger ?? noopLogger
  }

  /**
   * Free slots at a restaurant (id or exact name) for a party.
   *
   * Ordered by exact seat match, then start time, then table id.
   * A party larger than every table yields nothing.
   */
  findSlots(restaurantIdOrName: string, date: string, window: TimeWindow, partySize: number): SlotQuery {
    const iterate = () => this.freeSlots(restaurantIdOrName, date, window, partySize)
    return {
      [Symbol.asyncIterator]: iterate,
      async toArray() {
        const slots: Slot[] = []
        for await (const slot of iterate()) {
          slots.push(slot)
        }
        return slots
      },
    }
  }

  /**
   * Builds the slot for an id, checking the table and opening hours.
   */
  async resolveSlot(id: string): Promise<Slot> {
    const ref = parseSlotId(id)
    const restaurant = await requireRestaurant(this.catalog, ref.restaurantId)
    const table = restaurant.tables.find((t) => t.id === ref.tableId)
    if (!table) {
      throw new NotFoundError('Table', `${restaurant.id}/${ref.tableId}`)
    }
    const start = toMinutes(ref.time)
    if (start < toMinutes(restaurant.hours.open) || start + this.diningMinutes > toMinutes(restaurant.hours.close)) {
      throw new ValidationError(`${restaurant.name} does not seat at ${ref.time}`)
    }
    return this.toSlot(restaurant, ref.date, { time: ref.time, tableId: table.id, seats: table.seats })
  }

  /**
   * Places an exclusive hold. Refused when a booked reservation or another
   * live hold overlaps the slot's table range.
   *
   * @throws NotFoundError when the table left the catalog before the hold was placed
   */
  async hold(slotOrId: Slot | string, request: HoldRequest): Promise<HoldResult> {
    const requested = typeof slotOrId === 'string' ? await this.resolveSlot(slotOrId) : slotOrId

    return this.locks.runExclusive<HoldResult>(catalogKey(requested.restaurantId), async () => {
      // re-read under the catalog lock: an edit may have removed or shrunk the table
      const slot = await this.resolveSlot(requested.id)

      return this.locks.runExclusive<HoldResult>(tableDayKey(slot), async () => {
        const range = slotRange(slot)
        if (await this.booked.isBooked(slot.restaurantId, slot.tableId, slot.date, range)) {
          this.logger.log?.('info', `hold refused ${slot.id}`, { reason: 'booked' })
          return { status: 'conflict', reason: 'booked', slot }
        }
        if (this.holds.overlapping(slot.restaurantId, slot.tableId, slot.date, range).length > 0) {
          this.logger.log?.('info', `hold refused ${slot.id}`, { reason: 'held' })
          return { status: 'conflict', reason: 'held', slot }
        }
        const hold = this.holds.create(slot, request.ownerId, request.ttlSeconds ?? this.holdTtlSeconds)
        return { status: 'held', token: hold.token, slot, expiresAt: hold.expiresAt }
      })
    })
  }

  async release(token: string): Promise<boolean> {
    const hold = this.holds.get(token)
    if (!hold) {
      return false
    }
    return this.locks.runExclusive(tableDayKey(hold.slot), () => this.holds.release(token))
  }

  private async *freeSlots(
    restaurantIdOrName: string,
    date: string,
    window: TimeWindow,
    partySize: number
  ): AsyncGenerator<Slot> {
    const restaurant = await requireRestaurant(this.catalog, restaurantIdOrName)
    for (const candidate of this.candidates(restaurant, date, window, partySize)) {
      const slot = this.toSlot(restaurant, date, candidate)
      if (await this.isFree(slot)) {
        yield slot
      }
    }
  }

  private candidates(restaurant: Restaurant, date: string, window: TimeWindow, partySize: number): Candidate[] {
    if (!isDate(date)) {
      throw new ValidationError(`Invalid date '${date}', expected YYYY-MM-DD`)
    }
    if (!Number.isInteger(partySize) || partySize < 1) {
      throw new ValidationError('Party size must be a whole number of at least 1')
    }

    const times = this.candidateTimes(restaurant, window)
    const tables = restaurant.tables.filter((t) => t.seats >= partySize)
    const candidates = times.flatMap((time) => tables.map((t) => ({ time, tableId: t.id, seats: t.seats })))

    return candidates.sort((a, b) => {
      const exactA = a.seats === partySize ? 0 : 1
      const exactB = b.seats === partySize ? 0 : 1
      return exactA - exactB || toMinutes(a.time) - toMinutes(b.time) || compareNatural(a.tableId, b.tableId)
    })
  }

  private candidateTimes(restaurant: Restaurant, window: TimeWindow): string[] {
    const open = toMinutes(restaurant.hours.open)
    const lastStart = toMinutes(restaurant.hours.close) - this.diningMinutes

    if (typeof window === 'string') {
      const start = toMinutes(window)
      return start >= open && start <= lastStart ? [window] : []
    }

    const from = toMinutes(window.from)
    const to = toMinutes(window.to)
    if (from > to) {
      throw new ValidationError(`Time window ${window.from}-${window.to} ends before it starts`)
    }

    const times: string[] = []
    for (let start = open; start <= lastStart; start += this.slotIntervalMinutes) {
      if (start >= from && start <= to) {
        times.push(fromMinutes(start))
      }
    }
    return times
  }

  private toSlot(restaurant: Restaurant, date: string, candidate: Candidate): Slot {
    const ref = { restaurantId: restaurant.id, tableId: candidate.tableId, date, time: candidate.time }
    return {
      id: slotId(ref),
      ...ref,
      durationMinutes: this.diningMinutes,
      seats: candidate.seats,
    }
  }

  private async isFree(slot: Slot): Promise<boolean> {
    return !(await this.booked.isOccupied(slot.restaurantId, slot.tableId, slot.date, slotRange(slot)))
  }
}

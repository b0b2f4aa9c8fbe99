import { randomUUID } from 'node:crypto'
import { createKeyedMutex, noopLogger, systemClock, type Clock, type KeyedMutex, type Logger } from '@tablewise/core'
import type { BookedIndex } from '../availability/availability-engine'
import type { HoldBook } from '../availability/hold-book'
import { slotRange, tableDayKey, type Slot } from '../availability/slot'
import { compareNatural, overlaps, type MinuteRange } from '../availability/time'
import {
  BookingError,
  HoldExpiredError,
  NotFoundError,
  NotOwnerError,
  SlotConflictError,
  UpstreamUnavailableError,
  ValidationError,
} from '../errors'
import type { ReservationRepository } from './repository'
import { ACTIVE_STATUSES, type Ack, type CommitDetails, type ListOptions, type Reservation } from './types'

export interface ReservationLedgerOptions {
  repository: ReservationRepository
  holds: HoldBook
  /** Must be the mutex the availability engine holds under. */
  locks?: KeyedMutex
  clock?: Clock
  logger?: Logger
  generateId?: () => string
}

/**
 * The durable record of bookings and the only writer of booked status.
 *
 * Every mutation runs inside the (restaurant, table, date) critical section
 * and is all-or-nothing: a failed write leaves the hold and the store as they were.
 */
export class ReservationLedger implements BookedIndex {
  private readonly repository: ReservationRepository
  private readonly holds: HoldBook
  private readonly locks: KeyedMutex
  private readonly clock: Clock
  private readonly logger: Logger
  private readonly generateId: () => string

  constructor(options: ReservationLedgerOptions) {
    this.repository = options.repository
    this.holds = options.holds
    this.locks = options.locks ?? createKeyedMutex()
    this.clock = options.clock ?? systemClock
    this.logger = options.logger ?? noopLogger
    this.generateId = options.generateId ?? randomUUID
  }

  /**
   * Turns a live hold into a confirmed reservation.
   *
   * A repeated call with the same user and idempotency key returns the
   * reservation stored by the first call, unchanged.
   *
   * @throws SlotConflictError when a booked reservation overlaps the held range
   * @throws HoldExpiredError when the hold is unknown, expired, released or someone else's
   * @throws ValidationError when the party does not fit the table
   * @throws UpstreamUnavailableError when the repository fails
   */
  async commit(
    holdToken: string,
    userId: string,
    idempotencyKey: string,
    details: CommitDetails
  ): Promise<Reservation> {
    const replay = await this.read(() => this.repository.findByIdempotencyKey(userId, idempotencyKey))
    if (replay) {
      return replay
    }

    const lookup = this.holds.lookup(holdToken)
    if (lookup.status === 'unknown') {
      throw new HoldExpiredError(undefined, { context: { holdToken } })
    }
    const slot = lookup.hold.slot

    return this.locks.runExclusive(tableDayKey(slot), async () => {
      const raced = await this.read(() => this.repository.findByIdempotencyKey(userId, idempotencyKey))
      if (raced) {
        return raced
      }

      if (await this.isBooked(slot.restaurantId, slot.tableId, slot.date, slotRange(slot))) {
        this.logger.log?.('warn', `commit conflict ${slot.id}`, { userId })
        throw new SlotConflictError(undefined, { context: { slotId: slot.id } })
      }

      const current = this.holds.lookup(holdToken)
      if (current.status !== 'live' || current.hold.ownerId !== userId) {
        throw new HoldExpiredError(undefined, {
          context: { holdToken, status: current.status },
        })
      }

      assertPartyFits(details.partySize, slot)

      const now = this.timestamp()
      const reservation: Reservation = {
        id: this.generateId(),
        restaurantId: slot.restaurantId,
        slot,
        partySize: details.partySize,
        userId,
        status: 'confirmed',
        createdAt: now,
        updatedAt: now,
        idempotencyKey,
        ...(details.specialRequests ? { specialRequests: details.specialRequests } : {}),
      }

      await this.write(() => this.repository.insert(reservation))
      this.holds.convert(current.hold, reservation.id)
      this.logger.log?.('info', `reservation confirmed ${reservation.id}`, {
        slotId: slot.id,
        partySize: reservation.partySize,
      })
      return reservation
    })
  }

  /**
   * Cancels a reservation the caller owns and frees its slot.
   * Cancelling twice acknowledges again without a second transition.
   */
  async cancel(reservationId: string, userId: string): Promise<Ack> {
    const found = await this.require(reservationId)
    if (found.userId !== userId) {
      throw new NotOwnerError(undefined, { context: { reservationId } })
    }

    return this.locks.runExclusive<Ack>(tableDayKey(found.slot), async () => {
      const reservation = await this.require(reservationId)
      if (reservation.status === 'cancelled') {
        return { reservationId, status: 'cancelled', changed: false }
      }
      if (reservation.status === 'completed') {
        throw new ValidationError('A completed reservation cannot be cancelled', {
          context: { reservationId },
        })
      }

      await this.write(() =>
        this.repository.update({ ...reservation, status: 'cancelled', updatedAt: this.timestamp() })
      )
      this.logger.log?.('info', `reservation cancelled ${reservationId}`, { slotId: reservation.slot.id })
      return { reservationId, status: 'cancelled', changed: true }
    })
  }

  /** Marks a confirmed reservation as honoured. */
  async complete(reservationId: string): Promise<Reservation> {
    const found = await this.require(reservationId)

    return this.locks.runExclusive(tableDayKey(found.slot), async () => {
      const reservation = await this.require(reservationId)
      if (reservation.status === 'completed') {
        return reservation
      }
      if (reservation.status !== 'confirmed') {
        throw new ValidationError(`Only a confirmed reservation can be completed, not ${reservation.status}`, {
          context: { reservationId },
        })
      }
      const completed: Reservation = { ...reservation, status: 'completed', updatedAt: this.timestamp() }
      await this.write(() => this.repository.update(completed))
      return completed
    })
  }

  async get(reservationId: string): Promise<Reservation | undefined> {
    return this.read(() => this.repository.get(reservationId))
  }

  /**
   * A user's reservations in seating order. Only active ones unless asked.
   */
  async listForUser(userId: string, options: ListOptions = {}): Promise<Reservation[]> {
    const reservations = await this.read(() => this.repository.listForUser(userId))
    return reservations
      .filter((r) => options.includeInactive || ACTIVE_STATUSES.has(r.status))
      .sort(
        (a, b) =>
          a.slot.date.localeCompare(b.slot.date) ||
          a.slot.time.localeCompare(b.slot.time) ||
          compareNatural(a.slot.tableId, b.slot.tableId)
      )
  }

  async isBooked(restaurantId: string, tableId: string, date: string, range: MinuteRange): Promise<boolean> {
    const reservations = await this.read(() => this.repository.listForTableDay(restaurantId, tableId, date))
    return reservations.some((r) => ACTIVE_STATUSES.has(r.status) && overlaps(slotRange(r.slot), range))
  }

  /** Booked or held. */
  async isOccupied(restaurantId: string, tableId: string, date: string, range: MinuteRange): Promise<boolean> {
    if (this.holds.overlapping(restaurantId, tableId, date, range).length > 0) {
      return true
    }
    return this.isBooked(restaurantId, tableId, date, range)
  }

  /** Whether a table still carries an active reservation or a live hold. */
  async isTableInUse(restaurantId: string, tableId: string): Promise<boolean> {
    if (this.holds.hasLiveHolds(restaurantId, tableId)) {
      return true
    }
    const reservations = await this.read(() => this.repository.listForTable(restaurantId, tableId))
    return reservations.some((r) => ACTIVE_STATUSES.has(r.status))
  }

  private async require(reservationId: string): Promise<Reservation> {
    const reservation = await this.get(reservationId)
    if (!reservation) {
      throw new NotFoundError('Reservation', reservationId)
    }
    return reservation
  }

  private timestamp(): string {
    return new Date(this.clock.now()).toISOString()
  }

  private async read<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (error) {
      throw toUpstreamError(error, 'read')
    }
  }

  private async write(fn: () => Promise<void>): Promise<void> {
    try {
      await fn()
    } catch (error) {
      this.logger.log?.('error', 'reservation write failed', { error: errorMessage(error) })
      throw toUpstreamError(error, 'write')
    }
  }
}

function assertPartyFits(partySize: number, slot: Slot): void {
  if (!Number.isInteger(partySize) || partySize < 1) {
    throw new ValidationError('Party size must be a whole number of at least 1')
  }
  if (partySize > slot.seats) {
    throw new ValidationError(`Table ${slot.tableId} seats ${slot.seats}, not ${partySize}`, {
      context: { slotId: slot.id, partySize },
    })
  }
}

function toUpstreamError(error: unknown, operation: 'read' | 'write'): BookingError {
  return UpstreamUnavailableError.wrap(error, { store: 'reservations', operation })
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

import type { Reservation } from './types'

/**
 * Storage port of the ledger. Implementations may fail with any error;
 * the ledger reports those as UpstreamUnavailableError.
 *
 * Records go in and come out as copies: only the ledger changes a stored status.
 */
export interface ReservationRepository {
  get(id: string): Promise<Reservation | undefined>
  findByIdempotencyKey(userId: string, idempotencyKey: string): Promise<Reservation | undefined>
  listForTableDay(restaurantId: string, tableId: string, date: string): Promise<Reservation[]>
  listForTable(restaurantId: string, tableId: string): Promise<Reservation[]>
  listForUser(userId: string): Promise<Reservation[]>
  insert(reservation: Reservation): Promise<void>
  update(reservation: Reservation): Promise<void>
}

export class InMemoryReservationRepository implements ReservationRepository {
  protected readonly reservations = new Map<string, Reservation>()

  constructor(initial: Reservation[] = []) {
    for (const reservation of initial) {
      this.reservations.set(reservation.id, structuredClone(reservation))
    }
  }

  async get(id: string): Promise<Reservation | undefined> {
    const reservation = this.reservations.get(id)
    return reservation && structuredClone(reservation)
  }

  async findByIdempotencyKey(userId: string, idempotencyKey: string): Promise<Reservation | undefined> {
    const [found] = this.filter((r) => r.userId === userId && r.idempotencyKey === idempotencyKey)
    return found
  }

  async listForTableDay(restaurantId: string, tableId: string, date: string): Promise<Reservation[]> {
    return this.filter(
      (r) => r.restaurantId === restaurantId && r.slot.tableId === tableId && r.slot.date === date
    )
  }

  async listForTable(restaurantId: string, tableId: string): Promise<Reservation[]> {
    return this.filter((r) => r.restaurantId === restaurantId && r.slot.tableId === tableId)
  }

  async listForUser(userId: string): Promise<Reservation[]> {
    return this.filter((r) => r.userId === userId)
  }

  async insert(reservation: Reservation): Promise<void> {
    this.reservations.set(reservation.id, structuredClone(reservation))
  }

  async update(reservation: Reservation): Promise<void> {
    this.reservations.set(reservation.id, structuredClone(reservation))
  }

  protected filter(predicate: (reservation: Reservation) => boolean): Reservation[] {
    return [...this.reservations.values()].filter(predicate).map((r) => structuredClone(r))
  }
}

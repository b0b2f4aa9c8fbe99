import { join } from 'node:path'
import { createSemaphore } from '@tablewise/core'
import { z } from 'zod'
import { readJsonFile, writeJsonFileAtomic } from '../storage/json-file'
import { InMemoryReservationRepository } from './repository'
import { reservationSchema, type Reservation } from './types'

const fileSchema = z.object({ reservations: z.array(reservationSchema) })

export const RESERVATIONS_FILE = 'reservations.json'

/**
 * Keeps reservations in memory and rewrites `reservations.json` after every change.
 *
 * Changes are applied one at a time, each snapshot written before the next
 * change starts. A failed write restores the previous in-memory state before rethrowing.
 */
export class JsonFileReservationRepository extends InMemoryReservationRepository {
  readonly path: string
  private readonly writes = createSemaphore(1)

  private constructor(path: string, initial: Reservation[]) {
    super(initial)
    this.path = path
  }

  static async open(dataDir: string): Promise<JsonFileReservationRepository> {
    const path = join(dataDir, RESERVATIONS_FILE)
    const { reservations } = await readJsonFile(path, fileSchema, { reservations: [] })
    return new JsonFileReservationRepository(path, reservations)
  }

  override async insert(reservation: Reservation): Promise<void> {
    await this.mutate(reservation)
  }

  override async update(reservation: Reservation): Promise<void> {
    await this.mutate(reservation)
  }

  private async mutate(reservation: Reservation): Promise<void> {
    await this.writes.acquire()
    try {
      const previous = this.reservations.get(reservation.id)
      this.reservations.set(reservation.id, structuredClone(reservation))
      try {
        await writeJsonFileAtomic(this.path, { reservations: [...this.reservations.values()] })
      } catch (error) {
        if (previous) {
          this.reservations.set(reservation.id, previous)
        } else {
          this.reservations.delete(reservation.id)
        }
        throw error
      }
    } finally {
      this.writes.release()
    }
  }
}

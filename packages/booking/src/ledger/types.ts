import { z } from 'zod'

export const RESERVATION_STATUSES = ['pending', 'confirmed', 'cancelled', 'completed'] as const

export type ReservationStatus = (typeof RESERVATION_STATUSES)[number]

/** Statuses that keep a slot claimed. */
export const ACTIVE_STATUSES: ReadonlySet<ReservationStatus> = new Set(['pending', 'confirmed'])

export const slotSchema = z.object({
  id: z.string(),
  restaurantId: z.string(),
  tableId: z.string(),
  date: z.string(),
  time: z.string(),
  durationMinutes: z.number().int().positive(),
  seats: z.number().int().positive(),
})

export const reservationSchema = z.object({
  id: z.string(),
  restaurantId: z.string(),
  slot: slotSchema,
  partySize: z.number().int().positive(),
  userId: z.string(),
  status: z.enum(RESERVATION_STATUSES),
  createdAt: z.string(),
  updatedAt: z.string(),
  idempotencyKey: z.string(),
  specialRequests: z.string().optional(),
})

export type Reservation = z.infer<typeof reservationSchema>

export interface CommitDetails {
  partySize: number
  specialRequests?: string
}

export interface Ack {
  reservationId: string
  status: 'cancelled'
  /** False when the reservation was already cancelled. */
  changed: boolean
}

export interface ListOptions {
  includeInactive?: boolean
}

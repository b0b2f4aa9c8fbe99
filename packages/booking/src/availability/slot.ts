import { ValidationError } from '../errors'
import { isDate, isTime, rangeOf, type MinuteRange } from './time'

/**
 * One bookable (table, date, time, duration) unit.
 */
export interface Slot {
  id: string
  restaurantId: string
  tableId: string
  date: string
  time: string
  durationMinutes: number
  seats: number
}

export interface SlotRef {
  restaurantId: string
  tableId: string
  date: string
  time: string
}

export function slotId(ref: SlotRef): string {
  return `${ref.restaurantId}/${ref.tableId}/${ref.date}/${ref.time}`
}

export function parseSlotId(id: string): SlotRef {
  const parts = id.split('/')
  const [restaurantId, tableId, date, time] = parts
  if (
    parts.length !== 4 ||
    !restaurantId ||
    !tableId ||
    date === undefined ||
    time === undefined ||
    !isDate(date) ||
    !isTime(time)
  ) {
    throw new ValidationError(`Invalid slot id '${id}'`, {
      issues: ['slotId must look like restaurantId/tableId/YYYY-MM-DD/HH:mm'],
    })
  }
  return { restaurantId, tableId, date, time }
}

export function slotRange(slot: Pick<Slot, 'time' | 'durationMinutes'>): MinuteRange {
  return rangeOf(slot.time, slot.durationMinutes)
}

/** Lock key shared by the hold book and the ledger. */
export function tableDayKey(slot: Pick<Slot, 'restaurantId' | 'tableId' | 'date'>): string {
  return `${slot.restaurantId}/${slot.tableId}/${slot.date}`
}

import type { Clock } from '@tablewise/core'
import { ValidationError } from '../errors'

const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

const MS_PER_DAY = 24 * 60 * 60 * 1000

export function isTime(value: string): boolean {
  return TIME_PATTERN.test(value)
}

export function isDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value)
  if (!match) {
    return false
  }
  const parsed = new Date(`${value}T00:00:00Z`)
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value)
}

/**
 * 'HH:mm' → minutes since midnight.
 */
export function toMinutes(time: string): number {
  const match = TIME_PATTERN.exec(time)
  if (!match) {
    throw new ValidationError(`Invalid time '${time}', expected HH:mm`)
  }
  return Number(match[1]) * 60 + Number(match[2])
}

export function fromMinutes(minutes: number): string {
  const hours = Math.floor(minutes / 60)
  const rest = minutes % 60
  return `${String(hours).padStart(2, '0')}:${String(rest).padStart(2, '0')}`
}

export interface MinuteRange {
  start: number
  end: number
}

export function rangeOf(time: string, durationMinutes: number): MinuteRange {
  const start = toMinutes(time)
  return { start, end: start + durationMinutes }
}

/** Half-open ranges: touching ends do not overlap. */
export function overlaps(a: MinuteRange, b: MinuteRange): boolean {
  return a.start < b.end && b.start < a.end
}

/** UTC calendar date of the clock's "now", shifted by whole days. */
export function dateFromClock(clock: Clock, offsetDays = 0): string {
  return new Date(clock.now() + offsetDays * MS_PER_DAY).toISOString().slice(0, 10)
}

/** `t2` sorts before `t10`. */
export function compareNatural(a: string, b: string): number {
  return a.localeCompare(b, 'en', { numeric: true })
}

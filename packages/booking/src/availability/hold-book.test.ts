import { describe, it, expect, beforeEach, vi } from 'vitest'
import { createManualClock, type ManualClock } from '@tablewise/core'
import { HoldBook } from './hold-book'
import type { Slot } from './slot'

const slot: Slot = {
  id: 'sushi-master/t3/2026-03-14/19:00',
  restaurantId: 'sushi-master',
  tableId: 't3',
  date: '2026-03-14',
  time: '19:00',
  durationMinutes: 90,
  seats: 4,
}

describe('HoldBook', () => {
  let clock: ManualClock
  let holds: HoldBook

  beforeEach(() => {
    clock = createManualClock(Date.UTC(2026, 2, 13, 12))
    holds = new HoldBook({ clock, scheduleExpiry: false })
  })

  it('should create a live hold with a TTL deadline', () => {
    const hold = holds.create(slot, 'user-1', 180)

    expect(hold.expiresAt - hold.createdAt).toBe(180_000)
    expect(holds.lookup(hold.token)).toEqual({ status: 'live', hold })
    expect(holds.size).toBe(1)
  })

  it('should treat a hold as absent once its TTL has passed', () => {
    const hold = holds.create(slot, 'user-1', 180)

    clock.advance(179_999)
    expect(holds.get(hold.token)).toBe(hold)

    clock.advance(1)
    expect(holds.get(hold.token)).toBeUndefined()
    expect(holds.lookup(hold.token).status).toBe('expired')
    expect(holds.overlapping('sushi-master', 't3', '2026-03-14', { start: 1140, end: 1230 })).toEqual([])
  })

  it('should emit lifecycle events', () => {
    const created = vi.fn()
    const released = vi.fn()
    const expired = vi.fn()
    const converted = vi.fn()
    holds.events.on('hold.created', created)
    holds.events.on('hold.released', released)
    holds.events.on('hold.expired', expired)
    holds.events.on('hold.converted', converted)

    const a = holds.create(slot, 'user-1')
    const b = holds.create({ ...slot, tableId: 't4', id: 'sushi-master/t4/2026-03-14/19:00' }, 'user-2')
    const c = holds.create({ ...slot, tableId: 't5', id: 'sushi-master/t5/2026-03-14/19:00' }, 'user-3', 60)
    holds.release(a.token)
    holds.convert(b, 'res-1')
    clock.advance(60_000)
    holds.purgeExpired()

    expect(created).toHaveBeenCalledTimes(3)
    expect(released).toHaveBeenCalledWith(a)
    expect(converted).toHaveBeenCalledWith(b, 'res-1')
    expect(expired).toHaveBeenCalledWith(c)
  })

  it('should release only live holds', () => {
    const hold = holds.create(slot, 'user-1')

    expect(holds.release(hold.token)).toBe(true)
    expect(holds.release(hold.token)).toBe(false)
    expect(holds.release('no-such-token')).toBe(false)
    expect(holds.lookup(hold.token).status).toBe('released')
  })

  it('should convert a hold whose deadline passed after it was checked', () => {
    const hold = holds.create(slot, 'user-1', 10)
    clock.advance(10_000)
    holds.purgeExpired()

    holds.convert(hold, 'res-1')

    expect(holds.lookup(hold.token).status).toBe('converted')
    expect(holds.size).toBe(0)
  })

  it('should find overlapping holds on the same table and date only', () => {
    const hold = holds.create(slot, 'user-1')

    expect(holds.overlapping('sushi-master', 't3', '2026-03-14', { start: 1200, end: 1290 })).toEqual([hold])
    expect(holds.overlapping('sushi-master', 't3', '2026-03-14', { start: 1230, end: 1320 })).toEqual([])
    expect(holds.overlapping('sushi-master', 't3', '2026-03-15', { start: 1140, end: 1230 })).toEqual([])
    expect(holds.overlapping('sushi-master', 't4', '2026-03-14', { start: 1140, end: 1230 })).toEqual([])
    expect(holds.hasLiveHolds('sushi-master', 't3')).toBe(true)
  })

  it('should announce expiry from a timer', () => {
    vi.useFakeTimers()
    try {
      const timed = new HoldBook({ clock })
      const expired = vi.fn()
      timed.events.on('hold.expired', expired)
      timed.create(slot, 'user-1', 30)

      clock.advance(30_000)
      vi.advanceTimersByTime(30_000)

      expect(expired).toHaveBeenCalledTimes(1)
      timed.dispose()
    } finally {
      vi.useRealTimers()
    }
  })
})

import { describe, it, expect, vi, afterEach } from 'vitest'
import { createManualClock } from '@tablewise/core'
import { EXPIRED_ID_RETENTION_MS, SessionStore } from './session-store'
import type { ConversationSession } from './types'

const START = Date.UTC(2026, 2, 13, 12, 0, 0)

function setup(timeoutMinutes = 30) {
  const clock = createManualClock(START)
  const expired: string[] = []
  const store = new SessionStore({
    clock,
    timeoutMinutes,
    onExpire: async (session: ConversationSession) => {
      expired.push(session.id)
    },
  })
  return { clock, store, expired }
}

describe('SessionStore', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('should create idle sessions without a user', async () => {
    const { store } = setup()

    const session = store.create('s1')

    expect(session).toMatchObject({ id: 's1', userId: null, state: { kind: 'idle' }, history: [] })
    expect(await store.get('s1')).toBe(session)
    expect(store.size).toBe(1)
  })

  it('should keep a session alive while it is touched', async () => {
    const { clock, store } = setup()
    const session = store.create('s1')

    clock.advance(20 * 60_000)
    store.touch(session)
    clock.advance(20 * 60_000)

    expect(await store.get('s1')).toBe(session)
  })

  it('should expire an inactive session on get', async () => {
    const { clock, store, expired } = setup()
    const session = store.create('s1')

    clock.advance(30 * 60_000 + 1)

    expect(await store.get('s1')).toBeUndefined()
    expect(expired).toEqual(['s1'])
    expect(session.state).toEqual({ kind: 'expired' })
    expect(session.controller.signal.aborted).toBe(true)
    expect(store.wasExpired('s1')).toBe(true)
  })

  it('should not expire at exactly the timeout', async () => {
    const { clock, store } = setup()
    store.create('s1')

    clock.advance(30 * 60_000)

    expect(await store.get('s1')).toBeDefined()
  })

  it('should forget the expiry once the id is reused', async () => {
    const { clock, store } = setup()
    store.create('s1')
    clock.advance(31 * 60_000)
    await store.get('s1')

    store.create('s1')

    expect(store.wasExpired('s1')).toBe(false)
  })

  it('should forget expired ids after the retention window', async () => {
    const { clock, store } = setup()
    store.create('gone')
    clock.advance(31 * 60_000)
    await store.sweep()
    expect(store.wasExpired('gone')).toBe(true)

    clock.advance(EXPIRED_ID_RETENTION_MS)
    await store.sweep()
    expect(store.expiredCount).toBe(1)

    clock.advance(1)
    await store.sweep()
    expect(store.expiredCount).toBe(0)
    expect(store.wasExpired('gone')).toBe(false)
  })

  it('should sweep only stale sessions', async () => {
    const { clock, store, expired } = setup(10)
    store.create('old')
    clock.advance(6 * 60_000)
    store.create('fresh')
    clock.advance(5 * 60_000)

    const swept = await store.sweep()

    expect(swept).toEqual(['old'])
    expect(expired).toEqual(['old'])
    expect(store.size).toBe(1)
  })

  it('should report false when expiring an unknown id', async () => {
    const { store, expired } = setup()

    expect(await store.expire('missing')).toBe(false)
    expect(expired).toEqual([])
  })

  it('should sweep on an interval once started', async () => {
    vi.useFakeTimers()
    const { clock, store, expired } = setup(1)
    store.create('s1')

    store.startSweeper()
    clock.advance(2 * 60_000)
    await vi.advanceTimersByTimeAsync(60_000)
    store.stop()

    expect(expired).toEqual(['s1'])
    expect(store.size).toBe(0)
  })
})

import { describe, it, expect, beforeEach, vi } from 'vitest'
import { ExecutionError, ExecutionErrorCode } from '@tablewise/core'
import { createRecordingLogger } from '@tablewise/core/testing'
import type { CatalogStore } from '../catalog/catalog-store'
import { InMemoryReservationRepository } from '../ledger/repository'
import type { Reservation } from '../ledger/types'
import { createTestSystem, type TestSystem } from '../testing'
import { executeTool, type ToolContext } from './execute'
import { parseToolCall } from './registry'

class FlakyRepository extends InMemoryReservationRepository {
  failuresLeft: number

  constructor(failures: number) {
    super()
    this.failuresLeft = failures
  }

  override async listForUser(userId: string): Promise<Reservation[]> {
    if (this.failuresLeft > 0) {
      this.failuresLeft -= 1
      throw new Error('connection reset')
    }
    return super.listForUser(userId)
  }
}

const noSleep = async () => {}

describe('executeTool', () => {
  let system: TestSystem
  let context: ToolContext

  beforeEach(async () => {
    system = await createTestSystem()
    context = { services: system.services, userId: 'user-1', offers: new Map(), retry: { sleep: noSleep } }
  })

  it('should search the catalog', async () => {
    const result = await executeTool(parseToolCall('search_restaurants', { cuisine: 'Japanese' }), context)

    expect(result.ok && result.tool === 'search_restaurants' && result.data.restaurants.map((r) => r.id)).toEqual([
      'sakura-japanese',
      'sushi-master',
    ])
  })

  it('should resolve tomorrow and record the offered slots', async () => {
    const result = await executeTool(
      parseToolCall('check_availability', { restaurantId: 'Sushi Master', date: 'tomorrow', time: '19:00', partySize: 4 }),
      context
    )

    if (!result.ok || result.tool !== 'check_availability') {
      throw new Error('expected availability')
    }
    expect(result.data.date).toBe('2026-03-14')
    expect(result.data.restaurantName).toBe('Sushi Master')
    expect(result.data.slots.map((s) => s.tableId)).toEqual(['t3', 't4', 't5', 't10'])
    expect(result.data.more).toBe(false)
    expect([...context.offers.keys()]).toEqual([
      'sushi-master/t3/2026-03-14/19:00',
      'sushi-master/t4/2026-03-14/19:00',
      'sushi-master/t5/2026-03-14/19:00',
      'sushi-master/t10/2026-03-14/19:00',
    ])
  })

  it('should surface at most five slots and flag the rest', async () => {
    const result = await executeTool(
      parseToolCall('check_availability', {
        restaurantId: 'sushi-master',
        date: '2026-03-14',
        timeFrom: '17:00',
        timeTo: '21:30',
        partySize: 2,
      }),
      context
    )

    if (!result.ok || result.tool !== 'check_availability') {
      throw new Error('expected availability')
    }
    expect(result.data.slots.map((s) => `${s.time} ${s.tableId}`)).toEqual([
      '17:00 t1',
      '17:00 t2',
      '17:30 t1',
      '17:30 t2',
      '18:00 t1',
    ])
    expect(result.data.more).toBe(true)
  })

  it('should recommend restaurants like a named one', async () => {
    const result = await executeTool(parseToolCall('recommend_restaurants', { similarTo: 'Sushi Master' }), context)

    if (!result.ok || result.tool !== 'recommend_restaurants') {
      throw new Error('expected recommendations')
    }
    expect(result.data.recommendations.map((r) => [r.restaurant.id, r.score])).toEqual([
      ['sakura-japanese', 6],
      ['la-bella-italia', 5],
      ['spice-garden', 1],
    ])
  })

  it('should turn booking errors into structured failures', async () => {
    const result = await executeTool(parseToolCall('get_restaurant_details', { restaurantId: 'Nowhere' }), context)

    expect(result).toEqual({
      ok: false,
      tool: 'get_restaurant_details',
      error: { code: 'NOT_FOUND', message: "Restaurant 'Nowhere' not found", retryable: false },
    })
  })

  it('should refuse book_table without a confirmed hold', async () => {
    const result = await executeTool(parseToolCall('book_table', { slotId: 'sushi-master/t3/2026-03-14/19:00', partySize: 4 }), context)

    expect(result).toEqual({
      ok: false,
      tool: 'book_table',
      error: {
        code: 'VALIDATION_ERROR',
        message: 'book_table needs a confirmed hold',
        retryable: false,
        issues: ['book_table needs a confirmed hold'],
      },
    })
  })

  it('should book against a confirmed hold', async () => {
    const held = await system.services.engine.hold('sushi-master/t3/2026-03-14/19:00', { ownerId: 'user-1' })
    if (held.status !== 'held') {
      throw new Error('expected a hold')
    }

    const result = await executeTool(parseToolCall('book_table', { slotId: held.slot.id, partySize: 3 }), {
      ...context,
      booking: { holdToken: held.token, idempotencyKey: 'session-1:proposal-1' },
    })

    expect(result.ok && result.tool === 'book_table' && result.data.reservation).toMatchObject({
      slot: { id: 'sushi-master/t3/2026-03-14/19:00' },
      partySize: 3,
      status: 'confirmed',
      idempotencyKey: 'session-1:proposal-1',
    })
  })

  describe('retries', () => {
    it('should retry storage faults with backoff and log the attempts', async () => {
      const flaky = await createTestSystem({ reservationRepository: new FlakyRepository(2) })
      const logger = createRecordingLogger()
      const sleep = vi.fn(noSleep)

      const result = await executeTool(parseToolCall('list_reservations', {}), {
        services: flaky.services,
        userId: 'user-1',
        offers: new Map(),
        retry: { baseDelayMs: 100, sleep },
        logger,
      })

      expect(result).toEqual({ ok: true, tool: 'list_reservations', data: { reservations: [] } })
      expect(sleep.mock.calls).toEqual([[100], [200]])
      expect(logger.ofType('tool_call_end')[0]).toMatchObject({
        toolName: 'list_reservations',
        attempts: 3,
        success: true,
      })
    })

    it('should report an apology once retries run out', async () => {
      const down = await createTestSystem({ reservationRepository: new FlakyRepository(10) })
      const logger = createRecordingLogger()

      const result = await executeTool(parseToolCall('list_reservations', {}), {
        services: down.services,
        userId: 'user-1',
        offers: new Map(),
        retry: { sleep: noSleep },
        logger,
      })

      expect(result).toEqual({
        ok: false,
        tool: 'list_reservations',
        error: {
          code: 'UPSTREAM_UNAVAILABLE',
          message: 'The booking service is unavailable right now',
          retryable: true,
          suggestion: 'Try again in a moment',
        },
      })
      expect(logger.ofType('tool_call_end')[0]).toMatchObject({
        attempts: 3,
        success: false,
        errorCode: 'UPSTREAM_UNAVAILABLE',
      })
    })
  })

  it('should stop when the signal is aborted', async () => {
    const controller = new AbortController()
    controller.abort()

    const error = await executeTool(parseToolCall('list_reservations', {}), { ...context, signal: controller.signal }).catch(
      (e: unknown) => e
    )

    expect(error).toBeInstanceOf(ExecutionError)
    expect(error).toMatchObject({ code: ExecutionErrorCode.CANCELLED })
  })

  it('should let errors outside the booking domain propagate', async () => {
    const broken: CatalogStore = {
      ...system.services.catalog,
      list: () => system.services.catalog.list(),
      get: (id) => system.services.catalog.get(id),
      findByName: (name) => system.services.catalog.findByName(name),
      upsert: (input) => system.services.catalog.upsert(input),
      search: async () => {
        throw new TypeError('search index missing')
      },
    }

    await expect(
      executeTool(parseToolCall('search_restaurants', {}), { ...context, services: { ...system.services, catalog: broken } })
    ).rejects.toThrow('search index missing')
  })
})

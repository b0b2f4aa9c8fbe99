import merge from 'lodash/merge'
import { createManualClock, type Logger, type ManualClock } from '@tablewise/core'
import type { Restaurant } from '../catalog/schema'
import { DEFAULT_CONFIG, type BookingConfig } from '../config/schema'
import { createBookingSystem, type BookingSystem, type BookingSystemOptions } from '../system'
import { createScriptedIntentModel, type ScriptedDecision, type ScriptedIntentModel } from './scripted-intent-model'

/** 2026-03-13T12:00:00Z, a Friday. */
export const TEST_NOW = Date.UTC(2026, 2, 13, 12, 0, 0)

export interface TestSystemOptions extends Pick<BookingSystemOptions, 'reservationRepository' | 'profileRepository'> {
  script?: ScriptedDecision[]
  now?: number
  restaurants?: Restaurant[]
  logger?: Logger
  config?: Partial<BookingConfig>
}

export interface TestSystem extends BookingSystem {
  clock: ManualClock
  model: ScriptedIntentModel
}

/**
 * An in-memory booking system on a manual clock, with a scripted model and
 * the bundled catalog unless `restaurants` is given. Retries do not sleep.
 */
export async function createTestSystem(options: TestSystemOptions = {}): Promise<TestSystem> {
  const clock = createManualClock(options.now ?? TEST_NOW)
  const model = createScriptedIntentModel(options.script)
  const config: BookingConfig = merge({}, DEFAULT_CONFIG, { retry: { baseDelayMs: 0 } }, options.config)

  const system = await createBookingSystem(config, {
    clock,
    intentModel: model,
    logger: options.logger,
    restaurants: options.restaurants,
    reservationRepository: options.reservationRepository,
    profileRepository: options.profileRepository,
    scheduleHoldExpiry: false,
  })
  return { ...system, clock, model }
}

import {
  createKeyedMutex,
  noopLogger,
  systemClock,
  type Clock,
  type Logger,
  type Provider,
} from '@tablewise/core'
import { AvailabilityEngine } from './availability/availability-engine'
import { HoldBook } from './availability/hold-book'
import { InMemoryCatalogStore } from './catalog/catalog-store'
import type { Restaurant } from './catalog/schema'
import { loadCatalogSeed } from './catalog/seed'
import { createProviderFromConfig } from './config/provider-factory'
import type { BookingConfig } from './config/schema'
import { JsonFileReservationRepository } from './ledger/json-file-repository'
import { ReservationLedger } from './ledger/ledger'
import { InMemoryReservationRepository, type ReservationRepository } from './ledger/repository'
import type { IntentModel } from './orchestrator/intent-model'
import { createLlmIntentModel } from './orchestrator/llm-intent-model'
import { ConversationOrchestrator } from './orchestrator/orchestrator'
import { ProfileResolver } from './profiles/profile-resolver'
import { InMemoryProfileRepository, JsonFileProfileRepository, type ProfileRepository } from './profiles/repository'
import { Recommender } from './recommender/recommender'
import type { BookingServices } from './tools/execute'

export interface BookingSystemOptions {
  clock?: Clock
  logger?: Logger
  /** Replaces the language model built from `config.llm`. */
  intentModel?: IntentModel
  /** Provider for the default intent model. Built from `config.llm` when absent. */
  provider?: Provider
  /** Catalog contents; the seed file is read when absent. */
  restaurants?: Restaurant[]
  reservationRepository?: ReservationRepository
  profileRepository?: ProfileRepository
  /** Set false where a manual clock drives expiry. */
  scheduleHoldExpiry?: boolean
}

export interface BookingSystem {
  config: BookingConfig
  services: BookingServices
  holds: HoldBook
  orchestrator: ConversationOrchestrator
  /** Stops the session sweeper and hold timers. */
  dispose(): void
}

/**
 * Wires the catalog, hold book, availability engine, ledger, profile
 * resolver and orchestrator over one shared table/day mutex.
 *
 * @throws ConfigurationError when the seed or the model provider cannot be set up
 */
export async function createBookingSystem(
  config: BookingConfig,
  options: BookingSystemOptions = {}
): Promise<BookingSystem> {
  const clock = options.clock ?? systemClock
  const logger = options.logger ?? noopLogger
  const locks = createKeyedMutex()
  const { dataDir } = config.storage

  const restaurants = options.restaurants ?? (await loadCatalogSeed(config.catalog.seedPath))
  const catalog = new InMemoryCatalogStore(restaurants, { locks, logger })
  const holds = new HoldBook({ clock, logger, scheduleExpiry: options.scheduleHoldExpiry })

  const reservationRepository =
    options.reservationRepository ??
    (dataDir ? await JsonFileReservationRepository.open(dataDir) : new InMemoryReservationRepository())
  const profileRepository =
    options.profileRepository ??
    (dataDir ? await JsonFileProfileRepository.open(dataDir) : new InMemoryProfileRepository())

  const ledger = new ReservationLedger({ repository: reservationRepository, holds, locks, clock, logger })
  catalog.setTableInUseCheck((restaurantId, tableId) => ledger.isTableInUse(restaurantId, tableId))

  const engine = new AvailabilityEngine({
    catalog,
    holds,
    booked: ledger,
    locks,
    slotIntervalMinutes: config.availability.slotIntervalMinutes,
    diningMinutes: config.availability.diningMinutes,
    holdTtlSeconds: config.holds.ttlSeconds,
    logger,
  })

  const services: BookingServices = {
    catalog,
    engine,
    ledger,
    profiles: new ProfileResolver({ repository: profileRepository, clock, logger }),
    recommender: new Recommender(catalog),
    clock,
  }

  const intentModel =
    options.intentModel ??
    createLlmIntentModel((options.provider ?? createProviderFromConfig(config)).withLogger(logger))

  const orchestrator = new ConversationOrchestrator({
    services,
    intentModel,
    sessions: {
      timeoutMinutes: config.sessions.timeoutMinutes,
      sweepIntervalSeconds: config.sessions.sweepIntervalSeconds,
    },
    maxToolSteps: config.orchestrator.maxToolSteps,
    historyWindow: config.orchestrator.historyWindow,
    retry: config.retry,
    logger,
  })

  return {
    config,
    services,
    holds,
    orchestrator,
    dispose() {
      orchestrator.sessions.stop()
      holds.dispose()
    },
  }
}

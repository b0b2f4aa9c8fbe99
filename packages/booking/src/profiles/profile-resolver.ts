import { randomUUID } from 'node:crypto'
import { createKeyedMutex, noopLogger, systemClock, type Clock, type KeyedMutex, type Logger } from '@tablewise/core'
import { NotFoundError, UpstreamUnavailableError, ValidationError } from '../errors'
import { normalizeIdentity } from './normalize'
import type { ProfileRepository } from './repository'
import type { ContactUpdate, ResolveResult, UserProfile } from './types'

export interface ProfileResolverOptions {
  repository: ProfileRepository
  clock?: Clock
  logger?: Logger
  generateId?: () => string
}

/**
 * Maps identity signals to profiles and owns every profile mutation.
 * Work on one signal or one profile is serialized; distinct ones run in parallel.
 */
export class ProfileResolver {
  private readonly repository: ProfileRepository
  private readonly clock: Clock
  private readonly logger: Logger
  private readonly generateId: () => string
  private readonly locks: KeyedMutex = createKeyedMutex()

  constructor(options: ProfileResolverOptions) {
    this.repository = options.repository
    this.clock = options.clock ?? systemClock
    this.logger = options.logger ?? noopLogger
    this.generateId = options.generateId ?? randomUUID
  }

  /**
   * Exact match on the normalized signal returns the stored profile, now
   * marked returning; otherwise a new profile is created.
   */
  async resolve(identitySignal: string): Promise<ResolveResult> {
    const identity = normalizeIdentity(identitySignal)

    return this.locks.runExclusive(`signal:${identity.value}`, async () => {
      const existing = await this.call(() => this.repository.findBySignal(identity.value))
      if (existing) {
        const profile = await this.mutate(existing.id, (p) => (p.isReturning ? p : { ...p, isReturning: true }))
        return { profile, isNew: false }
      }

      const now = this.timestamp()
      const profile: UserProfile = {
        id: this.generateId(),
        contact: {
          signal: identity.value,
          ...(identity.kind === 'email' ? { email: identity.value } : {}),
          ...(identity.kind === 'phone' ? { phone: identity.value } : {}),
        },
        dietaryPreferences: [],
        history: [],
        isReturning: false,
        createdAt: now,
        updatedAt: now,
      }
      await this.call(() => this.repository.save(profile))
      this.logger.log?.('info', `profile created ${profile.id}`, { kind: identity.kind })
      return { profile, isNew: true }
    })
  }

  async get(userId: string): Promise<UserProfile | undefined> {
    return this.call(() => this.repository.get(userId))
  }

  /** Appends a reservation id once; repeating it is a no-op. */
  async appendHistory(userId: string, reservationId: string): Promise<UserProfile> {
    return this.mutate(userId, (profile) =>
      profile.history.includes(reservationId) ? profile : { ...profile, history: [...profile.history, reservationId] }
    )
  }

  /** Replaces the dietary preferences with the given tags, trimmed, lower-cased and de-duplicated. */
  async updatePreferences(userId: string, tags: string[]): Promise<UserProfile> {
    const dietaryPreferences = [...new Set(tags.map((t) => t.trim().toLowerCase()).filter(Boolean))]
    return this.mutate(userId, (profile) => ({ ...profile, dietaryPreferences }))
  }

  async updateContact(userId: string, update: ContactUpdate): Promise<UserProfile> {
    const contact: ContactUpdate = {}
    if (update.name !== undefined) {
      const name = update.name.trim()
      if (!name) {
        throw new ValidationError('Name cannot be empty')
      }
      contact.name = name
    }
    if (update.email !== undefined) {
      const email = normalizeIdentity(update.email)
      if (email.kind !== 'email') {
        throw new ValidationError(`'${update.email}' is not an email address`)
      }
      contact.email = email.value
    }
    if (update.phone !== undefined) {
      const phone = normalizeIdentity(update.phone)
      if (phone.kind !== 'phone') {
        throw new ValidationError(`'${update.phone}' is not a phone number`)
      }
      contact.phone = phone.value
    }
    return this.mutate(userId, (profile) => ({ ...profile, contact: { ...profile.contact, ...contact } }))
  }

  private async mutate(userId: string, change: (profile: UserProfile) => UserProfile): Promise<UserProfile> {
    return this.locks.runExclusive(`profile:${userId}`, async () => {
      const profile = await this.get(userId)
      if (!profile) {
        throw new NotFoundError('Profile', userId)
      }
      const changed = change(profile)
      if (changed === profile) {
        return profile
      }
      const updated = { ...changed, updatedAt: this.timestamp() }
      await this.call(() => this.repository.save(updated))
      return updated
    })
  }

  private timestamp(): string {
    return new Date(this.clock.now()).toISOString()
  }

  private async call<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (error) {
      throw UpstreamUnavailableError.wrap(error, { store: 'profiles' })
    }
  }
}

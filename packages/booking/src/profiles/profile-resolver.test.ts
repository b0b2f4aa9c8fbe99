import { describe, it, expect, beforeEach } from 'vitest'
import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { createManualClock, type ManualClock } from '@tablewise/core'
import { NotFoundError, UpstreamUnavailableError, ValidationError } from '../errors'
import { ProfileResolver } from './profile-resolver'
import { InMemoryProfileRepository, JsonFileProfileRepository } from './repository'
import type { UserProfile } from './types'

class BrokenRepository extends InMemoryProfileRepository {
  override async save(_profile: UserProfile): Promise<void> {
    throw new Error('connection reset')
  }
}

describe('ProfileResolver', () => {
  let clock: ManualClock
  let resolver: ProfileResolver

  beforeEach(() => {
    clock = createManualClock(Date.UTC(2026, 2, 13, 12))
    let next = 0
    resolver = new ProfileResolver({
      repository: new InMemoryProfileRepository(),
      clock,
      generateId: () => `user-${++next}`,
    })
  })

  describe('resolve', () => {
    it('should create a profile for a new signal', async () => {
      const { profile, isNew } = await resolver.resolve('Ana@Example.com')

      expect(isNew).toBe(true)
      expect(profile).toEqual({
        id: 'user-1',
        contact: { signal: 'ana@example.com', email: 'ana@example.com' },
        dietaryPreferences: [],
        history: [],
        isReturning: false,
        createdAt: '2026-03-13T12:00:00.000Z',
        updatedAt: '2026-03-13T12:00:00.000Z',
      })
    })

    it('should return the same profile, marked returning, for the normalized signal', async () => {
      const first = await resolver.resolve('ana@example.com')
      clock.advance(60_000)

      const second = await resolver.resolve('  ANA@example.com')

      expect(second.isNew).toBe(false)
      expect(second.profile.id).toBe(first.profile.id)
      expect(second.profile.isReturning).toBe(true)
      expect(second.profile.updatedAt).toBe('2026-03-13T12:01:00.000Z')
    })

    it('should not let a returned profile change the stored one', async () => {
      const { profile } = await resolver.resolve('ana@example.com')
      profile.dietaryPreferences.push('vegan')

      expect((await resolver.get(profile.id))?.dietaryPreferences).toEqual([])
    })

    it('should create one profile for concurrent first contacts', async () => {
      const [a, b] = await Promise.all([resolver.resolve('+1 555 123 4567'), resolver.resolve('+15551234567')])

      expect(a.profile.id).toBe(b.profile.id)
      expect([a.isNew, b.isNew].sort()).toEqual([false, true])
      expect(a.profile.contact.phone).toBe('+15551234567')
    })

    it('should report storage failures as UpstreamUnavailable', async () => {
      const broken = new ProfileResolver({ repository: new BrokenRepository() })

      await expect(broken.resolve('ana@example.com')).rejects.toThrow(UpstreamUnavailableError)
    })
  })

  describe('mutations', () => {
    let userId: string

    beforeEach(async () => {
      userId = (await resolver.resolve('ana@example.com')).profile.id
    })

    it('should append reservation ids once', async () => {
      await resolver.appendHistory(userId, 'res-1')
      await resolver.appendHistory(userId, 'res-2')
      const profile = await resolver.appendHistory(userId, 'res-1')

      expect(profile.history).toEqual(['res-1', 'res-2'])
    })

    it('should keep concurrent appends', async () => {
      await Promise.all([resolver.appendHistory(userId, 'res-1'), resolver.appendHistory(userId, 'res-2')])

      expect((await resolver.get(userId))?.history).toEqual(['res-1', 'res-2'])
    })

    it('should normalize dietary preferences', async () => {
      const profile = await resolver.updatePreferences(userId, [' Vegetarian', 'vegetarian', 'GLUTEN_FREE', ''])

      expect(profile.dietaryPreferences).toEqual(['vegetarian', 'gluten_free'])
    })

    it('should validate contact updates', async () => {
      const profile = await resolver.updateContact(userId, { name: ' Ana ', phone: '555 123 4567' })

      expect(profile.contact).toEqual({
        signal: 'ana@example.com',
        email: 'ana@example.com',
        name: 'Ana',
        phone: '5551234567',
      })
      await expect(resolver.updateContact(userId, { email: '555 123 4567' })).rejects.toThrow(
        "'555 123 4567' is not an email address"
      )
      await expect(resolver.updateContact(userId, { name: ' ' })).rejects.toThrow(ValidationError)
    })

    it('should throw NotFound for unknown profiles', async () => {
      await expect(resolver.appendHistory('user-404', 'res-1')).rejects.toThrow(NotFoundError)
    })
  })
})

describe('JsonFileProfileRepository', () => {
  it('should persist profiles across reopening', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'tablewise-profiles-'))
    try {
      const resolver = new ProfileResolver({
        repository: await JsonFileProfileRepository.open(dir),
        generateId: () => 'user-1',
      })
      await resolver.resolve('ana@example.com')

      const reopened = new ProfileResolver({ repository: await JsonFileProfileRepository.open(dir) })
      const { profile, isNew } = await reopened.resolve('ana@example.com')

      expect(isNew).toBe(false)
      expect(profile.id).toBe('user-1')
    } finally {
      await rm(dir, { recursive: true, force: true })
    }
  })
})

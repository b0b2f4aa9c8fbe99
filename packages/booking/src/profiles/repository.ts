import { join } from 'node:path'
import { createSemaphore } from '@tablewise/core'
import { z } from 'zod'
import { readJsonFile, writeJsonFileAtomic } from '../storage/json-file'
import { userProfileSchema, type UserProfile } from './types'

export interface ProfileRepository {
  get(id: string): Promise<UserProfile | undefined>
  findBySignal(signal: string): Promise<UserProfile | undefined>
  save(profile: UserProfile): Promise<void>
}

export class InMemoryProfileRepository implements ProfileRepository {
  protected readonly profiles = new Map<string, UserProfile>()

  constructor(initial: UserProfile[] = []) {
    for (const profile of initial) {
      this.profiles.set(profile.id, structuredClone(profile))
    }
  }

  async get(id: string): Promise<UserProfile | undefined> {
    const profile = this.profiles.get(id)
    return profile && structuredClone(profile)
  }

  async findBySignal(signal: string): Promise<UserProfile | undefined> {
    for (const profile of this.profiles.values()) {
      if (profile.contact.signal === signal) {
        return structuredClone(profile)
      }
    }
    return undefined
  }

  async save(profile: UserProfile): Promise<void> {
    this.profiles.set(profile.id, structuredClone(profile))
  }
}

const fileSchema = z.object({ profiles: z.array(userProfileSchema) })

export const PROFILES_FILE = 'profiles.json'

export class JsonFileProfileRepository extends InMemoryProfileRepository {
  readonly path: string
  private readonly writes = createSemaphore(1)

  private constructor(path: string, initial: UserProfile[]) {
    super(initial)
    this.path = path
  }

  static async open(dataDir: string): Promise<JsonFileProfileRepository> {
    const path = join(dataDir, PROFILES_FILE)
    const { profiles } = await readJsonFile(path, fileSchema, { profiles: [] })
    return new JsonFileProfileRepository(path, profiles)
  }

  /** Saves are serialized so each snapshot is written whole before the next starts. */
  override async save(profile: UserProfile): Promise<void> {
    await this.writes.acquire()
    try {
      const previous = this.profiles.get(profile.id)
      this.profiles.set(profile.id, structuredClone(profile))
      try {
        await writeJsonFileAtomic(this.path, { profiles: [...this.profiles.values()] })
      } catch (error) {
        if (previous) {
          this.profiles.set(profile.id, previous)
        } else {
          this.profiles.delete(profile.id)
        }
        throw error
      }
    } finally {
      this.writes.release()
    }
  }
}

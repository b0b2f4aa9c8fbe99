import { noopLogger, systemClock, type Clock, type Logger } from '@tablewise/core'
import type { ConversationSession } from './types'

export const DEFAULT_SESSION_TIMEOUT_MINUTES = 30
export const DEFAULT_SWEEP_INTERVAL_SECONDS = 60

/** How long an expired id is remembered, so its next message is told the session was renewed. */
export const EXPIRED_ID_RETENTION_MS = 24 * 60 * 60 * 1000

export interface SessionStoreOptions {
  clock?: Clock
  timeoutMinutes?: number
  sweepIntervalSeconds?: number
  /** Cleanup for a session being discarded, such as releasing its hold. */
  onExpire?: (session: ConversationSession) => Promise<void>
  logger?: Logger
}

/**
 * Keyed store of conversation sessions with an inactivity timeout.
 *
 * Expiry is checked lazily on `get` and periodically by the sweeper.
 * Ids of expired sessions are remembered until a new session takes the id,
 * or for {@link EXPIRED_ID_RETENTION_MS} at most.
 */
export class SessionStore {
  private readonly sessions = new Map<string, ConversationSession>()
  private readonly expiredIds = new Map<string, number>()
  private readonly clock: Clock
  private readonly timeoutMs: number
  private readonly sweepIntervalMs: number
  private readonly onExpire?: (session: ConversationSession) => Promise<void>
  private readonly logger: Logger
  private sweeper?: NodeJS.Timeout

  constructor(options: SessionStoreOptions = {}) {
    this.clock = options.clock ?? systemClock
    this.timeoutMs = (options.timeoutMinutes ?? DEFAULT_SESSION_TIMEOUT_MINUTES) * 60_000
    this.sweepIntervalMs = (options.sweepIntervalSeconds ?? DEFAULT_SWEEP_INTERVAL_SECONDS) * 1000
    this.onExpire = options.onExpire
    this.logger = options.logger ?? noopLogger
  }

  /** The live session for an id. An inactive one is expired first. */
  async get(id: string): Promise<ConversationSession | undefined> {
    const session = this.sessions.get(id)
    if (session && this.isStale(session, this.clock.now())) {
      await this.expire(id)
      return undefined
    }
    return session
  }

  create(id: string): ConversationSession {
    const now = this.clock.now()
    const session: ConversationSession = {
      id,
      userId: null,
      state: { kind: 'idle' },
      history: [],
      offers: new Map(),
      controller: new AbortController(),
      createdAt: now,
      lastActiveAt: now,
    }
    this.sessions.set(id, session)
    this.expiredIds.delete(id)
    return session
  }

  touch(session: ConversationSession): void {
    session.lastActiveAt = this.clock.now()
  }

  /**
   * Discards a session: aborts its in-flight work, then runs the expiry cleanup.
   */
  async expire(id: string): Promise<boolean> {
    const session = this.sessions.get(id)
    if (!session) {
      return false
    }
    this.sessions.delete(id)
    this.expiredIds.set(id, this.clock.now())
    session.controller.abort()
    await this.onExpire?.(session)
    session.state = { kind: 'expired' }
    this.logger.log?.('info', `session expired ${id}`)
    return true
  }

  /** Whether the last session under this id expired and no new one has replaced it. */
  wasExpired(id: string): boolean {
    const expiredAt = this.expiredIds.get(id)
    return expiredAt !== undefined && this.clock.now() - expiredAt <= EXPIRED_ID_RETENTION_MS
  }

  /** Expires every session inactive for longer than the timeout, and forgets old expired ids. */
  async sweep(now: number = this.clock.now()): Promise<string[]> {
    const stale = [...this.sessions.values()].filter((s) => this.isStale(s, now)).map((s) => s.id)
    for (const id of stale) {
      await this.expire(id)
    }
    for (const [id, expiredAt] of this.expiredIds) {
      if (now - expiredAt > EXPIRED_ID_RETENTION_MS) {
        this.expiredIds.delete(id)
      }
    }
    return stale
  }

  /** Expired ids still remembered. */
  get expiredCount(): number {
    return this.expiredIds.size
  }

  startSweeper(): void {
    if (this.sweeper) {
      return
    }
    this.sweeper = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        this.logger.log?.('error', 'session sweep failed', {
          error: error instanceof Error ? error.message : String(error),
        })
      })
    }, this.sweepIntervalMs)
    this.sweeper.unref()
  }

  stop(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper)
      this.sweeper = undefined
    }
  }

  get size(): number {
    return this.sessions.size
  }

  private isStale(session: ConversationSession, now: number): boolean {
    return now - session.lastActiveAt > this.timeoutMs
  }
}

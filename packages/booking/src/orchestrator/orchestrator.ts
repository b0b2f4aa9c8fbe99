import { randomUUID } from 'node:crypto'
import {
  ExecutionError,
  ExecutionErrorCode,
  createKeyedMutex,
  noopLogger,
  withRetry,
  type KeyedMutex,
  type Logger,
  type RetryOptions,
} from '@tablewise/core'
import type { HoldResult } from '../availability/availability-engine'
import { parseSlotId } from '../availability/slot'
import { dateFromClock } from '../availability/time'
import {
  BookingError,
  NotFoundError,
  NotOwnerError,
  SlotConflictError,
  ValidationError,
} from '../errors'
import { extractIdentity } from '../profiles/normalize'
import type { ResolveResult } from '../profiles/types'
import {
  DEFAULT_TOOL_RETRY,
  executeTool,
  toToolFailure,
  type BookingServices,
  type ToolResult,
} from '../tools/execute'
import {
  isSideEffect,
  parseToolCall,
  toolSchemasForModel,
  type ToolCall,
  type ToolCallOf,
} from '../tools/registry'
import type { IntentModel, ModelDecision } from './intent-model'
import {
  APOLOGY,
  ASK_FOR_CONTACT,
  SESSION_EXPIRED,
  classifyConfirmation,
  declinedReply,
  describeResult,
  greeting,
  proposalQuestion,
  suggestionsFor,
} from './replies'
import { SessionStore, type SessionStoreOptions } from './session-store'
import type {
  ConversationSession,
  InboundMessage,
  OrchestratorReply,
  OrchestratorState,
  Proposal,
  StateKind,
} from './types'

export const DEFAULT_MAX_TOOL_STEPS = 3
export const DEFAULT_HISTORY_WINDOW = 20

const TRANSITIONS: Record<StateKind, readonly StateKind[]> = {
  idle: ['resolving'],
  resolving: ['awaiting_intent', 'idle'],
  awaiting_intent: ['tool_proposed', 'responding'],
  tool_proposed: ['tool_proposed', 'tool_confirmed', 'tool_executing', 'responding', 'awaiting_intent'],
  tool_confirmed: ['tool_executing'],
  tool_executing: ['responding'],
  responding: ['awaiting_intent', 'tool_proposed', 'tool_executing'],
  expired: [],
}

export interface OrchestratorOptions {
  services: BookingServices
  intentModel: IntentModel
  sessions?: Omit<SessionStoreOptions, 'onExpire' | 'clock' | 'logger'>
  /** Model decisions per user message before a plain summary is used. */
  maxToolSteps?: number
  /** Messages of history handed to the model. */
  historyWindow?: number
  retry?: Partial<RetryOptions>
  logger?: Logger
  generateId?: () => string
}

interface Turn {
  renewed: boolean
  results: ToolResult[]
  suggestions: string[]
}

/**
 * Per-session state machine between the user, the language model and the
 * booking services.
 *
 * Messages of one session are handled strictly in order; sessions run in
 * parallel. Side-effect tools are suspended in `tool_proposed` until a later
 * message confirms or declines them.
 */
export class ConversationOrchestrator {
  readonly sessions: SessionStore
  private readonly services: BookingServices
  private readonly intentModel: IntentModel
  private readonly maxToolSteps: number
  private readonly historyWindow: number
  private readonly retry: Partial<RetryOptions>
  private readonly logger: Logger
  private readonly generateId: () => string
  private readonly locks: KeyedMutex = createKeyedMutex()

  constructor(options: OrchestratorOptions) {
    this.services = options.services
    this.intentModel = options.intentModel
    this.maxToolSteps = Math.max(1, options.maxToolSteps ?? DEFAULT_MAX_TOOL_STEPS)
    this.historyWindow = options.historyWindow ?? DEFAULT_HISTORY_WINDOW
    this.retry = options.retry ?? {}
    this.logger = options.logger ?? noopLogger
    this.generateId = options.generateId ?? randomUUID
    this.sessions = new SessionStore({
      ...options.sessions,
      clock: this.services.clock,
      logger: this.logger,
      onExpire: (session) => this.releaseHold(session),
    })
  }

  async handleMessage(message: InboundMessage): Promise<OrchestratorReply> {
    return this.locks.runExclusive(message.sessionId, () => this.process(message))
  }

  private async process(message: InboundMessage): Promise<OrchestratorReply> {
    let session = await this.sessions.get(message.sessionId)
    let renewed = false
    if (!session) {
      renewed = this.sessions.wasExpired(message.sessionId)
      session = this.sessions.create(message.sessionId)
    }
    this.sessions.touch(session)
    const turn: Turn = { renewed, results: [], suggestions: [] }

    try {
      const text = await this.route(session, message, turn)
      return this.reply(session, turn, text)
    } catch (error) {
      if (session.controller.signal.aborted) {
        return this.reply(session, turn, SESSION_EXPIRED, 'expired')
      }
      this.logger.log?.('error', `session ${session.id} failed`, {
        state: session.state.kind,
        error: error instanceof Error ? error.message : String(error),
      })
      await this.recover(session)
      return this.reply(session, turn, APOLOGY)
    }
  }

  private async route(session: ConversationSession, message: InboundMessage, turn: Turn): Promise<string> {
    if (session.userId === null) {
      return this.resolveIdentity(session, message, turn)
    }
    if (session.state.kind === 'tool_proposed') {
      return this.answerProposal(session, session.state.proposal, message, turn)
    }
    if (message.action) {
      return 'There is nothing waiting for your confirmation.'
    }
    if (!message.text.trim()) {
      return 'What can I help you with?'
    }
    return this.handleIntent(session, message.text, turn)
  }

  private async resolveIdentity(session: ConversationSession, message: InboundMessage, turn: Turn): Promise<string> {
    const fromTransport = message.identity?.trim()
    const signal = fromTransport || extractIdentity(message.text)
    if (!signal) {
      return ASK_FOR_CONTACT
    }

    this.transition(session, { kind: 'resolving' })
    let resolved: ResolveResult
    try {
      resolved = await this.services.profiles.resolve(signal)
    } catch (error) {
      if (error instanceof ValidationError) {
        this.transition(session, { kind: 'idle' })
        return ASK_FOR_CONTACT
      }
      throw error
    }
    session.userId = resolved.profile.id
    this.transition(session, { kind: 'awaiting_intent' })

    const welcome = await this.welcome(resolved)
    session.history.push({ role: 'assistant', content: welcome })

    if (fromTransport && message.text.trim()) {
      const answer = await this.handleIntent(session, message.text, turn)
      return `${welcome}\n${answer}`
    }
    return welcome
  }

  private async welcome({ profile, isNew }: ResolveResult): Promise<string> {
    const lastId = profile.history.at(-1)
    const last = lastId ? await this.services.ledger.get(lastId) : undefined
    const restaurant = last ? await this.services.catalog.get(last.restaurantId) : undefined
    return greeting(profile, isNew, last, restaurant?.name)
  }

  private async handleIntent(session: ConversationSession, text: string, turn: Turn): Promise<string> {
    session.history.push({ role: 'user', content: text })
    return this.converse(session, turn)
  }

  /**
   * Asks the model until it replies or suspends on a proposal. Read-only
   * tools run immediately. When the steps run out, or the model fails after
   * a tool already ran, the last result is summarized instead.
   */
  private async converse(session: ConversationSession, turn: Turn, lastResult?: ToolResult): Promise<string> {
    let last = lastResult

    for (let step = 0; step < this.maxToolSteps; step++) {
      let decision: ModelDecision
      try {
        decision = await this.decide(session)
      } catch (error) {
        if (!last || session.controller.signal.aborted) {
          throw error
        }
        this.logger.log?.('warn', 'model unavailable, summarizing last result', {
          error: error instanceof Error ? error.message : String(error),
        })
        return this.respond(session, describeResult(last))
      }

      if (decision.type === 'reply') {
        return this.respond(session, decision.text)
      }

      let call: ToolCall
      try {
        call = parseToolCall(decision.tool, decision.arguments)
      } catch (error) {
        if (error instanceof ValidationError) {
          return this.clarify(session, error)
        }
        throw error
      }

      const proposal: Proposal = { id: this.generateId(), call, summary: call.tool }
      this.transition(session, { kind: 'tool_proposed', proposal })

      if (!isSideEffect(call)) {
        last = await this.execute(session, turn, call)
        continue
      }

      const outcome = await this.propose(session, turn, proposal)
      if (typeof outcome === 'string') {
        return outcome
      }
      last = outcome
    }

    return this.respond(session, last ? describeResult(last) : APOLOGY)
  }

  private async decide(session: ConversationSession): Promise<ModelDecision> {
    const profile = session.userId ? await this.services.profiles.get(session.userId) : undefined
    const decision = await this.intentModel.decide({
      history: session.history.slice(-this.historyWindow),
      tools: toolSchemasForModel(),
      profile,
      today: dateFromClock(this.services.clock),
      signal: session.controller.signal,
    })
    this.throwIfExpired(session)
    return decision
  }

  /**
   * Prepares a side-effect call for confirmation. Returns the question when
   * the session is now suspended, or the refusal that was recorded instead.
   */
  private async propose(session: ConversationSession, turn: Turn, proposal: Proposal): Promise<string | ToolResult> {
    const { call } = proposal
    switch (call.tool) {
      case 'book_table':
        return this.proposeBooking(session, turn, proposal, call)
      case 'cancel_reservation': {
        const reservation = await this.services.ledger.get(call.args.reservationId)
        if (!reservation) {
          return this.recordFailure(session, turn, call, new NotFoundError('Reservation', call.args.reservationId))
        }
        if (reservation.userId !== session.userId) {
          return this.recordFailure(session, turn, call, new NotOwnerError())
        }
        const restaurant = await this.services.catalog.get(reservation.restaurantId)
        const where = restaurant?.name ?? reservation.restaurantId
        const detail = `${reservation.id} at ${where} on ${reservation.slot.date} at ${reservation.slot.time}`
        return this.suspend(session, turn, { ...proposal, summary: proposalQuestion(call, detail) })
      }
      default:
        return this.suspend(session, turn, { ...proposal, summary: proposalQuestion(call, '') })
    }
  }

  private async proposeBooking(
    session: ConversationSession,
    turn: Turn,
    proposal: Proposal,
    call: ToolCallOf<'book_table'>
  ): Promise<string | ToolResult> {
    const { slotId, partySize } = call.args
    const slot = session.offers.get(slotId)

    if (!slot) {
      const refusal = this.recordFailure(
        session,
        turn,
        call,
        new ValidationError(`Slot ${slotId} was not offered in this conversation`, {
          issues: ['Check availability before booking'],
        })
      )
      const recheck = availabilityCheckFor(slotId, partySize)
      return recheck ? this.execute(session, turn, recheck) : refusal
    }

    if (partySize > slot.seats) {
      return this.recordFailure(
        session,
        turn,
        call,
        new ValidationError(`Table ${slot.tableId} seats ${slot.seats}, not ${partySize}`)
      )
    }

    const userId = this.requireUser(session)
    let held: HoldResult
    try {
      held = await this.services.engine.hold(slot, { ownerId: userId })
    } catch (error) {
      if (error instanceof BookingError) {
        session.offers.delete(slot.id)
        return this.recordFailure(session, turn, call, error)
      }
      throw error
    }
    if (held.status === 'conflict') {
      session.offers.delete(slot.id)
      const message = held.reason === 'held' ? 'Someone else is holding that slot right now' : undefined
      return this.recordFailure(session, turn, call, new SlotConflictError(message))
    }
    if (session.controller.signal.aborted) {
      await this.services.engine.release(held.token)
      this.throwIfExpired(session)
    }

    const restaurant = await this.services.catalog.get(slot.restaurantId)
    const detail = `table ${slot.tableId} at ${restaurant?.name ?? slot.restaurantId} on ${slot.date} at ${slot.time}`
    return this.suspend(session, turn, {
      ...proposal,
      holdToken: held.token,
      idempotencyKey: `${session.id}:${proposal.id}`,
      summary: proposalQuestion(call, detail),
    })
  }

  private suspend(session: ConversationSession, turn: Turn, proposal: Proposal): string {
    this.transition(session, { kind: 'tool_proposed', proposal })
    session.history.push({ role: 'assistant', content: proposal.summary })
    turn.suggestions = ['yes', 'no']
    return proposal.summary
  }

  private async answerProposal(
    session: ConversationSession,
    proposal: Proposal,
    message: InboundMessage,
    turn: Turn
  ): Promise<string> {
    const action = message.action ?? classifyConfirmation(message.text)

    if (action === undefined) {
      await this.releaseProposal(proposal)
      this.transition(session, { kind: 'awaiting_intent' })
      return message.text.trim() ? this.handleIntent(session, message.text, turn) : 'What can I help you with?'
    }

    session.history.push({ role: 'user', content: message.text.trim() || action })

    if (action === 'decline') {
      await this.releaseProposal(proposal)
      this.transition(session, { kind: 'awaiting_intent' })
      const text = declinedReply(proposal.call)
      session.history.push({ role: 'assistant', content: text })
      return text
    }

    this.transition(session, { kind: 'tool_confirmed', proposal })
    const booking =
      proposal.holdToken && proposal.idempotencyKey
        ? { holdToken: proposal.holdToken, idempotencyKey: proposal.idempotencyKey }
        : undefined
    let result: ToolResult
    try {
      result = await this.execute(session, turn, proposal.call, booking)
    } catch (error) {
      await this.releaseProposal(proposal)
      throw error
    }
    await this.afterConfirmed(session, proposal, result)
    return this.converse(session, turn, result)
  }

  private async afterConfirmed(session: ConversationSession, proposal: Proposal, result: ToolResult): Promise<void> {
    if (proposal.call.tool !== 'book_table') {
      return
    }
    session.offers.delete(proposal.call.args.slotId)

    if (!result.ok) {
      await this.releaseProposal(proposal)
      return
    }
    if (result.tool !== 'book_table') {
      return
    }

    const userId = this.requireUser(session)
    const reservationId = result.data.reservation.id
    try {
      await withRetry(() => this.services.profiles.appendHistory(userId, reservationId), {
        ...DEFAULT_TOOL_RETRY,
        ...this.retry,
      })
    } catch (error) {
      this.logger.log?.('error', `history append failed for ${reservationId}`, {
        userId,
        error: error instanceof Error ? error.message : String(error),
      })
    }
  }

  private async execute(
    session: ConversationSession,
    turn: Turn,
    call: ToolCall,
    booking?: { holdToken: string; idempotencyKey: string }
  ): Promise<ToolResult> {
    this.transition(session, { kind: 'tool_executing', call })
    const result = await executeTool(call, {
      services: this.services,
      userId: this.requireUser(session),
      sessionId: session.id,
      offers: session.offers,
      booking,
      retry: this.retry,
      logger: this.logger,
      signal: session.controller.signal,
    })
    this.record(session, turn, call, result)
    this.transition(session, { kind: 'responding' })
    return result
  }

  /** Records a refusal as the call's result without running it. */
  private recordFailure(session: ConversationSession, turn: Turn, call: ToolCall, error: BookingError): ToolResult {
    const result: ToolResult = { ok: false, tool: call.tool, error: toToolFailure(error) }
    this.record(session, turn, call, result)
    this.transition(session, { kind: 'responding' })
    return result
  }

  private record(session: ConversationSession, turn: Turn, call: ToolCall, result: ToolResult): void {
    session.history.push({ role: 'tool', callId: this.generateId(), tool: call.tool, args: call.args, result })
    turn.results.push(result)
    turn.suggestions = suggestionsFor(result)
  }

  private respond(session: ConversationSession, text: string): string {
    if (session.state.kind !== 'responding') {
      this.transition(session, { kind: 'responding' })
    }
    session.history.push({ role: 'assistant', content: text })
    this.transition(session, { kind: 'awaiting_intent' })
    return text
  }

  private clarify(session: ConversationSession, error: ValidationError): string {
    const text = `I need a bit more detail: ${error.issues.join('; ')}`
    if (session.state.kind === 'responding') {
      this.transition(session, { kind: 'awaiting_intent' })
    }
    session.history.push({ role: 'assistant', content: text })
    return text
  }

  private async recover(session: ConversationSession): Promise<void> {
    await this.releaseHold(session)
    this.force(session, session.userId === null ? { kind: 'idle' } : { kind: 'awaiting_intent' })
  }

  private async releaseHold(session: ConversationSession): Promise<void> {
    const { state } = session
    if (state.kind === 'tool_proposed' || state.kind === 'tool_confirmed') {
      await this.releaseProposal(state.proposal)
    }
  }

  private async releaseProposal(proposal: Proposal): Promise<void> {
    if (proposal.holdToken) {
      await this.services.engine.release(proposal.holdToken)
    }
  }

  private transition(session: ConversationSession, next: OrchestratorState): void {
    const from = session.state.kind
    if (!TRANSITIONS[from].includes(next.kind)) {
      throw new ExecutionError(`Illegal transition ${from} -> ${next.kind}`, {
        context: { sessionId: session.id },
      })
    }
    this.force(session, next)
  }

  private force(session: ConversationSession, next: OrchestratorState): void {
    const from = session.state.kind
    session.state = next
    this.logger.onStateTransition?.({
      type: 'state_transition',
      sessionId: session.id,
      from,
      to: next.kind,
      timestamp: Date.now(),
    })
  }

  private reply(session: ConversationSession, turn: Turn, text: string, state?: StateKind): OrchestratorReply {
    return {
      sessionId: session.id,
      text,
      state: state ?? session.state.kind,
      suggestions: turn.suggestions,
      toolResults: turn.results,
      renewed: turn.renewed,
    }
  }

  private requireUser(session: ConversationSession): string {
    if (session.userId === null) {
      throw new ExecutionError('Session has no resolved user', { context: { sessionId: session.id } })
    }
    return session.userId
  }

  private throwIfExpired(session: ConversationSession): void {
    if (session.controller.signal.aborted) {
      throw new ExecutionError('Session expired', { code: ExecutionErrorCode.CANCELLED })
    }
  }
}

/** The availability check that would have offered `slotId`, if the id can be read. */
function availabilityCheckFor(slotId: string, partySize: number): ToolCallOf<'check_availability'> | undefined {
  try {
    const ref = parseSlotId(slotId)
    const call = parseToolCall('check_availability', {
      restaurantId: ref.restaurantId,
      date: ref.date,
      time: ref.time,
      partySize,
    })
    return call.tool === 'check_availability' ? call : undefined
  } catch (error) {
    if (error instanceof ValidationError) {
      return undefined
    }
    throw error
  }
}

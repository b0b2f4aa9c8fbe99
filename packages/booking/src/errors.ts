import { TablewiseError, wrapAsError, type TablewiseErrorOptions } from '@tablewise/core'

/**
 * Error codes for booking operations
 */
export enum BookingErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  SLOT_CONFLICT = 'SLOT_CONFLICT',
  HOLD_EXPIRED = 'HOLD_EXPIRED',
  NOT_FOUND = 'NOT_FOUND',
  NOT_OWNER = 'NOT_OWNER',
  UPSTREAM_UNAVAILABLE = 'UPSTREAM_UNAVAILABLE',
}

export type BookingErrorOptions = Omit<TablewiseErrorOptions<BookingErrorCode>, 'code'>

/**
 * Base class of every error the booking stores throw.
 * The tool layer turns these into structured failures the conversation can talk about.
 */
export class BookingError extends TablewiseError<BookingErrorCode> {
  constructor(message: string, options: TablewiseErrorOptions<BookingErrorCode>) {
    super(message, options)
    this.name = 'BookingError'
  }

  static from(
    error: unknown,
    code: BookingErrorCode,
    context?: Record<string, unknown>
  ): BookingError {
    if (error instanceof BookingError) {
      return error
    }
    return wrapAsError(error, BookingError, { code, context })
  }
}

/**
 * Malformed input: bad tool arguments, impossible party sizes, unknown slots.
 * `issues` carries one readable line per problem.
 */
export class ValidationError extends BookingError {
  readonly issues: string[]

  constructor(message: string, options: BookingErrorOptions & { issues?: string[] } = {}) {
    super(message, { ...options, code: BookingErrorCode.VALIDATION_ERROR })
    this.name = 'ValidationError'
    this.issues = options.issues ?? [message]
  }
}

export class SlotConflictError extends BookingError {
  constructor(message = 'That slot is no longer available', options: BookingErrorOptions = {}) {
    super(message, { ...options, code: BookingErrorCode.SLOT_CONFLICT })
    this.name = 'SlotConflictError'
  }
}

export class HoldExpiredError extends BookingError {
  constructor(message = 'The hold on that slot has expired', options: BookingErrorOptions = {}) {
    super(message, { ...options, code: BookingErrorCode.HOLD_EXPIRED })
    this.name = 'HoldExpiredError'
  }
}

export class NotFoundError extends BookingError {
  readonly entity: string
  readonly id: string

  constructor(entity: string, id: string, options: BookingErrorOptions = {}) {
    super(`${entity} '${id}' not found`, {
      ...options,
      code: BookingErrorCode.NOT_FOUND,
      context: { entity, id, ...options.context },
    })
    this.name = 'NotFoundError'
    this.entity = entity
    this.id = id
  }
}

export class NotOwnerError extends BookingError {
  constructor(message = 'That reservation belongs to someone else', options: BookingErrorOptions = {}) {
    super(message, { ...options, code: BookingErrorCode.NOT_OWNER })
    this.name = 'NotOwnerError'
  }
}

/**
 * Storage or catalog I/O failed. Retryable.
 */
export class UpstreamUnavailableError extends BookingError {
  constructor(message: string, options: BookingErrorOptions = {}) {
    super(message, { ...options, code: BookingErrorCode.UPSTREAM_UNAVAILABLE })
    this.name = 'UpstreamUnavailableError'
  }

  override get isRetryable(): boolean {
    return true
  }

  static wrap(error: unknown, context?: Record<string, unknown>): BookingError {
    if (error instanceof BookingError) {
      return error
    }
    const cause = error instanceof Error ? error : new Error(String(error))
    return new UpstreamUnavailableError(cause.message, { cause, context })
  }
}

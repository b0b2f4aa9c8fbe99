import { ValidationError } from '../errors'

export type IdentityKind = 'email' | 'phone' | 'handle'

export interface NormalizedIdentity {
  kind: IdentityKind
  /** Stable lookup key. */
  value: string
}

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/
const PHONE_PATTERN = /^\+?[\d\s().-]+$/
const MIN_PHONE_DIGITS = 7

/**
 * Reduces an identity signal to its stable form: email addresses lower-cased,
 * phone numbers to digits with an optional leading '+', anything else trimmed.
 */
export function normalizeIdentity(signal: string): NormalizedIdentity {
  const trimmed = signal.trim()
  if (!trimmed) {
    throw new ValidationError('An email address or phone number is required')
  }

  if (EMAIL_PATTERN.test(trimmed)) {
    return { kind: 'email', value: trimmed.toLowerCase() }
  }

  if (PHONE_PATTERN.test(trimmed)) {
    const digits = trimmed.replace(/\D/g, '')
    if (digits.length >= MIN_PHONE_DIGITS) {
      return { kind: 'phone', value: `${trimmed.startsWith('+') ? '+' : ''}${digits}` }
    }
  }

  return { kind: 'handle', value: trimmed }
}

const EMAIL_IN_TEXT = /[^\s@<>(),;:"]+@[^\s@<>(),;:"]+\.[A-Za-z]{2,}/
const PHONE_IN_TEXT = /\+?\d[\d\s().-]{5,}\d/

/**
 * Finds an email address or phone number inside free text.
 */
export function extractIdentity(text: string): string | undefined {
  const email = EMAIL_IN_TEXT.exec(text)
  if (email) {
    return email[0]
  }
  const phone = PHONE_IN_TEXT.exec(text)
  if (phone && phone[0].replace(/\D/g, '').length >= MIN_PHONE_DIGITS) {
    return phone[0]
  }
  return undefined
}

import type { Slot } from '../availability/slot'
import type { Reservation } from '../ledger/types'
import type { UserProfile } from '../profiles/types'
import type { ToolResult } from '../tools/execute'
import type { ToolCall } from '../tools/registry'
import type { ConfirmAction } from './types'

export const ASK_FOR_CONTACT =
  'Hi! Before we start, what email address or phone number should I keep your reservations under?'

export const APOLOGY = "Sorry, I'm having trouble right now. Please try again in a moment."

export const SESSION_EXPIRED = 'This conversation timed out. Send a new message to start again.'

export function declinedReply(call: ToolCall): string {
  switch (call.tool) {
    case 'book_table':
      return "No problem, I haven't booked anything. Want to look at other times?"
    case 'cancel_reservation':
      return "Okay, I've left your reservation as it is."
    default:
      return "Okay, I've left things as they were."
  }
}

export function greeting(profile: UserProfile, isNew: boolean, last?: Reservation, lastName?: string): string {
  if (isNew) {
    return `Welcome! I've set you up under ${profile.contact.signal}. What are you in the mood for?`
  }
  const name = profile.contact.name ? `, ${profile.contact.name}` : ''
  if (last) {
    const where = lastName ?? last.restaurantId
    return `Welcome back${name}! Your last reservation was at ${where} on ${last.slot.date} at ${last.slot.time}. Where to this time?`
  }
  return `Welcome back${name}! Where would you like to eat?`
}

export function describeSlot(slot: Slot): string {
  return `${slot.time} (table ${slot.tableId}, ${slot.seats} seats)`
}

/** Question put to the user for a side-effect call. */
export function proposalQuestion(call: ToolCall, detail: string): string {
  switch (call.tool) {
    case 'book_table':
      return `Shall I book ${detail} for ${call.args.partySize}? (yes/no)`
    case 'cancel_reservation':
      return `Shall I cancel your reservation ${detail}? (yes/no)`
    case 'update_preferences':
      return call.args.dietaryPreferences.length
        ? `Shall I set your dietary preferences to ${call.args.dietaryPreferences.join(', ')}? (yes/no)`
        : 'Shall I clear your dietary preferences? (yes/no)'
    default:
      return `Shall I run ${call.tool}? (yes/no)`
  }
}

const YES = new Set(['y', 'yes', 'yeah', 'yep', 'yup', 'sure', 'ok', 'okay', 'confirm', 'go ahead', 'do it', 'please do', 'book it'])
const NO = new Set(['n', 'no', 'nope', 'nah', 'decline', "don't", 'dont', 'stop', 'never mind', 'nevermind', 'not now'])

/**
 * Reads a free-text answer to a proposal. Anything that is not a plain
 * yes or no is a new request.
 */
export function classifyConfirmation(text: string): ConfirmAction | undefined {
  const normalized = text
    .trim()
    .toLowerCase()
    .replace(/[.!?,]+$/g, '')
    .replace(/,?\s*(please|thanks|thank you)$/, '')
    .trim()
  if (YES.has(normalized)) {
    return 'confirm'
  }
  if (NO.has(normalized)) {
    return 'decline'
  }
  return undefined
}

/**
 * Plain-language rendering of a tool result, used when the model is not
 * asked (or no longer asked) to word the reply.
 */
export function describeResult(result: ToolResult): string {
  if (!result.ok) {
    return result.error.suggestion ? `${result.error.message}. ${result.error.suggestion}.` : `${result.error.message}.`
  }

  switch (result.tool) {
    case 'search_restaurants': {
      const { restaurants } = result.data
      if (restaurants.length === 0) {
        return "I couldn't find any restaurants matching that."
      }
      const list = restaurants.map((r) => `${r.name} (${r.cuisine}, ${r.location}, ${r.priceTier})`).join('; ')
      return `I found ${restaurants.length}: ${list}.`
    }
    case 'get_restaurant_details': {
      const r = result.data.restaurant
      return `${r.name} serves ${r.cuisine} food in ${r.location} and is open ${r.hours.open}-${r.hours.close}.`
    }
    case 'check_availability': {
      const { slots, restaurantName, date, partySize, more } = result.data
      if (slots.length === 0) {
        return `${restaurantName} has no free tables for ${partySize} on ${date} at that time.`
      }
      const times = slots.map(describeSlot).join(', ')
      return `${restaurantName} on ${date} for ${partySize}: ${times}${more ? ', and more' : ''}.`
    }
    case 'recommend_restaurants': {
      const names = result.data.recommendations.map((r) => r.restaurant.name)
      return names.length ? `You might like ${names.join(', ')}.` : 'I have nothing to recommend yet.'
    }
    case 'list_reservations': {
      const { reservations } = result.data
      if (reservations.length === 0) {
        return 'You have no upcoming reservations.'
      }
      const list = reservations
        .map((r) => `${r.id} at ${r.restaurantId} on ${r.slot.date} ${r.slot.time} for ${r.partySize}`)
        .join('; ')
      return `Your reservations: ${list}.`
    }
    case 'book_table': {
      const { reservation } = result.data
      return `You're booked: table ${reservation.slot.tableId} on ${reservation.slot.date} at ${reservation.slot.time} for ${reservation.partySize}. Reservation ${reservation.id}.`
    }
    case 'cancel_reservation':
      return `Reservation ${result.data.ack.reservationId} is cancelled.`
    case 'update_preferences': {
      const tags = result.data.dietaryPreferences
      return tags.length ? `Your dietary preferences are now ${tags.join(', ')}.` : 'Your dietary preferences are cleared.'
    }
  }
}

/** Follow-up suggestions for a result. */
export function suggestionsFor(result: ToolResult): string[] {
  if (!result.ok) {
    return result.error.suggestion ? [result.error.suggestion] : []
  }
  if (result.tool === 'check_availability') {
    return result.data.slots.map((slot) => `Book ${slot.time} at table ${slot.tableId}`)
  }
  return []
}

import type { z } from 'zod'
import { ValidationError } from '../errors'
import { formatIssues } from '../catalog/schema'
import {
  bookTableSchema,
  cancelReservationSchema,
  checkAvailabilitySchema,
  getRestaurantDetailsSchema,
  listReservationsSchema,
  recommendRestaurantsSchema,
  searchRestaurantsSchema,
  updatePreferencesSchema,
  type BookTableArgs,
  type CancelReservationArgs,
  type CheckAvailabilityArgs,
  type GetRestaurantDetailsArgs,
  type ListReservationsArgs,
  type RecommendRestaurantsArgs,
  type SearchRestaurantsArgs,
  type UpdatePreferencesArgs,
} from './schemas'

type ArgsSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>

export interface ToolDefinition<T = unknown> {
  description: string
  /** Side-effect tools wait for the user to confirm. */
  sideEffect: boolean
  schema: ArgsSchema<T>
}

export interface ToolArgs {
  search_restaurants: SearchRestaurantsArgs
  get_restaurant_details: GetRestaurantDetailsArgs
  check_availability: CheckAvailabilityArgs
  recommend_restaurants: RecommendRestaurantsArgs
  list_reservations: ListReservationsArgs
  book_table: BookTableArgs
  cancel_reservation: CancelReservationArgs
  update_preferences: UpdatePreferencesArgs
}

export type ToolName = keyof ToolArgs

/** A validated tool call, tagged by tool name. */
export type ToolCall = { [K in ToolName]: { tool: K; args: ToolArgs[K] } }[ToolName]

export type ToolCallOf<K extends ToolName> = Extract<ToolCall, { tool: K }>

export const TOOL_DEFINITIONS: { [K in ToolName]: ToolDefinition<ToolArgs[K]> } = {
  search_restaurants: {
    description: 'Search restaurants by cuisine, location, price tier ($ to $$$$), features or free text',
    sideEffect: false,
    schema: searchRestaurantsSchema,
  },
  get_restaurant_details: {
    description: 'Get the full record of one restaurant, including tables, hours and menu',
    sideEffect: false,
    schema: getRestaurantDetailsSchema,
  },
  check_availability: {
    description:
      'List free tables at a restaurant (id or name) for a date and party size. ' +
      'Give an exact time, or a timeFrom/timeTo window, or neither for the whole day',
    sideEffect: false,
    schema: checkAvailabilitySchema,
  },
  recommend_restaurants: {
    description:
      "Recommend restaurants for the user's preferences and occasion, " +
      'or ones like a given restaurant (id or name) with similarTo',
    sideEffect: false,
    schema: recommendRestaurantsSchema,
  },
  list_reservations: {
    description: "List the user's upcoming reservations",
    sideEffect: false,
    schema: listReservationsSchema,
  },
  book_table: {
    description: 'Book a slot returned by check_availability. The user is asked to confirm first',
    sideEffect: true,
    schema: bookTableSchema,
  },
  cancel_reservation: {
    description: "Cancel one of the user's reservations. The user is asked to confirm first",
    sideEffect: true,
    schema: cancelReservationSchema,
  },
  update_preferences: {
    description: "Replace the user's dietary preferences, e.g. vegetarian or gluten_free",
    sideEffect: true,
    schema: updatePreferencesSchema,
  },
}

export const TOOL_NAMES = Object.keys(TOOL_DEFINITIONS).filter(isToolName)

export function isToolName(name: string): name is ToolName {
  return Object.hasOwn(TOOL_DEFINITIONS, name)
}

export function isSideEffect(call: ToolCall): boolean {
  return TOOL_DEFINITIONS[call.tool].sideEffect
}

function validate<T>(tool: ToolName, schema: ArgsSchema<T>, args: unknown): T {
  const result = schema.safeParse(args ?? {})
  if (!result.success) {
    const issues = formatIssues(result.error)
    throw new ValidationError(`Invalid arguments for ${tool}: ${issues.join('; ')}`, {
      issues,
      context: { tool },
    })
  }
  return result.data
}

const parsers: { [K in ToolName]: (args: unknown) => ToolCallOf<K> } = {
  search_restaurants: (args) => ({
    tool: 'search_restaurants',
    args: validate('search_restaurants', searchRestaurantsSchema, args),
  }),
  get_restaurant_details: (args) => ({
    tool: 'get_restaurant_details',
    args: validate('get_restaurant_details', getRestaurantDetailsSchema, args),
  }),
  check_availability: (args) => ({
    tool: 'check_availability',
    args: validate('check_availability', checkAvailabilitySchema, args),
  }),
  recommend_restaurants: (args) => ({
    tool: 'recommend_restaurants',
    args: validate('recommend_restaurants', recommendRestaurantsSchema, args),
  }),
  list_reservations: (args) => ({
    tool: 'list_reservations',
    args: validate('list_reservations', listReservationsSchema, args),
  }),
  book_table: (args) => ({
    tool: 'book_table',
    args: validate('book_table', bookTableSchema, args),
  }),
  cancel_reservation: (args) => ({
    tool: 'cancel_reservation',
    args: validate('cancel_reservation', cancelReservationSchema, args),
  }),
  update_preferences: (args) => ({
    tool: 'update_preferences',
    args: validate('update_preferences', updatePreferencesSchema, args),
  }),
}

/**
 * Validates untrusted model output into a tagged tool call.
 * Unknown tools and unknown argument fields are rejected.
 *
 * @throws ValidationError
 */
export function parseToolCall(name: string, args: unknown): ToolCall {
  if (!isToolName(name)) {
    throw new ValidationError(`Unknown tool '${name}'`, {
      issues: [`tool must be one of: ${TOOL_NAMES.join(', ')}`],
    })
  }
  return parsers[name](args)
}

export interface ToolSpec {
  name: ToolName
  description: string
  sideEffect: boolean
  inputSchema: ArgsSchema<unknown>
}

/** The registry as handed to the language model. */
export function toolSchemasForModel(): ToolSpec[] {
  return TOOL_NAMES.map((name) => {
    const { description, sideEffect, schema } = TOOL_DEFINITIONS[name]
    return { name, description, sideEffect, inputSchema: schema }
  })
}

import { z } from 'zod'
import { isDate, isTime } from '../availability/time'
import { priceTierSchema } from '../catalog/schema'

const timeSchema = z.string().refine(isTime, { message: 'Expected a time as HH:mm' })

/** 'YYYY-MM-DD', or 'today' / 'tomorrow' relative to the booking clock. */
const dateSchema = z
  .string()
  .refine((value) => value === 'today' || value === 'tomorrow' || isDate(value), {
    message: "Expected a date as YYYY-MM-DD, 'today' or 'tomorrow'",
  })

export const searchRestaurantsSchema = z
  .object({
    cuisine: z.string().min(1).optional(),
    location: z.string().min(1).optional(),
    priceTier: priceTierSchema.optional(),
    features: z.array(z.string().min(1)).optional(),
    query: z.string().min(1).optional(),
  })
  .strict()

export const getRestaurantDetailsSchema = z
  .object({
    restaurantId: z.string().min(1, 'restaurantId is required'),
  })
  .strict()

export const checkAvailabilitySchema = z
  .object({
    restaurantId: z.string().min(1, 'restaurantId is required'),
    date: dateSchema,
    time: timeSchema.optional(),
    timeFrom: timeSchema.optional(),
    timeTo: timeSchema.optional(),
    partySize: z.number().int().min(1, 'partySize must be at least 1').max(20, 'partySize must be at most 20'),
  })
  .strict()
  .refine((args) => !(args.time && (args.timeFrom || args.timeTo)), {
    message: 'Give either time or timeFrom/timeTo, not both',
    path: ['time'],
  })
  .refine((args) => Boolean(args.timeFrom) === Boolean(args.timeTo), {
    message: 'timeFrom and timeTo go together',
    path: ['timeTo'],
  })

export const recommendRestaurantsSchema = z
  .object({
    cuisine: z.string().min(1).optional(),
    location: z.string().min(1).optional(),
    priceTier: priceTierSchema.optional(),
    occasion: z.string().min(1).optional(),
    similarTo: z.string().min(1).optional(),
  })
  .strict()
  .refine((args) => !(args.similarTo && (args.cuisine || args.location || args.priceTier || args.occasion)), {
    message: 'similarTo stands alone',
    path: ['similarTo'],
  })

export const listReservationsSchema = z.object({}).strict()

export const bookTableSchema = z
  .object({
    slotId: z.string().min(1, 'slotId is required'),
    partySize: z.number().int().min(1, 'partySize must be at least 1'),
    specialRequests: z.string().max(500).optional(),
  })
  .strict()

export const cancelReservationSchema = z
  .object({
    reservationId: z.string().min(1, 'reservationId is required'),
  })
  .strict()

export const updatePreferencesSchema = z
  .object({
    dietaryPreferences: z.array(z.string().min(1)),
  })
  .strict()

export type SearchRestaurantsArgs = z.infer<typeof searchRestaurantsSchema>
export type GetRestaurantDetailsArgs = z.infer<typeof getRestaurantDetailsSchema>
export type CheckAvailabilityArgs = z.infer<typeof checkAvailabilitySchema>
export type RecommendRestaurantsArgs = z.infer<typeof recommendRestaurantsSchema>
export type ListReservationsArgs = z.infer<typeof listReservationsSchema>
export type BookTableArgs = z.infer<typeof bookTableSchema>
export type CancelReservationArgs = z.infer<typeof cancelReservationSchema>
export type UpdatePreferencesArgs = z.infer<typeof updatePreferencesSchema>

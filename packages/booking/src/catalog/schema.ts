import { z } from 'zod'
import { ValidationError } from '../errors'
import { isTime, toMinutes } from '../availability/time'

export const PRICE_TIERS = ['$', '$$', '$$$', '$$$$'] as const

export const priceTierSchema = z.enum(PRICE_TIERS, {
  errorMap: () => ({ message: "priceTier must be one of '$', '$$', '$$$', '$$$$'" }),
})

const timeSchema = z.string().refine(isTime, { message: 'Expected HH:mm' })

export const tableSchema = z.object({
  id: z.string().min(1, 'Table id is required'),
  seats: z.number().int().positive(),
})

export const menuItemSchema = z.object({
  name: z.string().min(1),
  section: z.string().min(1),
  priceCents: z.number().int().nonnegative(),
  description: z.string().optional(),
  dietaryTags: z.array(z.string()).optional(),
})

export const restaurantSchema = z
  .object({
    id: z.string().min(1, 'Restaurant id is required'),
    name: z.string().min(1, 'Restaurant name is required'),
    cuisine: z.string().min(1),
    priceTier: priceTierSchema,
    location: z.string().min(1),
    address: z.string().optional(),
    rating: z.number().min(0).max(5).default(0),
    features: z.array(z.string()).default([]),
    dietaryTags: z.array(z.string()).default([]),
    hours: z.object({ open: timeSchema, close: timeSchema }),
    tables: z.array(tableSchema).min(1, 'At least one table is required'),
    menu: z.array(menuItemSchema).default([]),
  })
  .refine((r) => toMinutes(r.hours.open) < toMinutes(r.hours.close), {
    message: 'hours.open must be before hours.close',
    path: ['hours'],
  })
  .refine((r) => new Set(r.tables.map((t) => t.id)).size === r.tables.length, {
    message: 'Table ids must be unique',
    path: ['tables'],
  })

export const catalogSeedSchema = z.object({
  restaurants: z.array(restaurantSchema),
})

export type PriceTier = z.infer<typeof priceTierSchema>
export type Table = z.infer<typeof tableSchema>
export type MenuItem = z.infer<typeof menuItemSchema>
export type Restaurant = z.infer<typeof restaurantSchema>
/** Restaurant as written by an administrator, before defaults apply. */
export type RestaurantInput = z.input<typeof restaurantSchema>
export type CatalogSeed = z.infer<typeof catalogSeedSchema>

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}

export function validateRestaurant(input: unknown): Restaurant {
  const result = restaurantSchema.safeParse(input)
  if (!result.success) {
    const issues = formatIssues(result.error)
    throw new ValidationError(`Invalid restaurant:\n  - ${issues.join('\n  - ')}`, { issues })
  }
  return result.data
}

import { z } from 'zod'

export const contactSchema = z.object({
  signal: z.string(),
  name: z.string().optional(),
  email: z.string().optional(),
  phone: z.string().optional(),
})

export const userProfileSchema = z.object({
  id: z.string(),
  contact: contactSchema,
  dietaryPreferences: z.array(z.string()),
  history: z.array(z.string()),
  isReturning: z.boolean(),
  createdAt: z.string(),
  updatedAt: z.string(),
})

export type Contact = z.infer<typeof contactSchema>
export type UserProfile = z.infer<typeof userProfileSchema>

export interface ResolveResult {
  profile: UserProfile
  isNew: boolean
}

export interface ContactUpdate {
  name?: string
  email?: string
  phone?: string
}

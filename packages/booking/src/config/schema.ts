import { z } from 'zod'
import { ConfigurationError, ConfigurationErrorCode } from '@tablewise/core'
import { formatIssues } from '../catalog/schema'

const positiveInt = z.coerce.number().int().positive()

export const LLM_PROVIDERS = ['openai', 'google'] as const

export const bookingConfigSchema = z
  .object({
    holds: z.object({ ttlSeconds: positiveInt }).strict(),
    availability: z
      .object({
        slotIntervalMinutes: positiveInt,
        diningMinutes: positiveInt,
      })
      .strict(),
    sessions: z
      .object({
        timeoutMinutes: positiveInt,
        sweepIntervalSeconds: positiveInt,
      })
      .strict(),
    orchestrator: z
      .object({
        maxToolSteps: positiveInt,
        historyWindow: positiveInt,
      })
      .strict(),
    retry: z
      .object({
        maxAttempts: positiveInt,
        baseDelayMs: z.coerce.number().int().nonnegative(),
      })
      .strict(),
    llm: z
      .object({
        provider: z.enum(LLM_PROVIDERS, {
          errorMap: () => ({ message: "provider must be 'openai' or 'google'" }),
        }),
        model: z.string().min(1, 'model is required'),
        apiKey: z.string().min(1).optional(),
      })
      .strict(),
    storage: z.object({ dataDir: z.string().min(1).optional() }).strict(),
    catalog: z.object({ seedPath: z.string().min(1).optional() }).strict(),
  })
  .strict()

export type BookingConfig = z.infer<typeof bookingConfigSchema>

export type LlmProviderName = BookingConfig['llm']['provider']

export const DEFAULT_CONFIG: BookingConfig = {
  holds: { ttlSeconds: 180 },
  availability: { slotIntervalMinutes: 30, diningMinutes: 90 },
  sessions: { timeoutMinutes: 30, sweepIntervalSeconds: 60 },
  orchestrator: { maxToolSteps: 3, historyWindow: 20 },
  retry: { maxAttempts: 3, baseDelayMs: 100 },
  llm: { provider: 'openai', model: 'gpt-4o-mini' },
  storage: {},
  catalog: {},
}

/**
 * @throws ConfigurationError INVALID_CONFIG listing every problem
 */
export function validateConfig(config: unknown): BookingConfig {
  const result = bookingConfigSchema.safeParse(config)
  if (!result.success) {
    const issues = formatIssues(result.error)
    throw new ConfigurationError(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`, {
      code: ConfigurationErrorCode.INVALID_CONFIG,
      context: { issues },
    })
  }
  return result.data
}

import { z } from 'zod'
import { ShoppingError } from '@domain/errors.ts'

// setTimeout fires at once for delays above 2^31 - 1 ms
const MAX_TIMEOUT_MS = 2_147_483_647

const envSchema = z.object({
  PRICING_API_URL: z.string().url().default('https://api.example-grocer.test/v1'),
  PRICING_API_KEY: z.string().optional(),
  PRICING_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMEOUT_MS).default(5000),
  PRICING_CURRENCY: z.string().regex(/^[A-Z]{3}$/, 'Expected an ISO 4217 code').default('EUR'),
})

export interface MealcartConfig {
  readonly pricing: {
    readonly apiUrl: string
    readonly apiKey: string | null   // null selects the simulated provider
    readonly timeoutMs: number
    readonly currency: string
  }
}

/**
 * Read configuration from environment variables. The returned object is
 * frozen and meant to be passed down explicitly.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): MealcartConfig {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new ShoppingError('VALIDATION_ERROR', `Invalid configuration: ${detail}`, {
      issues: result.error.issues,
    })
  }

  const parsed = result.data
  return Object.freeze({
    pricing: Object.freeze({
      apiUrl: parsed.PRICING_API_URL.replace(/\/+$/, ''),
      apiKey: parsed.PRICING_API_KEY?.trim() || null,
      timeoutMs: parsed.PRICING_TIMEOUT_MS,
      currency: parsed.PRICING_CURRENCY,
    }),
  })
}

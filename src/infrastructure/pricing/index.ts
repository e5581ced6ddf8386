import type { EstimateOptions, PricingProvider } from '@application/grocery/estimateCost.ts'
import type { MealcartConfig } from '@infrastructure/config.ts'
import { PricingApiClient } from './pricingApi.ts'
import { SimulatedPricingProvider } from './simulatedPricing.ts'

export { PricingApiClient } from './pricingApi.ts'
export { SimulatedPricingProvider } from './simulatedPricing.ts'

export function createPricingProvider(config: MealcartConfig): PricingProvider {
  const { apiKey, apiUrl, currency } = config.pricing
  if (!apiKey) {
    console.warn('[Mealcart] PRICING_API_KEY not set, using simulated prices')
    return new SimulatedPricingProvider(currency)
  }
  return new PricingApiClient({ apiUrl, apiKey, currency })
}

/** Timeout and currency the estimator must use with the configured provider. */
export function estimateOptionsFromConfig(config: MealcartConfig): EstimateOptions {
  return { timeoutMs: config.pricing.timeoutMs, currency: config.pricing.currency }
}

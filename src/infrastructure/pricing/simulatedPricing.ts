import type { Unit } from '@domain/constants/units.ts'
import { toDecimal } from '@domain/decimal.ts'
import type { PriceLookup, PricingProvider } from '@application/grocery/estimateCost.ts'

interface SimulatedPrice {
  keyword: string
  price: string
  unit: Unit
}

const SIMULATED_PRICES: SimulatedPrice[] = [
  { keyword: 'tomato', price: '3.50', unit: 'KG' },
  { keyword: 'onion', price: '1.80', unit: 'KG' },
  { keyword: 'carrot', price: '2.20', unit: 'KG' },
  { keyword: 'chicken', price: '8.90', unit: 'KG' },
  { keyword: 'rice', price: '4.50', unit: 'KG' },
]

const FALLBACK: Omit<SimulatedPrice, 'keyword'> = { price: '5.00', unit: 'COUNT' }

/**
 * Offline stand-in for the pricing API, used when no API key is configured.
 * Matches a handful of keywords and quotes a flat per-item price otherwise.
 */
export class SimulatedPricingProvider implements PricingProvider {
  constructor(private readonly currency: string) {}

  async lookupPrice(searchTerm: string, _unit: Unit, signal: AbortSignal): Promise<PriceLookup> {
    if (signal.aborted) throw new Error('Price lookup aborted')
    const term = searchTerm.toLowerCase()
    const match = SIMULATED_PRICES.find((p) => term.includes(p.keyword)) ?? FALLBACK
    return {
      status: 'resolved',
      unitPrice: toDecimal(match.price),
      currency: this.currency,
      unit: match.unit,
    }
  }
}

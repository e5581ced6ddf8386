import { z } from 'zod'
import { parseUnitText, type Unit } from '@domain/constants/units.ts'
import { toDecimal } from '@domain/decimal.ts'
import type { PriceLookup, PricingProvider } from '@application/grocery/estimateCost.ts'

export interface RetailProduct {
  productId: string
  name: string
  price: number
  unit: Unit
  currency: string
}

const productSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  name: z.string(),
  price: z.number().nonnegative(),
  unit: z.string(),
  currency: z.string().optional(),
})

const searchResponseSchema = z.object({
  products: z.array(productSchema).default([]),
})

export interface PricingApiOptions {
  apiUrl: string
  apiKey: string
  currency: string
}

/**
 * Retail product-search API. Prices are quoted per unit ("kg", "l",
 * "piece"); the first hit for a search term is taken as its price.
 */
export class PricingApiClient implements PricingProvider {
  constructor(private readonly options: PricingApiOptions) {}

  async searchProducts(term: string, limit: number, signal?: AbortSignal): Promise<RetailProduct[]> {
    const url = `${this.options.apiUrl}/products/search?q=${encodeURIComponent(term)}&limit=${limit}`
    const response = await fetch(url, {
      headers: { Authorization: `Bearer ${this.options.apiKey}`, Accept: 'application/json' },
      signal,
    })

    if (!response.ok) {
      const text = await response.text()
      throw new Error(`Pricing API error (${response.status}): ${text.slice(0, 200)}`)
    }

    const parsed = searchResponseSchema.safeParse(await response.json())
    if (!parsed.success) {
      throw new Error(`Pricing API returned an unexpected payload: ${parsed.error.issues[0]?.message ?? 'unknown'}`)
    }

    const products: RetailProduct[] = []
    for (const p of parsed.data.products) {
      const unit = parseUnitText(p.unit)
      if (!unit) {
        console.warn(`[Mealcart] Skipping product ${p.id}: unrecognized price unit "${p.unit}"`)
        continue
      }
      products.push({
        productId: p.id,
        name: p.name,
        price: p.price,
        unit,
        currency: p.currency ?? this.options.currency,
      })
    }
    return products
  }

  async lookupPrice(searchTerm: string, _unit: Unit, signal: AbortSignal): Promise<PriceLookup> {
    const [product] = await this.searchProducts(searchTerm, 1, signal)
    if (!product) return { status: 'unresolved' }
    return {
      status: 'resolved',
      unitPrice: toDecimal(product.price),
      currency: product.currency,
      unit: product.unit,
    }
  }
}

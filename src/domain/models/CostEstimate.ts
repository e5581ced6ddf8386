import type { Decimal } from 'decimal.js'
import type { Unit } from '@domain/constants/units.ts'
import type { IngredientCategory } from '@domain/constants/categories.ts'

export type UnresolvedReason =
  | 'no-search-term'
  | 'unknown-ingredient'
  | 'not-found'
  | 'timeout'
  | 'lookup-failed'
  | 'currency-mismatch'
  | 'incompatible-unit'

export interface PricedLine {
  ingredientId: string
  unit: Unit                 // canonical unit of the list line
  pricedUnit: Unit           // unit the provider quoted the price in
  pricedQuantity: Decimal    // line quantity converted to pricedUnit
  unitPrice: Decimal
  cost: Decimal
}

export interface UnresolvedLine {
  ingredientId: string
  unit: Unit
  reason: UnresolvedReason
}

/**
 * Best-effort cost of a shopping list. When `partial` is true the totals
 * only cover priced lines and are a lower bound.
 */
export interface CostEstimate {
  currency: string
  perCategory: Record<IngredientCategory, Decimal>
  grandTotal: Decimal
  priced: PricedLine[]
  unresolved: UnresolvedLine[]
  unresolvedIngredientIds: string[]
  partial: boolean
  estimatedAt: string
}

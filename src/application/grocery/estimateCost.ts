import type { Decimal } from 'decimal.js'
import { INGREDIENT_CATEGORIES, type IngredientCategory } from '@domain/constants/categories.ts'
import type { Unit } from '@domain/constants/units.ts'
import type { CostEstimate, PricedLine, UnresolvedLine, UnresolvedReason } from '@domain/models/CostEstimate.ts'
import type { AggregatedLine, ShoppingList } from '@domain/models/ShoppingList.ts'
import { ZERO } from '@domain/decimal.ts'
import { createConversionTable } from '@application/scaler/convertUnit.ts'
import { QuantityNormalizer } from '@application/scaler/normalizeQuantity.ts'
import type { IngredientStore } from './stores.ts'

export type PriceLookup =
  | { status: 'resolved'; unitPrice: Decimal; currency: string; unit: Unit }
  | { status: 'unresolved' }

/**
 * Source of unit prices. "No result" is a normal `unresolved` answer, not an
 * exception; the signal aborts when the estimator gives up on the lookup.
 */
export interface PricingProvider {
  lookupPrice(searchTerm: string, unit: Unit, signal: AbortSignal): Promise<PriceLookup>
}

export const DEFAULT_PRICE_TIMEOUT_MS = 5000
export const DEFAULT_CURRENCY = 'EUR'

export interface EstimateOptions {
  timeoutMs?: number
  currency?: string
  normalizer?: QuantityNormalizer
  now?: () => Date
}

type LineResult =
  | { kind: 'priced'; category: IngredientCategory; priced: PricedLine }
  | { kind: 'unresolved'; category: IngredientCategory; unresolved: UnresolvedLine }

interface LineTask {
  category: IngredientCategory
  line: AggregatedLine
}

const TIMED_OUT = Symbol('timed-out')

function unresolved(task: LineTask, reason: UnresolvedReason): LineResult {
  return {
    kind: 'unresolved',
    category: task.category,
    unresolved: { ingredientId: task.line.ingredientId, unit: task.line.unit, reason },
  }
}

async function lookupWithTimeout(
  provider: PricingProvider,
  searchTerm: string,
  unit: Unit,
  timeoutMs: number,
): Promise<PriceLookup | typeof TIMED_OUT> {
  const controller = new AbortController()
  let timer: ReturnType<typeof setTimeout> | undefined
  const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => {
      controller.abort()
      resolve(TIMED_OUT)
    }, timeoutMs)
  })

  try {
    return await Promise.race([provider.lookupPrice(searchTerm, unit, controller.signal), timeout])
  } finally {
    clearTimeout(timer)
  }
}

async function priceLine(
  task: LineTask,
  ingredients: IngredientStore,
  provider: PricingProvider,
  normalizer: QuantityNormalizer,
  currency: string,
  timeoutMs: number,
): Promise<LineResult> {
  const { line } = task
  const ingredient = ingredients.getIngredient(line.ingredientId)
  if (!ingredient) return unresolved(task, 'unknown-ingredient')
  if (!ingredient.searchTerm) return unresolved(task, 'no-search-term')

  let lookup: PriceLookup | typeof TIMED_OUT
  try {
    lookup = await lookupWithTimeout(provider, ingredient.searchTerm, line.unit, timeoutMs)
  } catch (err) {
    console.warn(
      `[Mealcart] Price lookup failed for "${ingredient.searchTerm}":`,
      err instanceof Error ? err.message : err,
    )
    return unresolved(task, 'lookup-failed')
  }

  if (lookup === TIMED_OUT) {
    console.warn(`[Mealcart] Price lookup for "${ingredient.searchTerm}" timed out after ${timeoutMs}ms`)
    return unresolved(task, 'timeout')
  }
  if (lookup.status === 'unresolved') return unresolved(task, 'not-found')
  if (lookup.currency !== currency) return unresolved(task, 'currency-mismatch')
  if (!normalizer.isConvertible(line.unit, lookup.unit)) return unresolved(task, 'incompatible-unit')
  if (!lookup.unitPrice.isFinite() || lookup.unitPrice.isNegative()) return unresolved(task, 'lookup-failed')

  const pricedQuantity = normalizer.convert(line.quantity, line.unit, lookup.unit)
  return {
    kind: 'priced',
    category: task.category,
    priced: {
      ingredientId: line.ingredientId,
      unit: line.unit,
      pricedUnit: lookup.unit,
      pricedQuantity,
      unitPrice: lookup.unitPrice,
      cost: pricedQuantity.times(lookup.unitPrice),
    },
  }
}

function resultKey(result: LineResult): { ingredientId: string; unit: Unit } {
  return result.kind === 'priced' ? result.priced : result.unresolved
}

function compareResults(a: LineResult, b: LineResult): number {
  const ka = resultKey(a)
  const kb = resultKey(b)
  if (ka.ingredientId !== kb.ingredientId) return ka.ingredientId < kb.ingredientId ? -1 : 1
  if (ka.unit !== kb.unit) return ka.unit < kb.unit ? -1 : 1
  return 0
}

/**
 * Best-effort cost of a list.
 *
 * Every line is looked up concurrently with its own timeout. Lines whose
 * ingredient has no search term, or whose lookup returns nothing, fails,
 * times out, or quotes in another currency or an unrelated unit, are left
 * out of the totals and reported in `unresolvedIngredientIds`. Pricing
 * problems never reject the returned promise.
 */
export async function estimateCost(
  list: ShoppingList,
  ingredients: IngredientStore,
  provider: PricingProvider,
  options: EstimateOptions = {},
): Promise<CostEstimate> {
  const normalizer = options.normalizer ?? new QuantityNormalizer(createConversionTable())
  const currency = options.currency ?? DEFAULT_CURRENCY
  const timeoutMs = options.timeoutMs ?? DEFAULT_PRICE_TIMEOUT_MS

  const tasks: LineTask[] = INGREDIENT_CATEGORIES.flatMap((category) =>
    list.categories[category].map((line) => ({ category, line })),
  )

  const results = await Promise.all(
    tasks.map((task) => priceLine(task, ingredients, provider, normalizer, currency, timeoutMs)),
  )
  results.sort(compareResults)

  const perCategory: Record<IngredientCategory, Decimal> = {
    DRY: ZERO,
    CHILLED_RETAIL: ZERO,
    CHILLED_ARTISAN: ZERO,
  }
  const priced: PricedLine[] = []
  const unresolvedLines: UnresolvedLine[] = []

  for (const result of results) {
    if (result.kind === 'priced') {
      perCategory[result.category] = perCategory[result.category].plus(result.priced.cost)
      priced.push(result.priced)
    } else {
      unresolvedLines.push(result.unresolved)
    }
  }

  const grandTotal = INGREDIENT_CATEGORIES.reduce((sum, c) => sum.plus(perCategory[c]), ZERO)
  const unresolvedIngredientIds = [...new Set(unresolvedLines.map((u) => u.ingredientId))]

  return {
    currency,
    perCategory,
    grandTotal,
    priced,
    unresolved: unresolvedLines,
    unresolvedIngredientIds,
    partial: unresolvedLines.length > 0,
    estimatedAt: (options.now ?? (() => new Date()))().toISOString(),
  }
}

/** Attach an estimate to the list it was computed for. */
export function withCostEstimate(list: ShoppingList, estimate: CostEstimate): ShoppingList {
  return { ...list, costEstimate: estimate }
}

import type { Decimal } from 'decimal.js'
import type { Unit } from '@domain/constants/units.ts'
import type { Ingredient } from '@domain/models/Ingredient.ts'
import type { AggregatedLine, UnitFamilyConflict } from '@domain/models/ShoppingList.ts'
import { ShoppingError } from '@domain/errors.ts'
import type { QuantityNormalizer } from '@application/scaler/normalizeQuantity.ts'
import type { ScaledLine } from '@application/scaler/scaleRecipe.ts'
import type { IngredientStore } from './stores.ts'

export interface RecipeContribution {
  recipeId: string
  lines: ScaledLine[]
}

/**
 * Per-ingredient result. A conflict keeps one line per canonical unit
 * because the units belong to different families and cannot be summed.
 */
export type AggregationOutcome =
  | { kind: 'merged'; line: AggregatedLine }
  | { kind: 'conflict'; ingredientId: string; lines: AggregatedLine[]; warning: UnitFamilyConflict }

export interface AggregationResult {
  outcomes: AggregationOutcome[]
  lines: AggregatedLine[]
  warnings: UnitFamilyConflict[]
}

interface AggBucket {
  quantity: Decimal   // sum in the canonical unit
  recipeIds: string[]
}

interface IngredientGroup {
  ingredient: Ingredient
  buckets: Map<Unit, AggBucket>
}

function compareText(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

/** Ingredient name (case-insensitive), then canonical unit, then id. */
export function compareLines(a: AggregatedLine, b: AggregatedLine): number {
  return (
    compareText(a.ingredientName.toLowerCase(), b.ingredientName.toLowerCase()) ||
    compareText(a.unit, b.unit) ||
    compareText(a.ingredientId, b.ingredientId)
  )
}

export function resolveIngredient(ingredients: IngredientStore, ingredientId: string): Ingredient {
  const ingredient = ingredients.getIngredient(ingredientId)
  if (!ingredient) {
    throw new ShoppingError(
      'UNKNOWN_INGREDIENT',
      `Ingredient ${ingredientId} does not exist`,
      { ingredientId },
    )
  }
  return ingredient
}

function toOutcome(group: IngredientGroup): AggregationOutcome {
  const { ingredient } = group
  const lines: AggregatedLine[] = [...group.buckets.entries()]
    .map(([unit, bucket]) => ({
      ingredientId: ingredient.id,
      ingredientName: ingredient.name,
      quantity: bucket.quantity,
      unit,
      recipeIds: bucket.recipeIds,
      checked: false,
    }))
    .sort(compareLines)

  if (lines.length === 1) return { kind: 'merged', line: lines[0] }

  return {
    kind: 'conflict',
    ingredientId: ingredient.id,
    lines,
    warning: {
      kind: 'unit-family-conflict',
      ingredientId: ingredient.id,
      ingredientName: ingredient.name,
      units: lines.map((l) => l.unit),
    },
  }
}

function outcomeLines(outcome: AggregationOutcome): AggregatedLine[] {
  return outcome.kind === 'merged' ? [outcome.line] : outcome.lines
}

/**
 * Merge scaled recipe lines into one line per ingredient and canonical unit.
 *
 * Quantities are normalized first (KG -> G, L/TABLESPOON/TEASPOON -> ML) and
 * summed exactly. When one ingredient shows up in units from different
 * families (eggs by COUNT in one recipe, by KG in another) the lines stay
 * separate and a UnitFamilyConflict warning is reported.
 */
export function aggregateIngredients(
  contributions: RecipeContribution[],
  normalizer: QuantityNormalizer,
  ingredients: IngredientStore,
): AggregationResult {
  const groups = new Map<string, IngredientGroup>()

  for (const contribution of contributions) {
    for (const line of contribution.lines) {
      let group = groups.get(line.ingredientId)
      if (!group) {
        group = { ingredient: resolveIngredient(ingredients, line.ingredientId), buckets: new Map() }
        groups.set(line.ingredientId, group)
      }

      const normalized = normalizer.normalize(line.ingredientId, line.quantity, line.unit)
      const existing = group.buckets.get(normalized.unit)

      if (existing) {
        existing.quantity = existing.quantity.plus(normalized.quantity)
        if (!existing.recipeIds.includes(contribution.recipeId)) {
          existing.recipeIds.push(contribution.recipeId)
        }
      } else {
        group.buckets.set(normalized.unit, {
          quantity: normalized.quantity,
          recipeIds: [contribution.recipeId],
        })
      }
    }
  }

  const outcomes = [...groups.values()]
    .map(toOutcome)
    .sort((a, b) => compareLines(outcomeLines(a)[0], outcomeLines(b)[0]))

  return {
    outcomes,
    lines: outcomes.flatMap(outcomeLines),
    warnings: outcomes.flatMap((o) => (o.kind === 'conflict' ? [o.warning] : [])),
  }
}

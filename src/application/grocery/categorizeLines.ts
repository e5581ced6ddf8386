import { INGREDIENT_CATEGORIES, type IngredientCategory } from '@domain/constants/categories.ts'
import type { Unit } from '@domain/constants/units.ts'
import type { AggregatedLine, CategorizedLines, ShoppingList } from '@domain/models/ShoppingList.ts'
import { resolveIngredient } from './aggregateIngredients.ts'
import type { IngredientStore } from './stores.ts'

export function emptyCategories(): CategorizedLines {
  return { DRY: [], CHILLED_RETAIL: [], CHILLED_ARTISAN: [] }
}

/** Identity of a list line: one ingredient in one canonical unit. */
export function lineKey(ingredientId: string, unit: Unit): string {
  return `${ingredientId}|${unit}`
}

/** Every line of a list in category order (DRY, CHILLED_RETAIL, CHILLED_ARTISAN). */
export function allLines(categories: CategorizedLines): AggregatedLine[] {
  return INGREDIENT_CATEGORIES.flatMap((category) => categories[category])
}

export function checkedKeys(list: ShoppingList | null | undefined): Set<string> {
  const keys = new Set<string>()
  if (!list) return keys
  for (const line of allLines(list.categories)) {
    if (line.checked) keys.add(lineKey(line.ingredientId, line.unit))
  }
  return keys
}

/**
 * Group aggregated lines by purchase category, keeping their incoming order.
 *
 * When `previous` is the list being regenerated, any line whose
 * (ingredient, unit) was checked there comes back checked; every other
 * line starts unchecked. Lines that disappeared from the input are gone.
 */
export function categorizeLines(
  lines: AggregatedLine[],
  ingredients: IngredientStore,
  previous?: ShoppingList | null,
): CategorizedLines {
  const categories = emptyCategories()
  const wasChecked = checkedKeys(previous)

  for (const line of lines) {
    const category: IngredientCategory = resolveIngredient(ingredients, line.ingredientId).category
    categories[category].push({
      ...line,
      checked: wasChecked.has(lineKey(line.ingredientId, line.unit)),
    })
  }

  return categories
}

import type { Unit } from '@domain/constants/units.ts'
import { INGREDIENT_CATEGORIES } from '@domain/constants/categories.ts'
import type { CategorizedLines, ShoppingList } from '@domain/models/ShoppingList.ts'
import { ShoppingError } from '@domain/errors.ts'

/**
 * Flip the checked flag of one line. Returns a new list; the input is left
 * untouched. Throws LINE_NOT_FOUND when the list has no such line.
 */
export function toggleItem(list: ShoppingList, ingredientId: string, unit: Unit): ShoppingList {
  let found = false
  const categories = { ...list.categories }

  for (const category of INGREDIENT_CATEGORIES) {
    const lines = list.categories[category]
    if (!lines.some((l) => l.ingredientId === ingredientId && l.unit === unit)) continue
    found = true
    categories[category] = lines.map((l) =>
      l.ingredientId === ingredientId && l.unit === unit ? { ...l, checked: !l.checked } : l,
    )
  }

  if (!found) {
    throw new ShoppingError(
      'LINE_NOT_FOUND',
      `List ${list.id} has no line for ingredient ${ingredientId} in ${unit}`,
      { listId: list.id, ingredientId, unit },
    )
  }

  return { ...list, categories }
}

/** Checked state of one line, or undefined when absent. */
export function isItemChecked(list: ShoppingList, ingredientId: string, unit: Unit): boolean | undefined {
  for (const category of INGREDIENT_CATEGORIES) {
    const line = list.categories[category].find((l) => l.ingredientId === ingredientId && l.unit === unit)
    if (line) return line.checked
  }
  return undefined
}

/** Uncheck every line. */
export function clearChecked(list: ShoppingList): ShoppingList {
  const categories: CategorizedLines = {
    DRY: list.categories.DRY.map((l) => ({ ...l, checked: false })),
    CHILLED_RETAIL: list.categories.CHILLED_RETAIL.map((l) => ({ ...l, checked: false })),
    CHILLED_ARTISAN: list.categories.CHILLED_ARTISAN.map((l) => ({ ...l, checked: false })),
  }
  return { ...list, categories }
}

import type { IngredientCategory } from '@domain/constants/categories.ts'
import type { Unit } from '@domain/constants/units.ts'
import type { Ingredient } from '@domain/models/Ingredient.ts'
import type { Recipe } from '@domain/models/Recipe.ts'
import type { RecipeSelection, ShoppingListRequest } from '@domain/models/ShoppingList.ts'
import { toDecimal } from '@domain/decimal.ts'

export function makeIngredient(
  id: string,
  name: string,
  category: IngredientCategory = 'DRY',
  searchTerm: string | null = null,
): Ingredient {
  return { id, name, category, searchTerm }
}

export function makeRecipe(
  id: string,
  servings: number,
  lines: Array<[ingredientId: string, quantity: string, unit: Unit]>,
): Recipe {
  return {
    id,
    name: `Recipe ${id}`,
    servings,
    ingredients: lines.map(([ingredientId, quantity, unit]) => ({
      ingredientId,
      quantity: toDecimal(quantity),
      unit,
    })),
  }
}

export function select(recipeId: string, multiplier?: string): RecipeSelection {
  return {
    recipeId,
    multiplier: multiplier === undefined ? null : toDecimal(multiplier),
    targetServings: null,
  }
}

export function makeRequest(...selections: RecipeSelection[]): ShoppingListRequest {
  return { selections }
}

export const fixedNow = (): Date => new Date('2026-03-02T10:00:00.000Z')

export function sequentialIds(prefix: string): () => string {
  let counter = 0
  return () => `${prefix}-${++counter}`
}

/** Run fn and return what it threw. */
export function caught(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error('Expected function to throw')
}

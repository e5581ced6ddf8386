import type { Decimal } from 'decimal.js'
import type { Unit } from '@domain/constants/units.ts'
import type { Recipe } from '@domain/models/Recipe.ts'
import type { RecipeSelection } from '@domain/models/ShoppingList.ts'
import { ONE, toDecimal } from '@domain/decimal.ts'
import { ShoppingError } from '@domain/errors.ts'

export interface ScaledLine {
  ingredientId: string
  quantity: Decimal
  unit: Unit
}

/**
 * Scale every line of a recipe by a multiplier.
 * - Units pass through unchanged
 * - No rounding here; quantities are rounded only when displayed
 */
export function scaleRecipe(recipe: Recipe, multiplier: Decimal): ScaledLine[] {
  if (!multiplier.isFinite() || multiplier.lte(0)) {
    throw new ShoppingError(
      'INVALID_MULTIPLIER',
      `Multiplier for recipe ${recipe.id} must be greater than 0`,
      { recipeId: recipe.id, multiplier: multiplier.toString() },
    )
  }

  return recipe.ingredients.map((line) => ({
    ingredientId: line.ingredientId,
    quantity: line.quantity.times(multiplier),
    unit: line.unit,
  }))
}

/**
 * Multiplier for one selection: an explicit multiplier wins, a target
 * serving count scales against the recipe's own servings, otherwise 1.
 */
export function resolveMultiplier(selection: RecipeSelection, recipe: Recipe): Decimal {
  if (selection.multiplier !== null) return selection.multiplier
  if (selection.targetServings !== null) {
    if (recipe.servings <= 0) {
      throw new ShoppingError(
        'INVALID_MULTIPLIER',
        `Recipe ${recipe.id} has no serving count to scale from`,
        { recipeId: recipe.id, servings: recipe.servings },
      )
    }
    return toDecimal(selection.targetServings).div(recipe.servings)
  }
  return ONE
}

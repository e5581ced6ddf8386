import type { ShoppingList, ShoppingListRequest } from '@domain/models/ShoppingList.ts'
import { ShoppingError } from '@domain/errors.ts'
import { createConversionTable } from '@application/scaler/convertUnit.ts'
import { QuantityNormalizer } from '@application/scaler/normalizeQuantity.ts'
import { resolveMultiplier, scaleRecipe } from '@application/scaler/scaleRecipe.ts'
import { aggregateIngredients, type RecipeContribution } from './aggregateIngredients.ts'
import { categorizeLines } from './categorizeLines.ts'
import type { IngredientStore, RecipeStore } from './stores.ts'

export const DEFAULT_LIST_NAME = 'Shopping list'

export interface GenerateOptions {
  name?: string
  /** List being regenerated; its id, creation time and checked lines carry over. */
  previous?: ShoppingList | null
  normalizer?: QuantityNormalizer
  now?: () => Date
  createId?: () => string
}

function defaultListId(): string {
  return `list-${Date.now()}-${Math.random().toString(36).slice(2, 7)}`
}

/**
 * Build a shopping list from selected recipes.
 *
 * Runs scale -> aggregate -> categorize synchronously against the given
 * snapshot stores. Any fatal problem (unknown recipe or ingredient, bad
 * multiplier) throws before a list exists, so nothing partial is returned.
 */
export function generateShoppingList(
  request: ShoppingListRequest,
  recipes: RecipeStore,
  ingredients: IngredientStore,
  options: GenerateOptions = {},
): ShoppingList {
  const normalizer = options.normalizer ?? new QuantityNormalizer(createConversionTable())
  const previous = options.previous ?? null

  const contributions: RecipeContribution[] = request.selections.map((selection) => {
    const recipe = recipes.getRecipe(selection.recipeId)
    if (!recipe) {
      throw new ShoppingError(
        'UNKNOWN_RECIPE',
        `Recipe ${selection.recipeId} does not exist`,
        { recipeId: selection.recipeId },
      )
    }
    return {
      recipeId: recipe.id,
      lines: scaleRecipe(recipe, resolveMultiplier(selection, recipe)),
    }
  })

  const { lines, warnings } = aggregateIngredients(contributions, normalizer, ingredients)
  const categories = categorizeLines(lines, ingredients, previous)
  const now = (options.now ?? (() => new Date()))().toISOString()

  return {
    id: previous?.id ?? (options.createId ?? defaultListId)(),
    name: options.name ?? previous?.name ?? DEFAULT_LIST_NAME,
    request,
    categories,
    warnings,
    costEstimate: null,
    createdAt: previous?.createdAt ?? now,
    updatedAt: now,
  }
}

import type { Ingredient } from '@domain/models/Ingredient.ts'
import type { Recipe } from '@domain/models/Recipe.ts'

/** Read-only recipe lookup the engine runs against. */
export interface RecipeStore {
  getRecipe(id: string): Recipe | undefined
}

/** Read-only ingredient lookup the engine runs against. */
export interface IngredientStore {
  getIngredient(id: string): Ingredient | undefined
}

/**
 * In-memory view over already-loaded records, so the engine itself never
 * touches the database.
 */
export function createSnapshotStore(
  recipes: Recipe[],
  ingredients: Ingredient[],
): RecipeStore & IngredientStore {
  const recipeMap = new Map(recipes.map((r) => [r.id, r]))
  const ingredientMap = new Map(ingredients.map((i) => [i.id, i]))
  return {
    getRecipe: (id) => recipeMap.get(id),
    getIngredient: (id) => ingredientMap.get(id),
  }
}

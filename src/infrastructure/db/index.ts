import type { DexieOptions } from 'dexie'
import type { ShoppingDeps } from '@application/grocery/shoppingListService.ts'
import { MealcartDB } from './database.ts'
import { createIngredientRepository } from './ingredientRepository.ts'
import { createRecipeRepository } from './recipeRepository.ts'
import { createShoppingListRepository } from './shoppingListRepository.ts'

export { MealcartDB } from './database.ts'
export { createIngredientRepository } from './ingredientRepository.ts'
export { createRecipeRepository } from './recipeRepository.ts'
export { createShoppingListRepository } from './shoppingListRepository.ts'

export interface OpenOptions extends DexieOptions {
  name?: string
  now?: () => Date
  createId?: () => string
}

/** Open the database and wire the repositories the shopping list service needs. */
export function openShoppingStore(options: OpenOptions = {}): { db: MealcartDB; deps: ShoppingDeps } {
  const { name, now, createId, ...dexieOptions } = options
  const db = new MealcartDB(name, dexieOptions)
  return {
    db,
    deps: {
      ingredients: createIngredientRepository(db),
      recipes: createRecipeRepository(db),
      lists: createShoppingListRepository(db, now),
      now,
      createId,
    },
  }
}

import type { Recipe } from '@domain/models/Recipe.ts'
import type { RecipeRepository } from '@application/grocery/shoppingListService.ts'
import { parseRecipe } from '@application/validation/shopping.schemas.ts'
import type { MealcartDB } from './database.ts'
import { fromRecipeRecord, toRecipeRecord } from './records.ts'

export function createRecipeRepository(db: MealcartDB): RecipeRepository {
  return {
    async save(recipe: Recipe): Promise<Recipe> {
      const record = toRecipeRecord(recipe)
      // one line per ingredient, positive quantities
      const valid = parseRecipe(record)
      await db.recipes.put(record)
      return valid
    },

    async get(id: string): Promise<Recipe | undefined> {
      const record = await db.recipes.get(id)
      return record ? fromRecipeRecord(record) : undefined
    },

    async getMany(ids: string[]): Promise<Recipe[]> {
      const records = await db.recipes.bulkGet(ids)
      return records.flatMap((r) => (r ? [fromRecipeRecord(r)] : []))
    },

    async list(): Promise<Recipe[]> {
      const records = await db.recipes.orderBy('name').toArray()
      return records.map(fromRecipeRecord)
    },

    async delete(id: string): Promise<void> {
      await db.recipes.delete(id)
    },
  }
}

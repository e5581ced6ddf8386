import type { Ingredient } from '@domain/models/Ingredient.ts'
import { ShoppingError } from '@domain/errors.ts'
import type { IngredientRepository } from '@application/grocery/shoppingListService.ts'
import { parseIngredient } from '@application/validation/shopping.schemas.ts'
import type { MealcartDB } from './database.ts'
import { fromIngredientRecord, ingredientNameKey, toIngredientRecord } from './records.ts'

export function createIngredientRepository(db: MealcartDB): IngredientRepository {
  return {
    async save(ingredient: Ingredient): Promise<Ingredient> {
      // re-parse: the artisan/search-term rule is enforced on every write
      const valid = parseIngredient(ingredient)
      const record = toIngredientRecord(valid)

      await db.transaction('rw', db.ingredients, async () => {
        const clash = await db.ingredients.where('nameKey').equals(record.nameKey).first()
        if (clash && clash.id !== record.id) {
          throw new ShoppingError(
            'VALIDATION_ERROR',
            `An ingredient named "${clash.name}" already exists`,
            { ingredientId: clash.id, name: valid.name },
          )
        }
        await db.ingredients.put(record)
      })
      return valid
    },

    async get(id: string): Promise<Ingredient | undefined> {
      const record = await db.ingredients.get(id)
      return record ? fromIngredientRecord(record) : undefined
    },

    async getMany(ids: string[]): Promise<Ingredient[]> {
      const records = await db.ingredients.bulkGet(ids)
      return records.flatMap((r) => (r ? [fromIngredientRecord(r)] : []))
    },

    async list(): Promise<Ingredient[]> {
      const records = await db.ingredients.orderBy('nameKey').toArray()
      return records.map(fromIngredientRecord)
    },

    async delete(id: string): Promise<void> {
      await db.ingredients.delete(id)
    },
  }
}

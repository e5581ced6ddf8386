import type { ShoppingList } from '@domain/models/ShoppingList.ts'
import { ShoppingError } from '@domain/errors.ts'
import type { ShoppingListRepository } from '@application/grocery/shoppingListService.ts'
import type { MealcartDB } from './database.ts'
import { fromShoppingListRecord, toShoppingListRecord } from './records.ts'

export function createShoppingListRepository(
  db: MealcartDB,
  now: () => Date = () => new Date(),
): ShoppingListRepository {
  return {
    async save(list: ShoppingList): Promise<ShoppingList> {
      const saved = { ...list, updatedAt: now().toISOString() }
      await db.shoppingLists.put(toShoppingListRecord(saved))
      return saved
    },

    async get(id: string): Promise<ShoppingList | undefined> {
      const record = await db.shoppingLists.get(id)
      return record ? fromShoppingListRecord(record) : undefined
    },

    async getLatest(): Promise<ShoppingList | undefined> {
      const record = await db.shoppingLists.orderBy('updatedAt').reverse().first()
      return record ? fromShoppingListRecord(record) : undefined
    },

    async delete(id: string): Promise<void> {
      await db.shoppingLists.delete(id)
    },

    // The rw transaction makes this the only writer of the list until it commits.
    async update(id: string, change: (list: ShoppingList) => ShoppingList): Promise<ShoppingList> {
      return db.transaction('rw', db.shoppingLists, async () => {
        const record = await db.shoppingLists.get(id)
        if (!record) {
          throw new ShoppingError('LIST_NOT_FOUND', `Shopping list ${id} does not exist`, { listId: id })
        }
        const current = fromShoppingListRecord(record)
        const changed = change(current)
        if (changed === current) return current
        const next = { ...changed, id, updatedAt: now().toISOString() }
        await db.shoppingLists.put(toShoppingListRecord(next))
        return next
      })
    },
  }
}

import Dexie, { type DexieOptions, type Table } from 'dexie'
import type { IngredientCategory } from '@domain/constants/categories.ts'
import type { Unit } from '@domain/constants/units.ts'
import type { UnresolvedReason } from '@domain/models/CostEstimate.ts'
import type { UnitFamilyConflict } from '@domain/models/ShoppingList.ts'

// Decimals are stored as strings; IndexedDB cannot clone Decimal instances.

export interface IngredientRecord {
  id: string
  name: string
  nameKey: string            // lowercased name, unique
  category: IngredientCategory
  searchTerm: string | null
}

export interface RecipeRecord {
  id: string
  name: string
  servings: number
  ingredients: { ingredientId: string; quantity: string; unit: Unit }[]
}

export interface LineRecord {
  ingredientId: string
  ingredientName: string
  quantity: string
  unit: Unit
  recipeIds: string[]
  checked: boolean
}

export interface CostEstimateRecord {
  currency: string
  perCategory: Record<IngredientCategory, string>
  grandTotal: string
  priced: {
    ingredientId: string
    unit: Unit
    pricedUnit: Unit
    pricedQuantity: string
    unitPrice: string
    cost: string
  }[]
  unresolved: { ingredientId: string; unit: Unit; reason: UnresolvedReason }[]
  unresolvedIngredientIds: string[]
  partial: boolean
  estimatedAt: string
}

export interface ShoppingListRecord {
  id: string
  name: string
  request: {
    selections: { recipeId: string; multiplier: string | null; targetServings: number | null }[]
  }
  categories: Record<IngredientCategory, LineRecord[]>
  warnings: UnitFamilyConflict[]
  costEstimate: CostEstimateRecord | null
  createdAt: string
  updatedAt: string
}

/**
 * Node has no IndexedDB of its own: pass `indexedDB` and `IDBKeyRange`
 * (fake-indexeddb, or a persistent implementation) in `options`.
 */
export class MealcartDB extends Dexie {
  ingredients!: Table<IngredientRecord, string>
  recipes!: Table<RecipeRecord, string>
  shoppingLists!: Table<ShoppingListRecord, string>

  constructor(name = 'MealcartDB', options?: DexieOptions) {
    super(name, options)

    this.version(1).stores({
      ingredients: 'id, &nameKey, category',
      recipes: 'id, name',
      shoppingLists: 'id, name, createdAt, updatedAt',
    })
  }
}

import type { Decimal } from 'decimal.js'
import type { Unit } from '@domain/constants/units.ts'
import type { IngredientCategory } from '@domain/constants/categories.ts'
import type { CostEstimate } from './CostEstimate.ts'

export interface RecipeSelection {
  recipeId: string
  multiplier: Decimal | null     // null means 1
  targetServings: number | null  // alternative to multiplier, relative to recipe.servings
}

export interface ShoppingListRequest {
  selections: RecipeSelection[]
}

export interface AggregatedLine {
  ingredientId: string
  ingredientName: string
  quantity: Decimal           // exact total in the canonical unit
  unit: Unit                  // canonical unit
  recipeIds: string[]         // contributing recipes, request order
  checked: boolean
}

/** Same ingredient requested in units that cannot be summed together. */
export interface UnitFamilyConflict {
  kind: 'unit-family-conflict'
  ingredientId: string
  ingredientName: string
  units: Unit[]
}

export type ShoppingListWarning = UnitFamilyConflict

export type CategorizedLines = Record<IngredientCategory, AggregatedLine[]>

export interface ShoppingList {
  id: string
  name: string
  request: ShoppingListRequest
  categories: CategorizedLines
  warnings: ShoppingListWarning[]
  costEstimate: CostEstimate | null
  createdAt: string
  updatedAt: string
}

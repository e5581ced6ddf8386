import type { Decimal } from 'decimal.js'
import type { Unit } from '@domain/constants/units.ts'

export interface RecipeIngredientLine {
  ingredientId: string
  quantity: Decimal
  unit: Unit
}

export interface Recipe {
  id: string
  name: string
  servings: number           // baseline for targetServings scaling
  ingredients: RecipeIngredientLine[]
}

import type { CostEstimate } from '@domain/models/CostEstimate.ts'
import type { Ingredient } from '@domain/models/Ingredient.ts'
import type { Recipe } from '@domain/models/Recipe.ts'
import type { AggregatedLine, ShoppingList } from '@domain/models/ShoppingList.ts'
import { toDecimal } from '@domain/decimal.ts'
import { parseIngredient, parseRecipe } from '@application/validation/shopping.schemas.ts'
import type {
  CostEstimateRecord,
  IngredientRecord,
  LineRecord,
  RecipeRecord,
  ShoppingListRecord,
} from './database.ts'

export function ingredientNameKey(name: string): string {
  return name.trim().toLowerCase()
}

export function toIngredientRecord(ingredient: Ingredient): IngredientRecord {
  return { ...ingredient, nameKey: ingredientNameKey(ingredient.name) }
}

export function fromIngredientRecord(record: IngredientRecord): Ingredient {
  return parseIngredient({
    id: record.id,
    name: record.name,
    category: record.category,
    searchTerm: record.searchTerm,
  })
}

export function toRecipeRecord(recipe: Recipe): RecipeRecord {
  return {
    id: recipe.id,
    name: recipe.name,
    servings: recipe.servings,
    ingredients: recipe.ingredients.map((l) => ({
      ingredientId: l.ingredientId,
      quantity: l.quantity.toFixed(),
      unit: l.unit,
    })),
  }
}

export function fromRecipeRecord(record: RecipeRecord): Recipe {
  return parseRecipe(record)
}

function toLineRecord(line: AggregatedLine): LineRecord {
  return { ...line, quantity: line.quantity.toFixed(), recipeIds: [...line.recipeIds] }
}

function fromLineRecord(record: LineRecord): AggregatedLine {
  return { ...record, quantity: toDecimal(record.quantity), recipeIds: [...record.recipeIds] }
}

function toCostEstimateRecord(estimate: CostEstimate): CostEstimateRecord {
  return {
    currency: estimate.currency,
    perCategory: {
      DRY: estimate.perCategory.DRY.toFixed(),
      CHILLED_RETAIL: estimate.perCategory.CHILLED_RETAIL.toFixed(),
      CHILLED_ARTISAN: estimate.perCategory.CHILLED_ARTISAN.toFixed(),
    },
    grandTotal: estimate.grandTotal.toFixed(),
    priced: estimate.priced.map((p) => ({
      ...p,
      pricedQuantity: p.pricedQuantity.toFixed(),
      unitPrice: p.unitPrice.toFixed(),
      cost: p.cost.toFixed(),
    })),
    unresolved: estimate.unresolved.map((u) => ({ ...u })),
    unresolvedIngredientIds: [...estimate.unresolvedIngredientIds],
    partial: estimate.partial,
    estimatedAt: estimate.estimatedAt,
  }
}

function fromCostEstimateRecord(record: CostEstimateRecord): CostEstimate {
  return {
    currency: record.currency,
    perCategory: {
      DRY: toDecimal(record.perCategory.DRY),
      CHILLED_RETAIL: toDecimal(record.perCategory.CHILLED_RETAIL),
      CHILLED_ARTISAN: toDecimal(record.perCategory.CHILLED_ARTISAN),
    },
    grandTotal: toDecimal(record.grandTotal),
    priced: record.priced.map((p) => ({
      ...p,
      pricedQuantity: toDecimal(p.pricedQuantity),
      unitPrice: toDecimal(p.unitPrice),
      cost: toDecimal(p.cost),
    })),
    unresolved: record.unresolved.map((u) => ({ ...u })),
    unresolvedIngredientIds: [...record.unresolvedIngredientIds],
    partial: record.partial,
    estimatedAt: record.estimatedAt,
  }
}

export function toShoppingListRecord(list: ShoppingList): ShoppingListRecord {
  return {
    id: list.id,
    name: list.name,
    request: {
      selections: list.request.selections.map((s) => ({
        recipeId: s.recipeId,
        multiplier: s.multiplier === null ? null : s.multiplier.toFixed(),
        targetServings: s.targetServings,
      })),
    },
    categories: {
      DRY: list.categories.DRY.map(toLineRecord),
      CHILLED_RETAIL: list.categories.CHILLED_RETAIL.map(toLineRecord),
      CHILLED_ARTISAN: list.categories.CHILLED_ARTISAN.map(toLineRecord),
    },
    warnings: list.warnings.map((w) => ({ ...w, units: [...w.units] })),
    costEstimate: list.costEstimate ? toCostEstimateRecord(list.costEstimate) : null,
    createdAt: list.createdAt,
    updatedAt: list.updatedAt,
  }
}

export function fromShoppingListRecord(record: ShoppingListRecord): ShoppingList {
  return {
    id: record.id,
    name: record.name,
    request: {
      selections: record.request.selections.map((s) => ({
        recipeId: s.recipeId,
        multiplier: s.multiplier === null ? null : toDecimal(s.multiplier),
        targetServings: s.targetServings,
      })),
    },
    categories: {
      DRY: record.categories.DRY.map(fromLineRecord),
      CHILLED_RETAIL: record.categories.CHILLED_RETAIL.map(fromLineRecord),
      CHILLED_ARTISAN: record.categories.CHILLED_ARTISAN.map(fromLineRecord),
    },
    warnings: record.warnings.map((w) => ({ ...w, units: [...w.units] })),
    costEstimate: record.costEstimate ? fromCostEstimateRecord(record.costEstimate) : null,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  }
}

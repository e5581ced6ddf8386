export * from '@domain/constants/units.ts'
export * from '@domain/constants/categories.ts'
export type * from '@domain/models/Ingredient.ts'
export type * from '@domain/models/Recipe.ts'
export type * from '@domain/models/ShoppingList.ts'
export type * from '@domain/models/CostEstimate.ts'
export type * from '@domain/models/MealPlan.ts'
export { ShoppingError, isShoppingError, type ShoppingErrorCode } from '@domain/errors.ts'
export { toDecimal, formatDecimal } from '@domain/decimal.ts'

export {
  createConversionTable,
  conversionFactor,
  convertUnit,
  unitFamily,
  type ConversionTable,
} from '@application/scaler/convertUnit.ts'
export { QuantityNormalizer, type NormalizedQuantity } from '@application/scaler/normalizeQuantity.ts'
export { scaleRecipe, resolveMultiplier, type ScaledLine } from '@application/scaler/scaleRecipe.ts'
export { formatQuantity, formatUnit } from '@application/scaler/formatQuantity.ts'

export { createSnapshotStore, type IngredientStore, type RecipeStore } from '@application/grocery/stores.ts'
export {
  aggregateIngredients,
  type AggregationOutcome,
  type AggregationResult,
  type RecipeContribution,
} from '@application/grocery/aggregateIngredients.ts'
export { categorizeLines, allLines, lineKey } from '@application/grocery/categorizeLines.ts'
export { generateShoppingList, type GenerateOptions } from '@application/grocery/generateShoppingList.ts'
export { toggleItem, clearChecked, isItemChecked } from '@application/grocery/toggleItem.ts'
export {
  estimateCost,
  withCostEstimate,
  type EstimateOptions,
  type PriceLookup,
  type PricingProvider,
} from '@application/grocery/estimateCost.ts'
export { formatShoppingLine, formatShoppingListText } from '@application/grocery/formatShoppingList.ts'
export * from '@application/grocery/shoppingListService.ts'
export {
  parseIngredient,
  parseRecipe,
  parseShoppingListRequest,
} from '@application/validation/shopping.schemas.ts'

export { suggestMealPlan, mealPlanToRequest } from '@application/mealplan/mealPlanToShoppingList.ts'
export { getWeekStart, formatWeekListName } from '@application/mealplan/weekUtils.ts'

export { loadConfig, type MealcartConfig } from '@infrastructure/config.ts'
export { createPricingProvider, estimateOptionsFromConfig, PricingApiClient, SimulatedPricingProvider } from '@infrastructure/pricing/index.ts'
export { openShoppingStore, MealcartDB, type OpenOptions } from '@infrastructure/db/index.ts'

export const INGREDIENT_CATEGORIES = ['DRY', 'CHILLED_RETAIL', 'CHILLED_ARTISAN'] as const

/**
 * Purchase category of an ingredient.
 * DRY: shelf-stable goods (oil, rice, pasta).
 * CHILLED_RETAIL: fresh goods bought at the supermarket (cream, butter).
 * CHILLED_ARTISAN: fresh goods bought from a specialist (produce, meat, bread).
 */
export type IngredientCategory = (typeof INGREDIENT_CATEGORIES)[number]

export const CATEGORY_LABELS: Record<IngredientCategory, string> = {
  DRY: 'Dry Goods',
  CHILLED_RETAIL: 'Chilled (Supermarket)',
  CHILLED_ARTISAN: 'Chilled (Artisan)',
}

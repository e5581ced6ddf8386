import type { IngredientCategory } from '@domain/constants/categories.ts'

export interface Ingredient {
  id: string
  name: string               // unique, compared case-insensitively
  category: IngredientCategory
  searchTerm: string | null  // product search text for pricing; always null for CHILLED_ARTISAN
}

import type { DayOfWeek, MealPlan, MealSlot, PlannedMeal } from '@domain/models/MealPlan.ts'
import type { Recipe } from '@domain/models/Recipe.ts'
import type { ShoppingListRequest } from '@domain/models/ShoppingList.ts'
import { DAYS_OF_WEEK, getWeekStart } from './weekUtils.ts'

export interface SuggestOptions {
  weekStart?: string
  days?: number
  slots?: MealSlot[]
  createId?: () => string
  now?: () => Date
}

const DEFAULT_SLOTS: MealSlot[] = ['lunch', 'dinner']

function defaultId(prefix: string): () => string {
  let counter = 0
  return () => `${prefix}-${Date.now()}-${++counter}`
}

/**
 * Fill day/slot pairs with recipes in the order given, one recipe per
 * slot, stopping when the recipes run out. Days beyond Sunday are ignored.
 */
export function suggestMealPlan(recipes: Recipe[], options: SuggestOptions = {}): MealPlan {
  const now = options.now ?? (() => new Date())
  const createId = options.createId ?? defaultId('meal')
  const slots = options.slots ?? DEFAULT_SLOTS
  const days: DayOfWeek[] = DAYS_OF_WEEK.slice(0, Math.max(0, Math.min(options.days ?? 7, 7)))

  const meals: PlannedMeal[] = []
  let next = 0
  for (const day of days) {
    for (const slot of slots) {
      if (next >= recipes.length) break
      meals.push({ id: createId(), day, slot, recipeId: recipes[next].id, targetServings: null })
      next++
    }
  }

  return {
    id: createId(),
    weekStart: options.weekStart ?? getWeekStart(now()),
    meals,
    createdAt: now().toISOString(),
  }
}

/**
 * Convert a meal plan into a shopping list request. Each meal occurrence
 * becomes its own selection so a recipe planned twice is bought twice.
 */
export function mealPlanToRequest(plan: MealPlan): ShoppingListRequest {
  const order = new Map(DAYS_OF_WEEK.map((d, i) => [d, i]))
  const slotOrder: Record<MealSlot, number> = { breakfast: 0, lunch: 1, dinner: 2 }

  const meals = [...plan.meals].sort(
    (a, b) => (order.get(a.day) ?? 0) - (order.get(b.day) ?? 0) || slotOrder[a.slot] - slotOrder[b.slot],
  )

  return {
    selections: meals.map((meal) => ({
      recipeId: meal.recipeId,
      multiplier: null,
      targetServings: meal.targetServings,
    })),
  }
}

import type { Unit } from '@domain/constants/units.ts'
import type { CostEstimate } from '@domain/models/CostEstimate.ts'
import type { Ingredient } from '@domain/models/Ingredient.ts'
import type { Recipe } from '@domain/models/Recipe.ts'
import type { ShoppingList, ShoppingListRequest } from '@domain/models/ShoppingList.ts'
import { ShoppingError } from '@domain/errors.ts'
import { generateShoppingList } from './generateShoppingList.ts'
import { allLines } from './categorizeLines.ts'
import { clearChecked, isItemChecked, toggleItem } from './toggleItem.ts'
import { estimateCost, withCostEstimate, type EstimateOptions, type PricingProvider } from './estimateCost.ts'
import { createSnapshotStore, type IngredientStore, type RecipeStore } from './stores.ts'

export interface IngredientRepository {
  save(ingredient: Ingredient): Promise<Ingredient>
  get(id: string): Promise<Ingredient | undefined>
  getMany(ids: string[]): Promise<Ingredient[]>
  list(): Promise<Ingredient[]>
  delete(id: string): Promise<void>
}

export interface RecipeRepository {
  save(recipe: Recipe): Promise<Recipe>
  get(id: string): Promise<Recipe | undefined>
  getMany(ids: string[]): Promise<Recipe[]>
  list(): Promise<Recipe[]>
  delete(id: string): Promise<void>
}

export interface ShoppingListRepository {
  save(list: ShoppingList): Promise<ShoppingList>
  get(id: string): Promise<ShoppingList | undefined>
  getLatest(): Promise<ShoppingList | undefined>
  delete(id: string): Promise<void>
  /**
   * Read-modify-write of one list as a single writer. Throws LIST_NOT_FOUND
   * when the list is missing; an error thrown by `change` leaves it as it was,
   * and returning the list it was given writes nothing.
   */
  update(id: string, change: (list: ShoppingList) => ShoppingList): Promise<ShoppingList>
}

export interface ShoppingDeps {
  ingredients: IngredientRepository
  recipes: RecipeRepository
  lists: ShoppingListRepository
  now?: () => Date
  createId?: () => string
}

/** Load every recipe and ingredient a request touches into an in-memory snapshot. */
export async function loadSnapshot(
  deps: ShoppingDeps,
  request: ShoppingListRequest,
): Promise<RecipeStore & IngredientStore> {
  const recipeIds = [...new Set(request.selections.map((s) => s.recipeId))]
  const recipes = await deps.recipes.getMany(recipeIds)
  const ingredientIds = [...new Set(recipes.flatMap((r) => r.ingredients.map((l) => l.ingredientId)))]
  const ingredients = await deps.ingredients.getMany(ingredientIds)
  return createSnapshotStore(recipes, ingredients)
}

async function requireList(deps: ShoppingDeps, listId: string): Promise<ShoppingList> {
  const list = await deps.lists.get(listId)
  if (!list) {
    throw new ShoppingError('LIST_NOT_FOUND', `Shopping list ${listId} does not exist`, { listId })
  }
  return list
}

export async function createList(
  deps: ShoppingDeps,
  name: string,
  request: ShoppingListRequest,
): Promise<ShoppingList> {
  const snapshot = await loadSnapshot(deps, request)
  const list = generateShoppingList(request, snapshot, snapshot, {
    name,
    now: deps.now,
    createId: deps.createId,
  })
  return deps.lists.save(list)
}

/**
 * Rebuild a list from a new request, or from its stored request when none is
 * given. Checked lines that survive keep their flag.
 */
export async function regenerateList(
  deps: ShoppingDeps,
  listId: string,
  request?: ShoppingListRequest,
): Promise<ShoppingList> {
  const effective = request ?? (await requireList(deps, listId)).request
  const snapshot = await loadSnapshot(deps, effective)
  return deps.lists.update(listId, (previous) =>
    generateShoppingList(effective, snapshot, snapshot, { previous, now: deps.now }),
  )
}

/** Flip one line and return its new checked state. */
export async function toggleListItem(
  deps: ShoppingDeps,
  listId: string,
  ingredientId: string,
  unit: Unit,
): Promise<boolean> {
  const updated = await deps.lists.update(listId, (list) => toggleItem(list, ingredientId, unit))
  return isItemChecked(updated, ingredientId, unit) === true
}

export async function clearListChecks(deps: ShoppingDeps, listId: string): Promise<ShoppingList> {
  return deps.lists.update(listId, clearChecked)
}

/**
 * Price a stored list and keep the estimate on it. If the list changed while
 * prices were being fetched, the estimate is returned but not stored.
 */
export async function estimateListCost(
  deps: ShoppingDeps,
  listId: string,
  pricing: PricingProvider,
  options: EstimateOptions = {},
): Promise<CostEstimate> {
  const list = await requireList(deps, listId)
  const ingredientIds = [...new Set(allLines(list.categories).map((l) => l.ingredientId))]
  const snapshot = createSnapshotStore([], await deps.ingredients.getMany(ingredientIds))

  const estimate = await estimateCost(list, snapshot, pricing, { now: deps.now, ...options })
  await deps.lists.update(listId, (current) =>
    current.updatedAt === list.updatedAt ? withCostEstimate(current, estimate) : current,
  )
  return estimate
}

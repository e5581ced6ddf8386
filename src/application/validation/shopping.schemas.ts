/**
 * Shopping Schemas
 *
 * Parse untrusted input into the closed unit/category unions and exact
 * decimals. Anything unrecognized fails here, before the engine runs.
 */

import { z } from 'zod'
import { UNITS } from '@domain/constants/units.ts'
import { INGREDIENT_CATEGORIES } from '@domain/constants/categories.ts'
import type { Ingredient } from '@domain/models/Ingredient.ts'
import type { Recipe } from '@domain/models/Recipe.ts'
import type { ShoppingListRequest } from '@domain/models/ShoppingList.ts'
import { toDecimal } from '@domain/decimal.ts'
import { ShoppingError } from '@domain/errors.ts'

export const unitSchema = z.enum(UNITS)
export const ingredientCategorySchema = z.enum(INGREDIENT_CATEGORIES)

const DECIMAL_TEXT = /^-?\d+(\.\d+)?$/

export const decimalSchema = z
  .union([z.number().finite(), z.string().trim().regex(DECIMAL_TEXT, 'Expected a decimal number')])
  .transform((value) => toDecimal(value))

export const positiveDecimalSchema = decimalSchema.refine((d) => d.gt(0), {
  message: 'Quantity must be greater than 0',
})

export const ingredientSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().trim().min(1),
    category: ingredientCategorySchema,
    searchTerm: z.string().trim().min(1).nullable().optional(),
  })
  .superRefine((value, ctx) => {
    if (value.category === 'CHILLED_ARTISAN' && value.searchTerm) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['searchTerm'],
        message: 'Artisan ingredients cannot have a search term',
      })
    }
  })
  .transform((value): Ingredient => ({
    id: value.id,
    name: value.name,
    category: value.category,
    searchTerm: value.searchTerm ?? null,
  }))

export const recipeIngredientLineSchema = z.object({
  ingredientId: z.string().min(1),
  quantity: positiveDecimalSchema,
  unit: unitSchema,
})

export const recipeSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().trim().min(1),
    servings: z.number().int().positive(),
    ingredients: z.array(recipeIngredientLineSchema),
  })
  .superRefine((value, ctx) => {
    const seen = new Set<string>()
    value.ingredients.forEach((line, index) => {
      if (seen.has(line.ingredientId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['ingredients', index, 'ingredientId'],
          message: `Ingredient ${line.ingredientId} appears twice in the recipe`,
        })
      }
      seen.add(line.ingredientId)
    })
  })
  .transform((value): Recipe => value)

const recipeSelectionSchema = z
  .object({
    recipeId: z.string().min(1),
    multiplier: decimalSchema.optional(),
    targetServings: z.number().int().positive().optional(),
  })
  .refine((s) => s.multiplier === undefined || s.targetServings === undefined, {
    message: 'Give either multiplier or targetServings, not both',
  })

const selectionsRequestSchema = z.object({
  selections: z.array(recipeSelectionSchema),
})

/** Recipe ids plus a multiplier map keyed by recipe id. */
const recipeIdsRequestSchema = z
  .object({
    recipeIds: z.array(z.string().min(1)),
    servingsMultiplier: z.record(z.string(), decimalSchema).nullable().optional(),
  })
  .superRefine((value, ctx) => {
    for (const key of Object.keys(value.servingsMultiplier ?? {})) {
      if (!value.recipeIds.includes(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['servingsMultiplier', key],
          message: `Multiplier given for recipe ${key} which is not requested`,
        })
      }
    }
  })

/**
 * Multipliers are not range-checked here: a multiplier <= 0 reaches the
 * scaler and fails there as INVALID_MULTIPLIER.
 */
export const shoppingListRequestSchema = z
  .union([selectionsRequestSchema, recipeIdsRequestSchema])
  .transform((value): ShoppingListRequest => {
    if ('selections' in value) {
      return {
        selections: value.selections.map((s) => ({
          recipeId: s.recipeId,
          multiplier: s.multiplier ?? null,
          targetServings: s.targetServings ?? null,
        })),
      }
    }
    const multipliers = value.servingsMultiplier ?? {}
    return {
      selections: value.recipeIds.map((recipeId) => ({
        recipeId,
        multiplier: multipliers[recipeId] ?? null,
        targetServings: null,
      })),
    }
  })

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

/** Parse with a schema, turning zod failures into VALIDATION_ERROR. */
export function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input)
  if (!result.success) {
    throw new ShoppingError('VALIDATION_ERROR', `Invalid ${what}: ${describeIssues(result.error)}`, {
      issues: result.error.issues,
    })
  }
  return result.data
}

export function parseIngredient(input: unknown): Ingredient {
  return parseWith(ingredientSchema, input, 'ingredient')
}

export function parseRecipe(input: unknown): Recipe {
  return parseWith(recipeSchema, input, 'recipe')
}

export function parseShoppingListRequest(input: unknown): ShoppingListRequest {
  return parseWith(shoppingListRequestSchema, input, 'shopping list request')
}

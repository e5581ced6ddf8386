import { describe, it, expect } from 'vitest'
import { aggregateIngredients, type RecipeContribution } from '@application/grocery/aggregateIngredients.ts'
import { createSnapshotStore } from '@application/grocery/stores.ts'
import { createConversionTable } from '@application/scaler/convertUnit.ts'
import { QuantityNormalizer } from '@application/scaler/normalizeQuantity.ts'
import type { Unit } from '@domain/constants/units.ts'
import type { AggregatedLine } from '@domain/models/ShoppingList.ts'
import { toDecimal } from '@domain/decimal.ts'
import { isShoppingError } from '@domain/errors.ts'
import { caught, makeIngredient } from '../../helpers/fixtures.ts'

const normalizer = new QuantityNormalizer(createConversionTable())

const store = createSnapshotStore(
  [],
  [
    makeIngredient('flour', 'flour'),
    makeIngredient('butter', 'Butter', 'CHILLED_RETAIL'),
    makeIngredient('apple', 'apple', 'CHILLED_ARTISAN'),
    makeIngredient('eggs', 'Eggs', 'CHILLED_RETAIL'),
    makeIngredient('oil', 'Olive oil'),
    makeIngredient('sugar', 'Sugar'),
  ],
)

function contribution(recipeId: string, lines: Array<[string, string, Unit]>): RecipeContribution {
  return {
    recipeId,
    lines: lines.map(([ingredientId, quantity, unit]) => ({ ingredientId, quantity: toDecimal(quantity), unit })),
  }
}

function summary(lines: AggregatedLine[]): Array<[string, string, Unit]> {
  return lines.map((l) => [l.ingredientId, l.quantity.toString(), l.unit])
}

describe('aggregateIngredients', () => {
  it('sums one ingredient across recipes in its canonical unit', () => {
    const result = aggregateIngredients(
      [contribution('r1', [['flour', '400', 'G']]), contribution('r2', [['flour', '1', 'KG']])],
      normalizer,
      store,
    )

    expect(result.outcomes).toHaveLength(1)
    expect(result.outcomes[0].kind).toBe('merged')
    expect(summary(result.lines)).toEqual([['flour', '1400', 'G']])
    expect(result.lines[0].recipeIds).toEqual(['r1', 'r2'])
    expect(result.lines[0].ingredientName).toBe('flour')
    expect(result.lines[0].checked).toBe(false)
    expect(result.warnings).toEqual([])
  })

  it('merges tablespoons, teaspoons and litres into millilitres', () => {
    const result = aggregateIngredients(
      [
        contribution('r1', [['oil', '2', 'TABLESPOON']]),
        contribution('r2', [['oil', '1', 'TEASPOON']]),
        contribution('r3', [['oil', '0.1', 'L']]),
      ],
      normalizer,
      store,
    )
    expect(summary(result.lines)).toEqual([['oil', '135', 'ML']])
  })

  it('adds exactly', () => {
    const result = aggregateIngredients(
      [contribution('r1', [['sugar', '0.1', 'G']]), contribution('r2', [['sugar', '0.2', 'G']])],
      normalizer,
      store,
    )
    expect(result.lines[0].quantity.toString()).toBe('0.3')
  })

  it('keeps incompatible units apart and reports a conflict', () => {
    const result = aggregateIngredients(
      [contribution('r1', [['eggs', '1', 'COUNT']]), contribution('r2', [['eggs', '0.5', 'KG']])],
      normalizer,
      store,
    )

    expect(summary(result.lines)).toEqual([
      ['eggs', '1', 'COUNT'],
      ['eggs', '500', 'G'],
    ])
    expect(result.outcomes[0].kind).toBe('conflict')
    expect(result.warnings).toEqual([
      { kind: 'unit-family-conflict', ingredientId: 'eggs', ingredientName: 'Eggs', units: ['COUNT', 'G'] },
    ])
  })

  it('orders lines by name regardless of case', () => {
    const result = aggregateIngredients(
      [contribution('r1', [['flour', '1', 'G'], ['butter', '1', 'G'], ['apple', '1', 'COUNT']])],
      normalizer,
      store,
    )
    expect(result.lines.map((l) => l.ingredientName)).toEqual(['apple', 'Butter', 'flour'])
  })

  it('lists a recipe only once per line', () => {
    const result = aggregateIngredients(
      [contribution('r1', [['flour', '100', 'G']]), contribution('r1', [['flour', '100', 'G']])],
      normalizer,
      store,
    )
    expect(result.lines[0].recipeIds).toEqual(['r1'])
    expect(result.lines[0].quantity.toString()).toBe('200')
  })

  it('gives the same output for the same input', () => {
    const input = [
      contribution('r1', [['eggs', '2', 'COUNT'], ['flour', '250', 'G']]),
      contribution('r2', [['eggs', '0.1', 'KG'], ['butter', '50', 'G']]),
    ]
    const first = aggregateIngredients(input, normalizer, store)
    const second = aggregateIngredients(input, normalizer, store)
    expect(JSON.stringify(second.lines)).toBe(JSON.stringify(first.lines))
  })

  it('fails on an unknown ingredient', () => {
    const err = caught(() => aggregateIngredients([contribution('r1', [['ghost', '1', 'G']])], normalizer, store))
    expect(isShoppingError(err, 'UNKNOWN_INGREDIENT')).toBe(true)
  })
})

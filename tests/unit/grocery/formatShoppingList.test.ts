import { describe, it, expect } from 'vitest'
import { formatShoppingLine, formatShoppingListText } from '@application/grocery/formatShoppingList.ts'
import { generateShoppingList } from '@application/grocery/generateShoppingList.ts'
import { createSnapshotStore } from '@application/grocery/stores.ts'
import { toggleItem } from '@application/grocery/toggleItem.ts'
import { toDecimal } from '@domain/decimal.ts'
import type { CostEstimate } from '@domain/models/CostEstimate.ts'
import { makeIngredient, makeRecipe, makeRequest, select } from '../../helpers/fixtures.ts'

const store = createSnapshotStore(
  [
    makeRecipe('r1', 2, [['flour', '1.4', 'KG'], ['eggs', '3', 'COUNT']]),
    makeRecipe('r2', 2, [['eggs', '50', 'G'], ['oil', '1', 'TABLESPOON']]),
  ],
  [
    makeIngredient('flour', 'Flour', 'DRY', 'flour'),
    makeIngredient('eggs', 'Eggs', 'CHILLED_RETAIL', 'eggs'),
    makeIngredient('oil', 'Olive oil', 'DRY', 'olive oil'),
  ],
)

describe('formatShoppingLine', () => {
  it('joins quantity, unit label and name', () => {
    expect(
      formatShoppingLine({
        ingredientId: 'flour',
        ingredientName: 'Flour',
        quantity: toDecimal('1400'),
        unit: 'G',
        recipeIds: [],
        checked: false,
      }),
    ).toBe('1400 g Flour')
  })

  it('omits the unit for counted items', () => {
    expect(
      formatShoppingLine({
        ingredientId: 'eggs',
        ingredientName: 'Eggs',
        quantity: toDecimal('3'),
        unit: 'COUNT',
        recipeIds: [],
        checked: false,
      }),
    ).toBe('3 Eggs')
  })
})

describe('formatShoppingListText', () => {
  it('renders a checklist grouped by category', () => {
    const list = toggleItem(
      generateShoppingList(makeRequest(select('r1')), store, store, { name: 'Week 10' }),
      'eggs',
      'COUNT',
    )

    expect(formatShoppingListText(list)).toBe(
      ['Week 10', '', 'Dry Goods', '---', '[ ] 1400 g Flour', '', 'Chilled (Supermarket)', '---', '[x] 3 Eggs'].join(
        '\n',
      ),
    )
  })

  it('lists unit conflicts and a partial estimate', () => {
    const list = generateShoppingList(makeRequest(select('r1'), select('r2')), store, store, { name: 'Mixed' })
    const estimate: CostEstimate = {
      currency: 'EUR',
      perCategory: { DRY: toDecimal('1.68'), CHILLED_RETAIL: toDecimal('1.5'), CHILLED_ARTISAN: toDecimal(0) },
      grandTotal: toDecimal('3.18'),
      priced: [],
      unresolved: [{ ingredientId: 'oil', unit: 'ML', reason: 'not-found' }],
      unresolvedIngredientIds: ['oil'],
      partial: true,
      estimatedAt: '2026-03-02T10:00:00.000Z',
    }

    expect(formatShoppingListText({ ...list, costEstimate: estimate })).toBe(
      [
        'Mixed',
        '',
        'Dry Goods',
        '---',
        '[ ] 1400 g Flour',
        '[ ] 15 ml Olive oil',
        '',
        'Chilled (Supermarket)',
        '---',
        '[ ] 3 Eggs',
        '[ ] 50 g Eggs',
        '',
        'Warnings',
        '---',
        'Eggs: listed in incompatible units (COUNT, G)',
        '',
        'Estimated cost: at least 3.18 EUR',
      ].join('\n'),
    )
  })
})

import { describe, it, expect } from 'vitest'
import { generateShoppingList } from '@application/grocery/generateShoppingList.ts'
import { createSnapshotStore } from '@application/grocery/stores.ts'
import { clearChecked, isItemChecked, toggleItem } from '@application/grocery/toggleItem.ts'
import { isShoppingError } from '@domain/errors.ts'
import { caught, makeIngredient, makeRecipe, makeRequest, select } from '../../helpers/fixtures.ts'

const store = createSnapshotStore(
  [makeRecipe('r1', 2, [['rice', '500', 'G'], ['eggs', '3', 'COUNT']])],
  [makeIngredient('rice', 'Rice'), makeIngredient('eggs', 'Eggs', 'CHILLED_RETAIL')],
)

const list = generateShoppingList(makeRequest(select('r1')), store, store, { createId: () => 'list-1' })

describe('toggleItem', () => {
  it('checks an unchecked line and returns a new list', () => {
    const toggled = toggleItem(list, 'eggs', 'COUNT')
    expect(isItemChecked(toggled, 'eggs', 'COUNT')).toBe(true)
    expect(isItemChecked(list, 'eggs', 'COUNT')).toBe(false)
    expect(toggled).not.toBe(list)
  })

  it('only touches the named line', () => {
    const toggled = toggleItem(list, 'eggs', 'COUNT')
    expect(isItemChecked(toggled, 'rice', 'G')).toBe(false)
    expect(toggled.categories.DRY).toBe(list.categories.DRY)
  })

  it('unchecks on a second toggle', () => {
    const twice = toggleItem(toggleItem(list, 'eggs', 'COUNT'), 'eggs', 'COUNT')
    expect(isItemChecked(twice, 'eggs', 'COUNT')).toBe(false)
  })

  it('reports a missing line', () => {
    const err = caught(() => toggleItem(list, 'eggs', 'G'))
    expect(isShoppingError(err, 'LINE_NOT_FOUND')).toBe(true)
    if (isShoppingError(err)) {
      expect(err.toJSON()).toEqual({
        code: 'LINE_NOT_FOUND',
        message: 'List list-1 has no line for ingredient eggs in G',
        details: { listId: 'list-1', ingredientId: 'eggs', unit: 'G' },
      })
    }
  })

  it('returns undefined for the checked state of a missing line', () => {
    expect(isItemChecked(list, 'milk', 'ML')).toBeUndefined()
  })
})

describe('clearChecked', () => {
  it('unchecks every line', () => {
    const checked = toggleItem(toggleItem(list, 'eggs', 'COUNT'), 'rice', 'G')
    const cleared = clearChecked(checked)
    expect(isItemChecked(cleared, 'eggs', 'COUNT')).toBe(false)
    expect(isItemChecked(cleared, 'rice', 'G')).toBe(false)
    expect(isItemChecked(checked, 'rice', 'G')).toBe(true)
  })
})

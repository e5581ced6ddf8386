import { describe, it, expect } from 'vitest'
import {
  areCompatible,
  conversionFactor,
  convertUnit,
  createConversionTable,
  unitFamily,
} from '@application/scaler/convertUnit.ts'
import { QuantityNormalizer } from '@application/scaler/normalizeQuantity.ts'
import type { Unit } from '@domain/constants/units.ts'
import { parseUnitText } from '@domain/constants/units.ts'
import { toDecimal } from '@domain/decimal.ts'
import { isShoppingError } from '@domain/errors.ts'
import { caught } from '../../helpers/fixtures.ts'

const table = createConversionTable()

describe('conversion table', () => {
  it('is frozen', () => {
    expect(Object.isFrozen(table)).toBe(true)
    expect(Object.isFrozen(table.entries)).toBe(true)
    expect(Object.isFrozen(table.entries.KG)).toBe(true)
  })

  it('groups units into families', () => {
    expect(unitFamily(table, 'KG')).toBe('mass')
    expect(unitFamily(table, 'TEASPOON')).toBe('volume')
    expect(unitFamily(table, 'COUNT')).toBe('count')
    expect(unitFamily(table, 'PINCH')).toBe('pinch')
  })

  it('rejects a unit it does not know', () => {
    const stray: Unit = JSON.parse('"CUP"')
    const err = caught(() => unitFamily(table, stray))
    expect(isShoppingError(err, 'INCOMPATIBLE_UNITS')).toBe(true)
  })
})

describe('conversionFactor', () => {
  it('returns factors within a family', () => {
    expect(conversionFactor(table, 'KG', 'G').toString()).toBe('1000')
    expect(conversionFactor(table, 'G', 'KG').toString()).toBe('0.001')
    expect(conversionFactor(table, 'TABLESPOON', 'TEASPOON').toString()).toBe('3')
    expect(conversionFactor(table, 'L', 'TABLESPOON').toDecimalPlaces(4).toString()).toBe('66.6667')
    expect(conversionFactor(table, 'PINCH', 'PINCH').toString()).toBe('1')
  })

  it('refuses to cross families', () => {
    expect(areCompatible(table, 'COUNT', 'KG')).toBe(false)
    const err = caught(() => conversionFactor(table, 'COUNT', 'KG'))
    expect(isShoppingError(err, 'INCOMPATIBLE_UNITS')).toBe(true)
    expect(isShoppingError(caught(() => conversionFactor(table, 'PINCH', 'TEASPOON')), 'INCOMPATIBLE_UNITS')).toBe(true)
  })
})

describe('convertUnit', () => {
  it('converts exactly', () => {
    expect(convertUnit(table, toDecimal('2.5'), 'L', 'ML').toString()).toBe('2500')
    expect(convertUnit(table, toDecimal('1400'), 'G', 'KG').toString()).toBe('1.4')
    expect(convertUnit(table, toDecimal('2'), 'TABLESPOON', 'ML').toString()).toBe('30')
  })

  it('returns the same quantity when units match', () => {
    const qty = toDecimal('0.1')
    expect(convertUnit(table, qty, 'G', 'G')).toBe(qty)
  })
})

describe('QuantityNormalizer', () => {
  const normalizer = new QuantityNormalizer(table)

  it('moves mass and volume into the canonical unit', () => {
    const kg = normalizer.normalize('flour', toDecimal('0.5'), 'KG')
    expect(kg.quantity.toString()).toBe('500')
    expect(kg.unit).toBe('G')

    const tbsp = normalizer.normalize('oil', toDecimal('2'), 'TABLESPOON')
    expect(tbsp.quantity.toString()).toBe('30')
    expect(tbsp.unit).toBe('ML')

    const litres = normalizer.normalize('milk', toDecimal('1.5'), 'L')
    expect(litres.quantity.toString()).toBe('1500')
    expect(litres.unit).toBe('ML')
  })

  it('leaves COUNT and PINCH untouched', () => {
    const eggs = normalizer.normalize('eggs', toDecimal('3'), 'COUNT')
    expect(eggs.quantity.toString()).toBe('3')
    expect(eggs.unit).toBe('COUNT')

    const salt = normalizer.normalize('salt', toDecimal('2'), 'PINCH')
    expect(salt.unit).toBe('PINCH')
  })

  it('gives the same result whatever the ingredient', () => {
    const a = normalizer.normalize('sugar', toDecimal('3'), 'TEASPOON')
    const b = normalizer.normalize('cumin', toDecimal('3'), 'TEASPOON')
    expect(a.quantity.eq(b.quantity)).toBe(true)
    expect(a.unit).toBe(b.unit)
  })

  it('names the ingredient when the unit is unknown', () => {
    const stray: Unit = JSON.parse('"CUP"')
    const err = caught(() => normalizer.normalize('rice', toDecimal('1'), stray))
    expect(isShoppingError(err, 'INCOMPATIBLE_UNITS')).toBe(true)
    if (isShoppingError(err)) {
      expect(err.details).toEqual({ ingredientId: 'rice', unit: 'CUP' })
    }
  })
})

describe('parseUnitText', () => {
  it('accepts codes and common spellings', () => {
    expect(parseUnitText('KG')).toBe('KG')
    expect(parseUnitText(' Grams ')).toBe('G')
    expect(parseUnitText('tbsp')).toBe('TABLESPOON')
    expect(parseUnitText('pieces')).toBe('COUNT')
  })

  it('returns null for anything else', () => {
    expect(parseUnitText('cup')).toBeNull()
  })
})

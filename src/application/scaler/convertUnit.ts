import type { Decimal } from 'decimal.js'
import { UNIT_DEFINITIONS, type Unit, type UnitFamily } from '@domain/constants/units.ts'
import { ONE, toDecimal } from '@domain/decimal.ts'
import { ShoppingError } from '@domain/errors.ts'

interface UnitEntry {
  family: UnitFamily
  toBase: Decimal
}

type UnitDefinitions = Record<Unit, { family: UnitFamily; toBase: string }>

/**
 * Immutable unit table. Build one with createConversionTable() and hand it
 * to whatever needs conversions; nothing reads a shared global copy.
 */
export interface ConversionTable {
  readonly entries: Readonly<Record<Unit, Readonly<UnitEntry>>>
}

export function createConversionTable(definitions: UnitDefinitions = UNIT_DEFINITIONS): ConversionTable {
  const entry = (unit: Unit): Readonly<UnitEntry> =>
    Object.freeze({ family: definitions[unit].family, toBase: toDecimal(definitions[unit].toBase) })

  const entries: Record<Unit, Readonly<UnitEntry>> = {
    COUNT: entry('COUNT'),
    KG: entry('KG'),
    G: entry('G'),
    L: entry('L'),
    ML: entry('ML'),
    TABLESPOON: entry('TABLESPOON'),
    TEASPOON: entry('TEASPOON'),
    PINCH: entry('PINCH'),
  }
  return Object.freeze({ entries: Object.freeze(entries) })
}

export function unitFamily(table: ConversionTable, unit: Unit): UnitFamily {
  // untyped callers can still hand us a stray string
  const entry: Readonly<UnitEntry> | undefined = table.entries[unit]
  if (!entry) {
    throw new ShoppingError('INCOMPATIBLE_UNITS', `Unknown unit "${String(unit)}"`, { unit })
  }
  return entry.family
}

export function areCompatible(table: ConversionTable, a: Unit, b: Unit): boolean {
  return unitFamily(table, a) === unitFamily(table, b)
}

function assertCompatible(table: ConversionTable, from: Unit, to: Unit): void {
  if (!areCompatible(table, from, to)) {
    throw new ShoppingError('INCOMPATIBLE_UNITS', `Cannot convert ${from} to ${to}`, { from, to })
  }
}

/**
 * Multiplier M such that qty in `to` = qty in `from` * M.
 * Only defined within a unit family; COUNT and PINCH convert only to themselves.
 */
export function conversionFactor(table: ConversionTable, from: Unit, to: Unit): Decimal {
  assertCompatible(table, from, to)
  if (from === to) return ONE
  return table.entries[from].toBase.div(table.entries[to].toBase)
}

/**
 * Convert a quantity between two units of the same family.
 * Multiplies before dividing so conversions towards a smaller unit stay exact.
 */
export function convertUnit(table: ConversionTable, qty: Decimal, from: Unit, to: Unit): Decimal {
  assertCompatible(table, from, to)
  if (from === to) return qty
  return qty.times(table.entries[from].toBase).div(table.entries[to].toBase)
}

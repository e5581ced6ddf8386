import type { Decimal } from 'decimal.js'
import type { Unit } from '@domain/constants/units.ts'

/** Display places for quantities. Pipeline values are never rounded. */
export const DISPLAY_PLACES = 2

const UNIT_LABELS: Record<Unit, { one: string; many: string }> = {
  COUNT: { one: '', many: '' },
  KG: { one: 'kg', many: 'kg' },
  G: { one: 'g', many: 'g' },
  L: { one: 'l', many: 'l' },
  ML: { one: 'ml', many: 'ml' },
  TABLESPOON: { one: 'tablespoon', many: 'tablespoons' },
  TEASPOON: { one: 'teaspoon', many: 'teaspoons' },
  PINCH: { one: 'pinch', many: 'pinches' },
}

/**
 * Round to two places for display, without trailing zeros.
 *
 * Examples:
 * - 1400 -> "1400"
 * - 0.5 -> "0.5"
 * - 0.3333 -> "0.33"
 * - 2.005 -> "2.01"
 * - 1e21 -> "1000000000000000000000"
 */
export function formatQuantity(value: Decimal): string {
  return value.toDecimalPlaces(DISPLAY_PLACES).toFixed()
}

/** Unit label for a quantity; COUNT has none ("3 eggs"). */
export function formatUnit(unit: Unit, value: Decimal): string {
  const label = UNIT_LABELS[unit]
  return value.toDecimalPlaces(DISPLAY_PLACES).eq(1) ? label.one : label.many
}

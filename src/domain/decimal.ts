import { Decimal } from 'decimal.js'

/**
 * Decimal constructor for quantities and money. A private clone keeps the
 * precision setting local instead of mutating decimal.js globals.
 */
const Quantity = Decimal.clone({ precision: 40, rounding: Decimal.ROUND_HALF_UP })

export function toDecimal(value: Decimal.Value): Decimal {
  return new Quantity(value)
}

export const ZERO = toDecimal(0)
export const ONE = toDecimal(1)

/** Fixed 2-place rendering used only at presentation time. */
export function formatDecimal(value: Decimal, places = 2): string {
  return value.toDecimalPlaces(places).toFixed(places)
}

import type { Decimal } from 'decimal.js'
import { CANONICAL_UNIT, isUnit, type Unit } from '@domain/constants/units.ts'
import { ShoppingError } from '@domain/errors.ts'
import { areCompatible, convertUnit, unitFamily, type ConversionTable } from './convertUnit.ts'

export interface NormalizedQuantity {
  quantity: Decimal
  unit: Unit
}

/**
 * Converts quantities into the canonical unit of their family
 * (mass -> G, volume -> ML, COUNT and PINCH unchanged).
 *
 * Unit semantics are global: the ingredient id only appears in errors.
 */
export class QuantityNormalizer {
  constructor(private readonly table: ConversionTable) {}

  canonicalUnitOf(unit: Unit): Unit {
    return CANONICAL_UNIT[unitFamily(this.table, unit)]
  }

  normalize(ingredientId: string, quantity: Decimal, unit: Unit): NormalizedQuantity {
    if (!isUnit(unit)) {
      throw new ShoppingError(
        'INCOMPATIBLE_UNITS',
        `Ingredient ${ingredientId} uses unit "${String(unit)}" outside every unit family`,
        { ingredientId, unit },
      )
    }
    const canonical = this.canonicalUnitOf(unit)
    return {
      quantity: convertUnit(this.table, quantity, unit, canonical),
      unit: canonical,
    }
  }

  isConvertible(from: Unit, to: Unit): boolean {
    return areCompatible(this.table, from, to)
  }

  /** Express a canonical quantity in another unit of the same family. */
  convert(quantity: Decimal, from: Unit, to: Unit): Decimal {
    return convertUnit(this.table, quantity, from, to)
  }
}

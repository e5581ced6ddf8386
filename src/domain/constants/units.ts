export const UNITS = ['COUNT', 'KG', 'G', 'L', 'ML', 'TABLESPOON', 'TEASPOON', 'PINCH'] as const

export type Unit = (typeof UNITS)[number]

export type UnitFamily = 'mass' | 'volume' | 'count' | 'pinch'

/** Unit each family sums in. */
export const CANONICAL_UNIT: Record<UnitFamily, Unit> = {
  mass: 'G',
  volume: 'ML',
  count: 'COUNT',
  pinch: 'PINCH',
}

/** Family membership and size of one unit expressed in the family's base unit. */
export const UNIT_DEFINITIONS: Record<Unit, { family: UnitFamily; toBase: string }> = {
  COUNT: { family: 'count', toBase: '1' },
  KG: { family: 'mass', toBase: '1000' },
  G: { family: 'mass', toBase: '1' },
  L: { family: 'volume', toBase: '1000' },
  ML: { family: 'volume', toBase: '1' },
  TABLESPOON: { family: 'volume', toBase: '15' },
  TEASPOON: { family: 'volume', toBase: '5' },
  PINCH: { family: 'pinch', toBase: '1' },
}

/** Maps common unit spellings to a unit. */
export const UNIT_MAP: Record<string, Unit> = {
  count: 'COUNT',
  piece: 'COUNT',
  pieces: 'COUNT',
  pc: 'COUNT',
  pcs: 'COUNT',
  unit: 'COUNT',
  each: 'COUNT',
  unite: 'COUNT',
  'unité': 'COUNT',

  kg: 'KG',
  kilogram: 'KG',
  kilograms: 'KG',

  g: 'G',
  gram: 'G',
  grams: 'G',

  l: 'L',
  liter: 'L',
  liters: 'L',
  litre: 'L',
  litres: 'L',

  ml: 'ML',
  milliliter: 'ML',
  milliliters: 'ML',

  tablespoon: 'TABLESPOON',
  tablespoons: 'TABLESPOON',
  tbsp: 'TABLESPOON',

  teaspoon: 'TEASPOON',
  teaspoons: 'TEASPOON',
  tsp: 'TEASPOON',

  pinch: 'PINCH',
  pinches: 'PINCH',
}

export function isUnit(value: string): value is Unit {
  return (UNITS as readonly string[]).includes(value)
}

/** Resolve free-form unit text ("kg", "Grams", "TEASPOON") to a unit, or null. */
export function parseUnitText(text: string): Unit | null {
  const trimmed = text.trim()
  if (isUnit(trimmed)) return trimmed
  return UNIT_MAP[trimmed.toLowerCase()] ?? null
}

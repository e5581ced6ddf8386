import { CATEGORY_LABELS, INGREDIENT_CATEGORIES } from '@domain/constants/categories.ts'
import type { AggregatedLine, ShoppingList } from '@domain/models/ShoppingList.ts'
import { formatDecimal } from '@domain/decimal.ts'
import { formatQuantity, formatUnit } from '@application/scaler/formatQuantity.ts'

/**
 * Format a single list line as plain text.
 * Examples: "1400 g flour", "3 eggs", "2 tablespoons olive oil"
 */
export function formatShoppingLine(line: AggregatedLine): string {
  const parts = [formatQuantity(line.quantity)]
  const unit = formatUnit(line.unit, line.quantity)
  if (unit) parts.push(unit)
  parts.push(line.ingredientName)
  return parts.join(' ')
}

/**
 * Format an entire list as a plain-text checklist grouped by category,
 * followed by conflict warnings and the cost estimate when present.
 */
export function formatShoppingListText(list: ShoppingList): string {
  const lines: string[] = [list.name]

  for (const category of INGREDIENT_CATEGORIES) {
    const group = list.categories[category]
    if (group.length === 0) continue
    lines.push('', CATEGORY_LABELS[category], '---')
    for (const line of group) {
      const prefix = line.checked ? '[x]' : '[ ]'
      lines.push(`${prefix} ${formatShoppingLine(line)}`)
    }
  }

  if (list.warnings.length > 0) {
    lines.push('', 'Warnings', '---')
    for (const warning of list.warnings) {
      lines.push(`${warning.ingredientName}: listed in incompatible units (${warning.units.join(', ')})`)
    }
  }

  const estimate = list.costEstimate
  if (estimate) {
    const qualifier = estimate.partial ? 'at least ' : ''
    lines.push('', `Estimated cost: ${qualifier}${formatDecimal(estimate.grandTotal)} ${estimate.currency}`)
  }

  return lines.join('\n')
}

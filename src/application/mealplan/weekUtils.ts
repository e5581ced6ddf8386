import type { DayOfWeek } from '@domain/models/MealPlan.ts'

export const DAYS_OF_WEEK: DayOfWeek[] = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun']

/**
 * Get the Monday (start of week) for a given date.
 * Returns YYYY-MM-DD string.
 */
export function getWeekStart(date: Date = new Date()): string {
  const d = new Date(date)
  const day = d.getDay() // 0=Sun, 1=Mon, ...
  const diff = day === 0 ? -6 : 1 - day
  d.setDate(d.getDate() + diff)
  return formatDate(d)
}

/**
 * Format a week range like "Feb 10 - Feb 16"
 */
export function formatWeekRange(weekStart: string): string {
  const start = parseDate(weekStart)
  const end = new Date(start)
  end.setDate(end.getDate() + 6)
  return `${formatShortDate(start)} - ${formatShortDate(end)}`
}

/**
 * Format as "Groceries for Feb 10 - Feb 16" for shopping list names.
 */
export function formatWeekListName(weekStart: string): string {
  return `Groceries for ${formatWeekRange(weekStart)}`
}

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec']

// Fixed English labels; Intl output varies with the ICU data Node ships with.
function formatShortDate(d: Date): string {
  return `${MONTHS[d.getMonth()]} ${d.getDate()}`
}

function formatDate(d: Date): string {
  const year = d.getFullYear()
  const month = String(d.getMonth() + 1).padStart(2, '0')
  const day = String(d.getDate()).padStart(2, '0')
  return `${year}-${month}-${day}`
}

function parseDate(dateStr: string): Date {
  const [year, month, day] = dateStr.split('-').map(Number)
  return new Date(year, month - 1, day)
}

/**
 * Due-date parser for the date prompt.
 *
 * Accepted forms:
 * - `2024-06-14`, `2024-06-14 Fri`, `2024-06-14 Fri 10:00`, `<2024-06-14 Fri>`
 * - `+3`, `+3d`, `-2w`, `+1m`, `+1y` (relative to today)
 * - `.`, `today`, `tomorrow`, `yesterday`, or an empty answer (today)
 * - weekday names: `fri`, `friday` (today or the nearest one after it)
 */

import {
  addDays,
  addMonths,
  addWeeks,
  addYears,
  getDay,
  isValid,
  nextDay,
  parse,
  startOfDay,
  type Day,
} from 'date-fns'

export class DateInputError extends Error {
  readonly input: string

  constructor(input: string, reason: string) {
    super(`Cannot read "${input}" as a date: ${reason}`)
    this.name = 'DateInputError'
    this.input = input
  }
}

const ISO_DATE_REGEX = /^(\d{4}-\d{2}-\d{2})(?:\s+[A-Za-z]{2,3}\.?)?(?:\s+\d{1,2}:\d{2}(?:-\d{1,2}:\d{2})?)?$/

const RELATIVE_REGEX = /^([+-])(\d+)([dwmy])?$/i

const WEEKDAYS = new Map<string, Day>([
  ['sun', 0],
  ['sunday', 0],
  ['mon', 1],
  ['monday', 1],
  ['tue', 2],
  ['tuesday', 2],
  ['wed', 3],
  ['wednesday', 3],
  ['thu', 4],
  ['thursday', 4],
  ['fri', 5],
  ['friday', 5],
  ['sat', 6],
  ['saturday', 6],
])

function stripBrackets(value: string): string {
  const match = value.match(/^[<[](.*)[>\]]$/)
  return match ? match[1].trim() : value
}

function applyRelative(today: Date, sign: string, amount: number, unit: string): Date {
  const n = sign === '-' ? -amount : amount
  switch (unit.toLowerCase()) {
    case 'w':
      return addWeeks(today, n)
    case 'm':
      return addMonths(today, n)
    case 'y':
      return addYears(today, n)
    default:
      return addDays(today, n)
  }
}

function inRange(input: string, date: Date): Date {
  if (!isValid(date)) {
    throw new DateInputError(input, 'date out of range')
  }
  return date
}

/**
 * Turn the user's answer into a calendar date (local midnight).
 * Throws DateInputError when the answer is not one of the accepted forms.
 */
export function parseDueDate(input: string, today: Date): Date {
  const base = startOfDay(today)
  const value = stripBrackets(input.trim())
  const lower = value.toLowerCase()

  if (lower === '' || lower === '.' || lower === 'today') return base
  if (lower === 'tomorrow') return addDays(base, 1)
  if (lower === 'yesterday') return addDays(base, -1)

  const relative = value.match(RELATIVE_REGEX)
  if (relative) {
    return inRange(input, applyRelative(base, relative[1], Number(relative[2]), relative[3] ?? 'd'))
  }

  const weekday = WEEKDAYS.get(lower)
  if (weekday !== undefined) {
    return inRange(input, getDay(base) === weekday ? base : nextDay(base, weekday))
  }

  const iso = value.match(ISO_DATE_REGEX)
  if (iso) {
    const date = parse(iso[1], 'yyyy-MM-dd', base)
    if (!isValid(date)) {
      throw new DateInputError(input, 'no such calendar day')
    }
    return date
  }

  throw new DateInputError(input, 'expected YYYY-MM-DD, +Nd/w/m/y, a weekday or "today"')
}

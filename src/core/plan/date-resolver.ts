import { addDays, format, getISODay, subDays } from 'date-fns'

const SATURDAY = 6

/**
 * Format a date the way outline planning lines expect it: `<2024-06-13 Thu>`
 */
export function formatTimestamp(date: Date): string {
  return `<${format(date, 'yyyy-MM-dd EEE')}>`
}

/**
 * Move `anchor` back by `offsetDays`. Weekend results are pushed forward to
 * the following Monday unless weekends are allowed, so Saturday and Sunday
 * both resolve to the same Monday.
 */
export function shiftOffsetDate(
  anchor: Date,
  offsetDays: number,
  allowWeekends: boolean,
): Date {
  const candidate = subDays(anchor, offsetDays)
  if (allowWeekends) return candidate

  const isoDay = getISODay(candidate)
  if (isoDay < SATURDAY) return candidate

  return addDays(candidate, 8 - isoDay)
}

export function resolveOffsetDate(
  anchor: Date,
  offsetDays: number,
  allowWeekends: boolean,
): string {
  return formatTimestamp(shiftOffsetDate(anchor, offsetDays, allowWeekends))
}

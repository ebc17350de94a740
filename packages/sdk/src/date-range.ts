import { ValidationError } from "./errors"
import type { CalendarDate, DateRange } from "./types"

const MS_PER_DAY = 86_400_000
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

export const REVERSED_RANGE_WARNING =
  "Start date must be before end date. Showing the full data window instead."

function toUtcMillis(date: CalendarDate): number {
  const match = DATE_PATTERN.exec(date)
  if (!match) return Number.NaN
  const [, y, m, d] = match
  return Date.UTC(Number(y), Number(m) - 1, Number(d))
}

function fromUtcMillis(ms: number): CalendarDate {
  return new Date(ms).toISOString().slice(0, 10)
}

/**
 * Validates a `YYYY-MM-DD` string and rejects impossible dates such as
 * `2025-02-30`.
 */
export function parseCalendarDate(value: string, field = "date"): CalendarDate {
  const trimmed = value.trim()
  const ms = toUtcMillis(trimmed)
  if (Number.isNaN(ms) || fromUtcMillis(ms) !== trimmed) {
    throw new ValidationError(field, `'${value}' is not a valid YYYY-MM-DD date`)
  }
  return trimmed
}

/** Number of calendar days covered, counting both ends. */
export function dayCount(range: DateRange): number {
  return Math.round((toUtcMillis(range.end) - toUtcMillis(range.start)) / MS_PER_DAY) + 1
}

export function clampDate(date: CalendarDate, window: DateRange): CalendarDate {
  if (date < window.start) return window.start
  if (date > window.end) return window.end
  return date
}

/**
 * Builds the active range from optional user input. Missing ends default to
 * the dataset window, both ends are clamped into it, and a reversed range
 * falls back to the whole window with a warning instead of failing.
 */
export function resolveDateRange(
  input: { start?: string; end?: string },
  window: DateRange,
): { range: DateRange; warning?: string } {
  const start = clampDate(
    input.start ? parseCalendarDate(input.start, "start") : window.start,
    window,
  )
  const end = clampDate(input.end ? parseCalendarDate(input.end, "end") : window.end, window)

  if (start > end) {
    return { range: { ...window }, warning: REVERSED_RANGE_WARNING }
  }
  return { range: { start, end } }
}

/** `Aug 05, 2025` */
export function formatLongDate(date: CalendarDate): string {
  return new Date(toUtcMillis(date)).toLocaleDateString("en-US", {
    month: "short",
    day: "2-digit",
    year: "numeric",
    timeZone: "UTC",
  })
}

/** `Aug 05` */
export function formatShortDate(date: CalendarDate): string {
  return new Date(toUtcMillis(date)).toLocaleDateString("en-US", {
    month: "short",
    day: "2-digit",
    timeZone: "UTC",
  })
}

/** `20250805` */
export function formatCompactDate(date: CalendarDate): string {
  return date.replace(/-/g, "")
}

/** The warehouse SQL API encodes DATE columns as days since 1970-01-01. */
export function epochDaysToDate(days: number): CalendarDate {
  return fromUtcMillis(days * MS_PER_DAY)
}

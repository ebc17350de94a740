import { dayCount, formatLongDate, type DateRange } from "@behavior-intel/sdk"

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`
  const seconds = ms / 1000
  if (seconds < 60) return `${seconds.toFixed(1)}s`
  const minutes = seconds / 60
  return `${minutes.toFixed(1)}m`
}

export function formatElapsed(seconds: number): string {
  const secs = Math.floor(seconds)
  if (secs < 60) return `${secs}s`
  return `${Math.floor(secs / 60)}m ${secs % 60}s`
}

export function formatRange(range: DateRange): string {
  const days = dayCount(range)
  return `${formatLongDate(range.start)} to ${formatLongDate(range.end)} (${days} ${days === 1 ? "day" : "days"})`
}

export function truncate(text: string, max: number): string {
  if (text.length <= max) return text
  return `${text.slice(0, max - 3)}...`
}

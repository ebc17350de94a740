import type { ChartPoint, DataCell, DataRow } from "./types"

export function numberValue(cell: DataCell | undefined): number | null {
  if (typeof cell === "number") return Number.isFinite(cell) ? cell : null
  if (typeof cell === "string" && cell.trim() !== "") {
    const n = Number(cell)
    return Number.isFinite(n) ? n : null
  }
  return null
}

export function textValue(cell: DataCell | undefined): string {
  if (cell === null || cell === undefined) return ""
  return String(cell)
}

export function sum(rows: readonly DataRow[], column: string): number {
  let total = 0
  for (const row of rows) total += numberValue(row[column]) ?? 0
  return total
}

/** Mean of the numeric cells of a column; null when there are none. */
export function mean(rows: readonly DataRow[], column: string): number | null {
  let total = 0
  let count = 0
  for (const row of rows) {
    const n = numberValue(row[column])
    if (n === null) continue
    total += n
    count++
  }
  return count === 0 ? null : total / count
}

export function countWhere(rows: readonly DataRow[], predicate: (row: DataRow) => boolean): number {
  let count = 0
  for (const row of rows) if (predicate(row)) count++
  return count
}

export function distinctCount(rows: readonly DataRow[], column: string): number {
  return new Set(rows.map((row) => textValue(row[column]))).size
}

function sortDescending(points: ChartPoint[]): ChartPoint[] {
  // Array.prototype.sort is stable, so ties keep first-seen order.
  return [...points].sort((a, b) => b.value - a.value)
}

/** Occurrences of each distinct value, most frequent first. */
export function valueCounts(rows: readonly DataRow[], column: string): ChartPoint[] {
  const counts = new Map<string, number>()
  for (const row of rows) {
    const key = textValue(row[column])
    counts.set(key, (counts.get(key) ?? 0) + 1)
  }
  return sortDescending([...counts].map(([label, value]) => ({ label, value })))
}

/** Sum of `valueColumn` per distinct `keyColumn`, in first-seen order. */
export function groupSum(
  rows: readonly DataRow[],
  keyColumn: string,
  valueColumn: string,
): ChartPoint[] {
  const totals = new Map<string, number>()
  for (const row of rows) {
    const key = textValue(row[keyColumn])
    totals.set(key, (totals.get(key) ?? 0) + (numberValue(row[valueColumn]) ?? 0))
  }
  return [...totals].map(([label, value]) => ({ label, value }))
}

export function topN(points: readonly ChartPoint[], n: number): ChartPoint[] {
  return sortDescending([...points]).slice(0, n)
}

/** The `n` rows with the largest numeric `column`, largest first. */
export function largestRows(rows: readonly DataRow[], column: string, n: number): DataRow[] {
  return rows
    .filter((row) => numberValue(row[column]) !== null)
    .sort((a, b) => (numberValue(b[column]) ?? 0) - (numberValue(a[column]) ?? 0))
    .slice(0, n)
}

import type { DataCell, DataRow, DataTable } from "./types"

export function toDataTable(
  id: string,
  name: string,
  rows: DataRow[],
  columns?: string[],
): DataTable {
  const resolved = columns ?? (rows.length > 0 ? Object.keys(rows[0]) : [])
  return {
    id,
    name,
    columns: resolved,
    rows: rows.map((row) => {
      const picked: DataRow = {}
      for (const column of resolved) picked[column] = row[column] ?? null
      return picked
    }),
    rowCount: rows.length,
  }
}

/** Keeps rows whose `column` equals one of `values` (compared as text). */
export function filterRows(table: DataTable, column: string, values: readonly string[]): DataTable {
  const allowed = new Set(values)
  const rows = table.rows.filter((row) => allowed.has(formatCell(row[column] ?? null)))
  return { ...table, rows, rowCount: rows.length }
}

export function formatCell(value: DataCell): string {
  if (value === null) return ""
  if (typeof value === "boolean") return value ? "true" : "false"
  if (typeof value === "number") return Number.isInteger(value) ? String(value) : value.toFixed(2)
  return value
}

function escapeCsv(value: DataCell): string {
  const text = value === null ? "" : String(value)
  if (!/[",\r\n]/.test(text)) return text
  return `"${text.replace(/"/g, '""')}"`
}

export function toCsv(table: DataTable): string {
  const header = table.columns.map((column) => escapeCsv(column)).join(",")
  const rows = table.rows.map((row) =>
    table.columns.map((column) => escapeCsv(row[column] ?? null)).join(","),
  )
  return `${[header, ...rows].join("\n")}\n`
}

import { formatCell, type DataTable } from "@behavior-intel/sdk"
import Table from "cli-table3"
import pc from "picocolors"
import { sanitizeCell } from "./sanitize"
import { truncate } from "./format"

const TABLE_CHARS = {
  top: "─",
  "top-mid": "┬",
  "top-left": "┌",
  "top-right": "┐",
  bottom: "─",
  "bottom-mid": "┴",
  "bottom-left": "└",
  "bottom-right": "┘",
  left: "│",
  "left-mid": "├",
  mid: "─",
  "mid-mid": "┼",
  right: "│",
  "right-mid": "┤",
  middle: "│",
} as const

const MAX_CELL_WIDTH = 40

export function createTable(head: string[]): Table.Table {
  return new Table({
    head,
    style: { head: [], border: [], "padding-left": 1, "padding-right": 1 },
    chars: TABLE_CHARS,
  })
}

/** Renders at most `limit` rows; the caller reports how many were cut. */
export function renderDataTable(table: DataTable, limit: number): string {
  const out = createTable(table.columns.map((column) => pc.bold(column)))
  for (const row of table.rows.slice(0, limit)) {
    out.push(
      table.columns.map((column) =>
        truncate(sanitizeCell(formatCell(row[column] ?? null)), MAX_CELL_WIDTH),
      ),
    )
  }
  return out.toString()
}

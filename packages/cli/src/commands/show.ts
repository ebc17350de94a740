import { mkdirSync, writeFileSync } from "node:fs"
import { join } from "node:path"
import {
  filterRows,
  getSection,
  toCsv,
  type DateRange,
  type SectionData,
} from "@behavior-intel/sdk"
import { Command } from "commander"
import pc from "picocolors"
import { DEFAULT_TABLE_LIMIT } from "../config/constants"
import { loadSettings } from "../config/settings"
import { withErrorHandler } from "../errors"
import { renderBarChart } from "../utils/chart"
import { formatRange } from "../utils/format"
import { log } from "../utils/logger"
import { createSpinner } from "../utils/spinner"
import { renderDataTable } from "../utils/table"
import {
  parseFilter,
  parsePositiveInt,
  resolveRange,
  sectionContext,
  type RowFilter,
} from "./shared"

interface ShowOptions {
  start?: string
  end?: string
  filter: RowFilter[]
  limit: number
  csv?: string
  json?: boolean
}

/** Applies each filter to the tables that have its column. */
export function applyFilters(data: SectionData, filters: RowFilter[]): SectionData {
  let tables = data.tables
  for (const filter of filters) {
    if (!tables.some((t) => t.columns.includes(filter.column))) {
      log.warning(`No table on this page has a column named ${filter.column}`)
      continue
    }
    tables = tables.map((t) =>
      t.columns.includes(filter.column) ? filterRows(t, filter.column, filter.values) : t,
    )
  }
  return { ...data, tables }
}

export function renderSection(data: SectionData, range: DateRange, limit: number): string[] {
  const lines = [pc.bold(data.title), pc.dim(formatRange(range)), ""]

  if (data.emptyMessage) {
    lines.push(data.emptyMessage, "")
  }

  if (data.metrics.length > 0) {
    for (const metric of data.metrics) {
      const help = metric.help ? pc.dim(` (${metric.help})`) : ""
      lines.push(`${metric.label}: ${pc.bold(metric.value)}${help}`)
    }
    lines.push("")
  }

  for (const chart of data.charts) {
    if (chart.points.length === 0) continue
    lines.push(...renderBarChart(chart), "")
  }

  for (const table of data.tables) {
    lines.push(pc.bold(table.name))
    if (table.rows.length === 0) {
      lines.push(pc.dim("No rows for this period."), "")
      continue
    }
    lines.push(renderDataTable(table, limit))
    if (table.rowCount > limit) {
      lines.push(pc.dim(`Showing ${limit} of ${table.rowCount} rows`))
    }
    lines.push("")
  }

  return lines
}

function writeCsvFiles(dir: string, data: SectionData): string[] {
  mkdirSync(dir, { recursive: true })
  return data.tables.map((table) => {
    const path = join(dir, `${data.page}-${table.id}.csv`)
    writeFileSync(path, toCsv(table))
    return path
  })
}

export const show = new Command("show")
  .description("Show a dashboard page")
  .argument("<page>", "Page id (see `behavior-intel pages`)")
  .option("--start <date>", "First day of the range (YYYY-MM-DD)")
  .option("--end <date>", "Last day of the range (YYYY-MM-DD)")
  .option("--filter <column=values>", "Keep table rows whose column matches a value", parseFilter, [])
  .option("--limit <n>", "Rows shown per table", parsePositiveInt, DEFAULT_TABLE_LIMIT)
  .option("--csv <dir>", "Write each table as CSV into a directory")
  .option("--json", "Output as JSON")
  .action(
    withErrorHandler(async (page: string, options: ShowOptions) => {
      const section = getSection(page)
      const settings = loadSettings()
      const range = resolveRange(settings, options)
      const ctx = sectionContext(settings, range)

      const spinner = createSpinner({ showElapsed: true })
      spinner.start(`Loading ${section.title}...`)
      let data: SectionData
      try {
        data = applyFilters(await section.load(ctx), options.filter)
      } finally {
        spinner.stop()
      }

      if (options.json) {
        console.log(JSON.stringify({ range, ...data }, null, 2))
      } else {
        console.log(renderSection(data, range, options.limit).join("\n"))
      }

      for (const [key, message] of Object.entries(data.failures)) {
        log.warning(`Could not load ${key}: ${message}`)
      }

      if (options.csv) {
        for (const path of writeCsvFiles(options.csv, data)) {
          log.success(`Wrote ${path}`)
        }
      }
    }),
  )

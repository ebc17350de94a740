import {
  resolveDateRange,
  SnowflakeSqlClient,
  type DateRange,
  type SectionContext,
} from "@behavior-intel/sdk"
import { InvalidArgumentError } from "commander"
import { requireConnection, type Settings } from "../config/settings"
import { log } from "../utils/logger"

export interface RangeOptions {
  start?: string
  end?: string
}

/** Active range for a command; a reversed range is reported, not fatal. */
export function resolveRange(settings: Settings, options: RangeOptions): DateRange {
  const { range, warning } = resolveDateRange(options, settings.window)
  if (warning) log.warning(warning)
  return range
}

export function sectionContext(settings: Settings, range: DateRange): SectionContext {
  const connection = requireConnection(settings)
  return {
    query: new SnowflakeSqlClient({
      ...connection,
      warehouse: settings.warehouse,
      role: settings.role,
    }),
    range,
    database: settings.dataset.database,
    schema: settings.dataset.schema,
  }
}

export interface RowFilter {
  column: string
  values: string[]
}

/** `COLUMN=v1,v2` */
export function parseFilter(value: string, previous: RowFilter[] = []): RowFilter[] {
  const eq = value.indexOf("=")
  const column = eq > 0 ? value.slice(0, eq).trim() : ""
  const values =
    eq > 0
      ? value
          .slice(eq + 1)
          .split(",")
          .map((v) => v.trim())
          .filter((v) => v !== "")
      : []
  if (!column || values.length === 0) {
    throw new InvalidArgumentError("Expected COLUMN=value[,value...]")
  }
  return [...previous, { column, values }]
}

export function parsePositiveInt(value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError("Expected a positive integer")
  }
  return n
}

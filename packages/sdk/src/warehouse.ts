import { z } from "zod"
import { TOKEN_TYPE_HEADER } from "./agent-client"
import { epochDaysToDate } from "./date-range"
import { QueryError } from "./errors"
import { getLogger } from "./logger"
import type { BindValue, DataCell, DataRow, QueryService, SqlClientOptions } from "./types"

export const DEFAULT_QUERY_TIMEOUT = 60_000

export const STATEMENTS_PATH = "/api/v2/statements"

const columnSchema = z.object({
  name: z.string(),
  type: z.string(),
  scale: z.number().nullable().optional(),
})

const statementResponseSchema = z.object({
  statementHandle: z.string().optional(),
  resultSetMetaData: z.object({
    numRows: z.number().optional(),
    rowType: z.array(columnSchema),
  }),
  data: z.array(z.array(z.string().nullable())),
})

const statementErrorSchema = z.object({
  code: z.string().optional(),
  message: z.string().optional(),
  sqlState: z.string().optional(),
})

export type ColumnType = z.infer<typeof columnSchema>

export type StatementResponse = z.infer<typeof statementResponseSchema>

type Binding = { type: "TEXT" | "FIXED" | "REAL" | "BOOLEAN"; value: string | null }

function toBinding(value: BindValue): Binding {
  if (value === null) return { type: "TEXT", value: null }
  if (typeof value === "boolean") return { type: "BOOLEAN", value: String(value) }
  if (typeof value === "number") {
    return { type: Number.isInteger(value) ? "FIXED" : "REAL", value: String(value) }
  }
  return { type: "TEXT", value }
}

/** Converts one cell of the SQL API's all-string result encoding. */
export function convertCell(raw: string | null, column: ColumnType): DataCell {
  if (raw === null) return null

  switch (column.type.toLowerCase()) {
    case "fixed":
    case "real": {
      const n = Number(raw)
      return Number.isFinite(n) ? n : raw
    }
    case "boolean":
      return raw === "true" || raw === "1"
    case "date": {
      const days = Number(raw)
      return Number.isFinite(days) ? epochDaysToDate(days) : raw
    }
    case "timestamp_ntz":
    case "timestamp_ltz":
    case "timestamp_tz": {
      const seconds = Number(raw.split(" ")[0])
      return Number.isFinite(seconds) ? new Date(seconds * 1000).toISOString() : raw
    }
    default:
      return raw
  }
}

export function rowsFromStatement(statement: StatementResponse): DataRow[] {
  const columns = statement.resultSetMetaData.rowType
  return statement.data.map((cells) => {
    const row: DataRow = {}
    columns.forEach((column, i) => {
      row[column.name] = convertCell(cells[i] ?? null, column)
    })
    return row
  })
}

/**
 * {@link QueryService} over the warehouse SQL REST API.
 *
 * Runs each statement synchronously with positional `?` binds and returns
 * the first result partition, which covers every query the dashboard issues
 * since all of them carry a row limit or aggregate.
 */
export class SnowflakeSqlClient implements QueryService {
  private readonly _options: SqlClientOptions
  private readonly _baseUrl: string
  private readonly _timeout: number

  constructor(options: SqlClientOptions) {
    this._options = options
    this._baseUrl = options.baseUrl.replace(/\/+$/, "")
    this._timeout = options.timeout ?? DEFAULT_QUERY_TIMEOUT
  }

  async query(sql: string, binds: readonly BindValue[] = []): Promise<DataRow[]> {
    const { token, tokenType, warehouse, role, database, schema } = this._options

    const bindings: Record<string, Binding> = {}
    binds.forEach((value, i) => {
      bindings[String(i + 1)] = toBinding(value)
    })

    const headers: Record<string, string> = {
      Accept: "application/json",
      "Content-Type": "application/json",
      Authorization: `Bearer ${token}`,
    }
    if (tokenType) headers[TOKEN_TYPE_HEADER] = tokenType

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this._timeout)

    getLogger().debug("Running statement", { sql, binds: binds.length })

    let response: Response
    let payload: unknown
    try {
      response = await fetch(`${this._baseUrl}${STATEMENTS_PATH}`, {
        method: "POST",
        headers,
        body: JSON.stringify({
          statement: sql,
          timeout: Math.ceil(this._timeout / 1000),
          database,
          schema,
          warehouse,
          role,
          bindings: binds.length > 0 ? bindings : undefined,
        }),
        signal: controller.signal,
      })
      payload = await response.json()
    } catch (e) {
      if (e instanceof Error && e.name === "AbortError") {
        throw new QueryError("Query timed out", { sql })
      }
      if (e instanceof SyntaxError) {
        throw new QueryError("Unexpected response from the warehouse", { sql })
      }
      throw new QueryError("Network request failed", { sql })
    } finally {
      clearTimeout(timeoutId)
    }

    if (response.status === 202) {
      throw new QueryError("Query did not finish within the timeout", {
        status: 202,
        sql,
      })
    }

    if (response.status !== 200) {
      const parsedError = statementErrorSchema.safeParse(payload)
      const message =
        (parsedError.success ? parsedError.data.message : undefined) ?? response.statusText
      throw new QueryError(message, { status: response.status, sql })
    }

    const parsed = statementResponseSchema.safeParse(payload)
    if (!parsed.success) {
      throw new QueryError("Query returned an unexpected result shape", {
        status: response.status,
        sql,
      })
    }
    return rowsFromStatement(parsed.data)
  }
}

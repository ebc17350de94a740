import type { DecodeError } from "./errors"

// ==================== Messages ====================

export type Role = "user" | "assistant"

export interface TextBlock {
  type: "text"
  text: string
}

export interface ToolUseBlock {
  type: "tool_use"
  tool_use: Record<string, unknown>
}

export interface ToolResultsBlock {
  type: "tool_results"
  tool_results: Record<string, unknown>
}

export type ContentBlock = TextBlock | ToolUseBlock | ToolResultsBlock

export interface Message {
  role: Role
  content: ContentBlock[]
}

// ==================== Dates ====================

/** Calendar date as `YYYY-MM-DD`. */
export type CalendarDate = string

/** Inclusive on both ends. */
export interface DateRange {
  start: CalendarDate
  end: CalendarDate
}

// ==================== Agent ====================

export interface AgentClientOptions {
  /** Account base URL, e.g. `https://myorg-myaccount.snowflakecomputing.com`. */
  baseUrl: string
  /** Bearer token sent with every request. */
  token: string
  /** Value for the token-type header; omitted when not set. */
  tokenType?: string
  database: string
  schema: string
  agentName: string
  /** Request timeout in milliseconds. Defaults to 60000. */
  timeout?: number
}

export interface AgentRawResponse {
  status: number
  reason: string
  contentType: string | null
  body: string
}

/** Anything that can carry a message history to the agent and return its raw answer. */
export interface AgentDispatcher {
  run(messages: readonly Message[]): Promise<AgentRawResponse>
}

/** Wire shape of the agent `:run` request body. */
export interface AgentRunRequest {
  messages: Message[]
  tool_choice: { type: "auto" }
}

// ==================== Decoding ====================

export type DecodeResult =
  | { status: "text"; text: string; eventCount: number }
  | { status: "no_text"; eventCount: number; preview: string | null }
  | { status: "malformed"; error: DecodeError }

export interface AskOptions {
  question: string
  pageContext: string
  dataSummary: string
  range: DateRange
}

// ==================== Tables ====================

export type DataCell = string | number | boolean | null

export type DataRow = Record<string, DataCell>

export interface DataTable {
  id: string
  name: string
  columns: string[]
  rows: DataRow[]
  rowCount: number
  description?: string
}

export interface MetricPoint {
  label: string
  value: string
  help?: string
}

export interface ChartPoint {
  label: string
  value: number
}

export interface ChartSeries {
  id: string
  title: string
  kind: "bar" | "pie" | "line"
  points: ChartPoint[]
}

export interface SectionData {
  page: PageId
  title: string
  metrics: MetricPoint[]
  charts: ChartSeries[]
  tables: DataTable[]
  /** Query failure messages keyed by the table or chart they would have filled. */
  failures: Record<string, string>
  /** Shown instead of metrics when the section's main view returned no rows. */
  emptyMessage?: string
  /** Plain-text summary of what is on screen, fed to the agent as context. */
  summary: string
}

export type PageId =
  | "home"
  | "anomalies"
  | "costs"
  | "behavior"
  | "security"
  | "recommendations"
  | "data-activity"

// ==================== Warehouse ====================

export type BindValue = string | number | boolean | null

/** Read-only tabular query interface over the warehouse views. */
export interface QueryService {
  query(sql: string, binds?: readonly BindValue[]): Promise<DataRow[]>
}

export interface SqlClientOptions {
  baseUrl: string
  token: string
  tokenType?: string
  warehouse?: string
  role?: string
  database?: string
  schema?: string
  /** Request timeout in milliseconds. Defaults to 60000. */
  timeout?: number
}

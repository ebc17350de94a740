/**
 * @file behavior-intel SDK
 * @description Conversation engine for the warehouse agent, its response
 * decoder, and the query pipeline behind the dashboard sections.
 *
 * @example
 * ```typescript
 * import { AgentClient, ConversationSession, SnowflakeSqlClient, loadSection } from "@behavior-intel/sdk"
 *
 * const query = new SnowflakeSqlClient({ baseUrl, token })
 * const section = await loadSection("costs", { query, range, database: "ANALYTICS", schema: "USER_BEHAVIOR" })
 *
 * const session = new ConversationSession(new AgentClient({ baseUrl, token, database, schema, agentName }))
 * const result = await session.ask({
 *   question: "Which warehouse is driving spend?",
 *   pageContext: "Cost Analysis",
 *   dataSummary: section.summary,
 *   range,
 * })
 * ```
 */

export {
  AgentClient,
  agentRunPath,
  AGENT_ACCEPT_HEADER,
  DEFAULT_AGENT_TIMEOUT,
  TOKEN_TYPE_HEADER,
} from "./agent-client"

export { ConversationSession } from "./conversation"
export { ConversationHistory, messageText } from "./history"
export { injectContext, validateNonEmpty, type ContextInput } from "./context"

export { decodeAgentResponse } from "./decoder"
export { applyEvent, classifyEvent, EVENT_TAGS, type AgentEvent } from "./events"
export { frameEvents, parseEventStream, STREAM_TERMINATOR, type FramedEvents } from "./sse"

export {
  AgentHttpError,
  BehaviorIntelError,
  BODY_EXCERPT_LIMIT,
  DecodeError,
  QueryError,
  ValidationError,
} from "./errors"

export {
  getLogger,
  setLogger,
  configureProductionLogging,
  ConsoleLogger,
  JSONLogger,
  LogLevel,
  type LogEntry,
  type ILogger,
} from "./logger"

export {
  clampDate,
  dayCount,
  formatCompactDate,
  formatLongDate,
  formatShortDate,
  parseCalendarDate,
  resolveDateRange,
  REVERSED_RANGE_WARNING,
} from "./date-range"

export {
  SnowflakeSqlClient,
  convertCell,
  rowsFromStatement,
  DEFAULT_QUERY_TIMEOUT,
  STATEMENTS_PATH,
} from "./warehouse"

export {
  SECTIONS,
  CREDIT_PRICE_USD,
  formatNumber,
  formatUsd,
  getSection,
  isPageId,
  loadSection,
  qualifiedView,
  type SectionContext,
  type SectionDefinition,
} from "./sections"

export {
  countWhere,
  distinctCount,
  groupSum,
  largestRows,
  mean,
  numberValue,
  sum,
  textValue,
  topN,
  valueCounts,
} from "./aggregate"

export { filterRows, formatCell, toCsv, toDataTable } from "./table"

export {
  generateReport,
  isReportSection,
  reportFileName,
  REPORT_SECTIONS,
  type ReportOptions,
  type ReportSection,
} from "./report"

export type {
  AgentClientOptions,
  AgentDispatcher,
  AgentRawResponse,
  AgentRunRequest,
  AskOptions,
  BindValue,
  CalendarDate,
  ChartPoint,
  ChartSeries,
  ContentBlock,
  DataCell,
  DataRow,
  DataTable,
  DateRange,
  DecodeResult,
  Message,
  MetricPoint,
  PageId,
  QueryService,
  Role,
  SectionData,
  SqlClientOptions,
  TextBlock,
  ToolResultsBlock,
  ToolUseBlock,
} from "./types"

/**
 * Dashboard sections.
 *
 * Each section reads one or two precomputed views for the active date
 * range, derives a handful of on-screen metrics and chart series, and
 * writes the plain-text summary that accompanies chat questions asked on
 * that page. The views themselves are maintained upstream; nothing here
 * recomputes their analytics.
 */

import {
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
import { QueryError, ValidationError } from "./errors"
import { toDataTable } from "./table"
import type {
  BindValue,
  ChartSeries,
  DataRow,
  DataTable,
  DateRange,
  MetricPoint,
  PageId,
  QueryService,
  SectionData,
} from "./types"

/** Estimated USD price of one warehouse credit. */
export const CREDIT_PRICE_USD = 2

/** Detail rows read for the behavioral pattern page, newest first. */
export const PATTERN_ROW_LIMIT = 1000

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_$]*$/

export interface SectionContext {
  query: QueryService
  range: DateRange
  database: string
  schema: string
}

export interface SectionDefinition {
  id: PageId
  title: string
  /** Page label handed to the agent as context. */
  pageContext: string
  load(ctx: SectionContext): Promise<SectionData>
}

export function qualifiedView(ctx: SectionContext, view: string): string {
  for (const [field, value] of [
    ["database", ctx.database],
    ["schema", ctx.schema],
    ["view", view],
  ] as const) {
    if (!IDENTIFIER.test(value)) {
      throw new ValidationError(field, `'${value}' is not a plain SQL identifier`)
    }
  }
  return `${ctx.database}.${ctx.schema}.${view}`
}

export function formatNumber(value: number, fractionDigits = 0): string {
  return value.toLocaleString("en-US", {
    minimumFractionDigits: fractionDigits,
    maximumFractionDigits: fractionDigits,
  })
}

export function formatUsd(value: number): string {
  return `$${formatNumber(value, 2)}`
}

/**
 * Collects query failures per table so one broken view leaves the rest of
 * the section intact.
 */
class SectionLoader {
  readonly failures: Record<string, string> = {}

  constructor(readonly ctx: SectionContext) {}

  view(name: string): string {
    return qualifiedView(this.ctx, name)
  }

  get dates(): BindValue[] {
    return [this.ctx.range.start, this.ctx.range.end]
  }

  async rows(key: string, sql: string, binds: BindValue[] = this.dates): Promise<DataRow[]> {
    try {
      return await this.ctx.query.query(sql, binds)
    } catch (e) {
      if (e instanceof QueryError) {
        this.failures[key] = e.message
        return []
      }
      throw e
    }
  }

  async count(key: string, sql: string, binds?: BindValue[]): Promise<number> {
    const rows = await this.rows(key, sql, binds)
    return numberValue(rows[0]?.CNT) ?? 0
  }
}

function series(
  id: string,
  title: string,
  kind: ChartSeries["kind"],
  points: ChartSeries["points"],
): ChartSeries {
  return { id, title, kind, points }
}

function summaryBlock(heading: string, lines: string[]): string {
  return [heading, ...lines.map((line) => `- ${line}`)].join("\n")
}

function mostCommon(rows: DataRow[], column: string): string {
  return valueCounts(rows, column)[0]?.label ?? "N/A"
}

// ==================== Home ====================

const home: SectionDefinition = {
  id: "home",
  title: "Behavior Intelligence Dashboard",
  pageContext: "Home Dashboard",
  async load(ctx) {
    const s = new SectionLoader(ctx)
    const anomalies = s.view("VW_ANOMALY_ATTRIBUTION")
    const costs = s.view("VW_COST_ATTRIBUTION")
    const security = s.view("VW_SECURITY_COMPLIANCE")
    const recs = s.view("VW_CONTEXTUAL_RECOMMENDATIONS")

    const anomalyCount = await s.count(
      "anomalies",
      `SELECT COUNT(*) AS CNT FROM ${anomalies} WHERE ANOMALY_DATE BETWEEN ? AND ?`,
    )
    const highPriority = await s.count(
      "recommendations",
      `SELECT COUNT(*) AS CNT FROM ${recs} WHERE PRIORITY = ? AND EVENT_DATE BETWEEN ? AND ?`,
      ["High Priority", ...s.dates],
    )
    const costRows = await s.rows(
      "cost",
      `SELECT SUM(TOTAL_DAILY_CREDITS) * ? AS TOTAL_COST FROM ${costs} WHERE COST_DATE BETWEEN ? AND ?`,
      [CREDIT_PRICE_USD, ...s.dates],
    )
    const totalCost = numberValue(costRows[0]?.TOTAL_COST) ?? 0
    const securityIssues = await s.count(
      "security",
      `SELECT COUNT(*) AS CNT FROM ${security} WHERE SECURITY_RISK_LEVEL <> ? AND LOGIN_DATE BETWEEN ? AND ?`,
      ["Low Risk", ...s.dates],
    )

    const topCost = await s.rows(
      "top-cost",
      `SELECT USER_NAME, ROLE_NAME, SUM(TOTAL_DAILY_CREDITS) AS TOTAL_CREDITS, SUM(DAILY_QUERY_COUNT) AS TOTAL_QUERIES
       FROM ${costs}
       WHERE COST_DATE BETWEEN ? AND ?
       GROUP BY USER_NAME, ROLE_NAME
       ORDER BY TOTAL_CREDITS DESC
       LIMIT 10`,
    )
    const riskRows = await s.rows(
      "security-risk",
      `SELECT SECURITY_RISK_LEVEL, COUNT(*) AS USER_COUNT
       FROM ${security}
       WHERE LOGIN_DATE BETWEEN ? AND ?
       GROUP BY SECURITY_RISK_LEVEL`,
    )
    const recentRecs = await s.rows(
      "recent-recommendations",
      `SELECT EVENT_DATE, RECOMMENDATION_TYPE, USER_NAME, ROLE_NAME, ISSUE_DESCRIPTION, RECOMMENDED_ACTIONS
       FROM ${recs}
       WHERE PRIORITY = ? AND EVENT_DATE BETWEEN ? AND ?
       ORDER BY EVENT_DATE DESC
       LIMIT 5`,
      ["High Priority", ...s.dates],
    )

    const metrics: MetricPoint[] = [
      {
        label: "Active Anomalies",
        value: formatNumber(anomalyCount),
        help: "Users contributing to detected anomalies",
      },
      {
        label: "High Priority Actions",
        value: formatNumber(highPriority),
        help: "Critical recommendations requiring attention",
      },
      {
        label: "Total Cost (USD)",
        value: formatUsd(totalCost),
        help: "Estimated total compute cost",
      },
      {
        label: "Security Issues",
        value: formatNumber(securityIssues),
        help: "Users with medium/high security risk",
      },
    ]

    return {
      page: "home",
      title: home.title,
      metrics,
      charts: [
        series(
          "top-cost",
          "Top Cost Contributors",
          "bar",
          topCost.map((row) => ({
            label: textValue(row.USER_NAME),
            value: numberValue(row.TOTAL_CREDITS) ?? 0,
          })),
        ),
        series(
          "security-risk",
          "Security Risk Distribution",
          "pie",
          riskRows.map((row) => ({
            label: textValue(row.SECURITY_RISK_LEVEL),
            value: numberValue(row.USER_COUNT) ?? 0,
          })),
        ),
      ],
      tables: [
        toDataTable("top-cost", "Top Cost Contributors", topCost),
        toDataTable("recent-recommendations", "Recent High-Priority Recommendations", recentRecs),
      ],
      failures: s.failures,
      summary: summaryBlock("Key Metrics:", [
        `Active Anomalies: ${anomalyCount}`,
        `High Priority Actions: ${highPriority}`,
        `Total Cost: ${formatUsd(totalCost)} USD`,
        `Security Issues: ${securityIssues}`,
      ]),
    }
  },
}

// ==================== Anomalies ====================

const anomalies: SectionDefinition = {
  id: "anomalies",
  title: "Anomaly Attribution Analysis",
  pageContext: "Anomaly Analysis",
  async load(ctx) {
    const s = new SectionLoader(ctx)
    const rows = await s.rows(
      "anomalies",
      `SELECT * FROM ${s.view("VW_ANOMALY_ATTRIBUTION")}
       WHERE ANOMALY_DATE BETWEEN ? AND ?
       ORDER BY ANOMALY_DATE DESC, EXECUTION_TIME_CONTRIBUTION_PCT DESC`,
    )

    const table = toDataTable("anomalies", "Detailed Anomaly Contributors", rows, [
      "ANOMALY_DATE",
      "USER_NAME",
      "ROLE_NAME",
      "WAREHOUSE_NAME",
      "QUERY_COUNT",
      "EXECUTION_TIME_CONTRIBUTION_PCT",
      "RISK_LEVEL",
      "BEHAVIOR_PATTERN",
      "RECOMMENDED_ACTION",
    ])

    if (rows.length === 0) {
      return {
        page: "anomalies",
        title: anomalies.title,
        metrics: [],
        charts: [],
        tables: [table],
        failures: s.failures,
        emptyMessage: "No anomalies detected!",
        summary: "No anomalies detected in the selected date range.",
      }
    }

    const highRisk = countWhere(rows, (row) => textValue(row.RISK_LEVEL).includes("High Risk"))
    const avgContribution = mean(rows, "EXECUTION_TIME_CONTRIBUTION_PCT") ?? 0
    const topUsers = largestRows(rows, "EXECUTION_TIME_CONTRIBUTION_PCT", 3).map((row) =>
      textValue(row.USER_NAME),
    )

    return {
      page: "anomalies",
      title: anomalies.title,
      metrics: [
        { label: "Total Anomaly Contributors", value: formatNumber(rows.length) },
        { label: "High Risk Contributors", value: formatNumber(highRisk) },
        { label: "Avg Contribution %", value: `${avgContribution.toFixed(1)}%` },
      ],
      charts: [
        series("risk-levels", "Risk Level Distribution", "bar", valueCounts(rows, "RISK_LEVEL")),
        series("behavior-patterns", "Behavior Patterns", "pie", valueCounts(rows, "BEHAVIOR_PATTERN")),
      ],
      tables: [table],
      failures: s.failures,
      summary: summaryBlock("Anomaly Statistics:", [
        `Total Contributors: ${rows.length}`,
        `High Risk Contributors: ${highRisk}`,
        `Average Contribution: ${avgContribution.toFixed(1)}%`,
        `Top 3 Users: ${topUsers.join(", ")}`,
      ]),
    }
  },
}

// ==================== Costs ====================

const costs: SectionDefinition = {
  id: "costs",
  title: "Cost Attribution Analysis",
  pageContext: "Cost Analysis",
  async load(ctx) {
    const s = new SectionLoader(ctx)
    const rows = await s.rows(
      "costs",
      `SELECT * FROM ${s.view("VW_COST_ATTRIBUTION")}
       WHERE COST_DATE BETWEEN ? AND ?
       ORDER BY COST_DATE DESC, TOTAL_DAILY_CREDITS DESC`,
    )

    const table = toDataTable("costs", "Detailed Cost Breakdown", rows, [
      "COST_DATE",
      "USER_NAME",
      "ROLE_NAME",
      "WAREHOUSE_NAME",
      "TOTAL_DAILY_CREDITS",
      "DAILY_QUERY_COUNT",
      "AVG_QUERY_EXECUTION_TIME",
    ])

    if (rows.length === 0) {
      return {
        page: "costs",
        title: costs.title,
        metrics: [],
        charts: [],
        tables: [table],
        failures: s.failures,
        emptyMessage: "No cost data available for the selected period",
        summary: "No cost data available in the selected date range.",
      }
    }

    const totalCredits = sum(rows, "TOTAL_DAILY_CREDITS")
    const totalQueries = sum(rows, "DAILY_QUERY_COUNT")
    const activeUsers = distinctCount(rows, "USER_NAME")
    const topUsers = topN(groupSum(rows, "USER_NAME", "TOTAL_DAILY_CREDITS"), 10)
    const trend = groupSum(rows, "COST_DATE", "TOTAL_DAILY_CREDITS").sort((a, b) =>
      a.label.localeCompare(b.label),
    )
    const [topUser] = topUsers

    return {
      page: "costs",
      title: costs.title,
      metrics: [
        { label: "Total Credits", value: formatNumber(totalCredits, 2) },
        { label: "Estimated Cost", value: formatUsd(totalCredits * CREDIT_PRICE_USD) },
        { label: "Total Queries", value: formatNumber(totalQueries) },
        { label: "Active Users", value: formatNumber(activeUsers) },
      ],
      charts: [
        series("top-users", "Top 10 Users by Cost", "bar", topUsers),
        series("cost-trend", "Cost Trend Over Time", "line", trend),
      ],
      tables: [table],
      failures: s.failures,
      summary: summaryBlock("Cost Analysis Summary:", [
        `Total Credits: ${formatNumber(totalCredits, 2)}`,
        `Estimated Cost: ${formatUsd(totalCredits * CREDIT_PRICE_USD)}`,
        `Total Queries: ${formatNumber(totalQueries)}`,
        `Active Users: ${activeUsers}`,
        `Top Cost User: ${topUser.label} (${topUser.value.toFixed(2)} credits)`,
      ]),
    }
  },
}

// ==================== Behavioral patterns ====================

const ANOMALOUS_CLASSES = new Set(["Highly Anomalous", "Anomalous"])

const behavior: SectionDefinition = {
  id: "behavior",
  title: "Behavioral Pattern Analysis",
  pageContext: "Behavioral Patterns",
  async load(ctx) {
    const s = new SectionLoader(ctx)
    const rows = await s.rows(
      "patterns",
      `SELECT * FROM ${s.view("VW_BEHAVIORAL_PATTERNS")}
       WHERE ACTIVITY_DATE BETWEEN ? AND ?
       ORDER BY ACTIVITY_DATE DESC, ABS(QUERY_DEVIATION_SCORE) DESC
       LIMIT ${PATTERN_ROW_LIMIT}`,
    )

    const table = toDataTable("patterns", "Detailed Behavioral Patterns", rows, [
      "ACTIVITY_DATE",
      "USER_NAME",
      "ROLE_NAME",
      "ACTIVITY_HOUR",
      "QUERY_COUNT",
      "BEHAVIOR_CLASSIFICATION",
      "PATTERN_TYPE",
      "RISK_LEVEL",
      "RECOMMENDED_ACTION",
    ])

    if (rows.length === 0) {
      return {
        page: "behavior",
        title: behavior.title,
        metrics: [],
        charts: [],
        tables: [table],
        failures: s.failures,
        emptyMessage: "No behavioral patterns detected for the selected period",
        summary: "No behavioral patterns detected in the selected date range.",
      }
    }

    const anomalous = countWhere(rows, (row) =>
      ANOMALOUS_CLASSES.has(textValue(row.BEHAVIOR_CLASSIFICATION)),
    )
    const highRisk = countWhere(rows, (row) => row.RISK_LEVEL === "High Risk")
    const offHours = countWhere(rows, (row) => row.TIME_CLASSIFICATION === "Off Hours")
    const users = distinctCount(rows, "USER_NAME")

    return {
      page: "behavior",
      title: behavior.title,
      metrics: [
        { label: "Anomalous Patterns", value: formatNumber(anomalous) },
        { label: "High Risk Behaviors", value: formatNumber(highRisk) },
        { label: "Off-Hours Activity", value: formatNumber(offHours) },
        { label: "Users with Patterns", value: formatNumber(users) },
      ],
      charts: [
        series(
          "classification",
          "Behavior Classification",
          "pie",
          valueCounts(rows, "BEHAVIOR_CLASSIFICATION"),
        ),
        series("pattern-types", "Pattern Types", "bar", valueCounts(rows, "PATTERN_TYPE").slice(0, 10)),
      ],
      tables: [table],
      failures: s.failures,
      summary: summaryBlock("Behavioral Pattern Summary:", [
        `Anomalous Patterns: ${anomalous}`,
        `High Risk Behaviors: ${highRisk}`,
        `Off-Hours Activity: ${offHours}`,
        `Users with Patterns: ${users}`,
        `Most Common Pattern: ${mostCommon(rows, "PATTERN_TYPE")}`,
      ]),
    }
  },
}

// ==================== Security ====================

const security: SectionDefinition = {
  id: "security",
  title: "Security & Compliance Analysis",
  pageContext: "Security Compliance",
  async load(ctx) {
    const s = new SectionLoader(ctx)
    const rows = await s.rows(
      "security",
      `SELECT * FROM ${s.view("VW_SECURITY_COMPLIANCE")}
       WHERE LOGIN_DATE BETWEEN ? AND ?
       ORDER BY LOGIN_DATE DESC, FAILED_LOGINS DESC`,
    )

    const isHighRisk = (row: DataRow) => textValue(row.SECURITY_RISK_LEVEL).includes("High Risk")
    const table = toDataTable("high-risk-users", "High-Risk Users", rows.filter(isHighRisk), [
      "LOGIN_DATE",
      "USER_NAME",
      "FAILED_LOGINS",
      "MFA_COMPLIANCE_STATUS",
      "PASSWORD_ONLY_LOGINS",
      "SECURITY_RISK_LEVEL",
    ])

    if (rows.length === 0) {
      return {
        page: "security",
        title: security.title,
        metrics: [],
        charts: [],
        tables: [table],
        failures: s.failures,
        emptyMessage: "No security data available for the selected period",
        summary: "No security data available in the selected date range.",
      }
    }

    const highRisk = countWhere(rows, isHighRisk)
    const failedLogins = Math.trunc(sum(rows, "FAILED_LOGINS"))
    const withoutMfa = countWhere(rows, (row) => row.MFA_COMPLIANCE_STATUS !== "MFA Compliant")
    const passwordOnly = countWhere(rows, (row) => (numberValue(row.PASSWORD_ONLY_LOGINS) ?? 0) > 0)
    const failedTrend = groupSum(rows, "LOGIN_DATE", "FAILED_LOGINS").sort((a, b) =>
      a.label.localeCompare(b.label),
    )

    return {
      page: "security",
      title: security.title,
      metrics: [
        { label: "High Risk Users", value: formatNumber(highRisk) },
        { label: "Failed Login Attempts", value: formatNumber(failedLogins) },
        { label: "Users without MFA", value: formatNumber(withoutMfa) },
        { label: "Users with Password-Only Logins", value: formatNumber(passwordOnly) },
      ],
      charts: [
        series("risk-levels", "Security Risk Distribution", "pie", valueCounts(rows, "SECURITY_RISK_LEVEL")),
        series("failed-logins", "Failed Logins Over Time", "line", failedTrend),
      ],
      tables: [table],
      failures: s.failures,
      summary: summaryBlock("Security Summary:", [
        `High Risk Users: ${highRisk}`,
        `Total Failed Login Attempts: ${failedLogins}`,
        `Users without MFA: ${withoutMfa}`,
        `Password Issues: ${passwordOnly}`,
      ]),
    }
  },
}

// ==================== Recommendations ====================

const recommendations: SectionDefinition = {
  id: "recommendations",
  title: "Contextual Recommendations",
  pageContext: "Recommendations",
  async load(ctx) {
    const s = new SectionLoader(ctx)
    const rows = await s.rows(
      "recommendations",
      `SELECT * FROM ${s.view("VW_CONTEXTUAL_RECOMMENDATIONS")}
       WHERE EVENT_DATE BETWEEN ? AND ?
       ORDER BY
         CASE PRIORITY
           WHEN 'High Priority' THEN 1
           WHEN 'Medium Priority' THEN 2
           ELSE 3
         END,
         EVENT_DATE DESC`,
    )

    const table = toDataTable("recommendations", "All Recommendations", rows, [
      "EVENT_DATE",
      "PRIORITY",
      "RECOMMENDATION_TYPE",
      "USER_NAME",
      "ISSUE_DESCRIPTION",
      "RECOMMENDED_ACTIONS",
    ])

    if (rows.length === 0) {
      return {
        page: "recommendations",
        title: recommendations.title,
        metrics: [],
        charts: [],
        tables: [table],
        failures: s.failures,
        emptyMessage: "No recommendations - all systems optimal!",
        summary: "No recommendations in the selected date range.",
      }
    }

    const byPriority = (priority: string) => countWhere(rows, (row) => row.PRIORITY === priority)
    const high = byPriority("High Priority")
    const medium = byPriority("Medium Priority")
    const low = byPriority("Low Priority")

    return {
      page: "recommendations",
      title: recommendations.title,
      metrics: [
        { label: "High Priority", value: formatNumber(high), help: high > 0 ? "Urgent" : undefined },
        { label: "Medium Priority", value: formatNumber(medium) },
        { label: "Low Priority", value: formatNumber(low) },
      ],
      charts: [
        series("types", "Recommendations by Type", "bar", valueCounts(rows, "RECOMMENDATION_TYPE")),
        series("priorities", "Priority Distribution", "pie", valueCounts(rows, "PRIORITY")),
      ],
      tables: [table],
      failures: s.failures,
      summary: summaryBlock("Recommendations Summary:", [
        `High Priority: ${high}`,
        `Medium Priority: ${medium}`,
        `Low Priority: ${low}`,
        `Most Common Type: ${mostCommon(rows, "RECOMMENDATION_TYPE")}`,
      ]),
    }
  },
}

// ==================== Data activity ====================

const dataActivity: SectionDefinition = {
  id: "data-activity",
  title: "Data Activity Tracking",
  pageContext: "Data Activity",
  async load(ctx) {
    const s = new SectionLoader(ctx)
    const consumption = await s.rows(
      "consumption",
      `SELECT * FROM ${s.view("VW_DATA_CONSUMPTION_BY_ROLE")}
       WHERE USAGE_DATE BETWEEN ? AND ?
       ORDER BY GB_DATA_SCANNED DESC
       LIMIT 20`,
    )
    const writes = await s.rows(
      "writes",
      `SELECT * FROM ${s.view("VW_DATA_WRITE_ACTIVITY_BY_ROLE")}
       WHERE ACTIVITY_DATE BETWEEN ? AND ?
       ORDER BY TOTAL_ROWS_INSERTED DESC
       LIMIT 20`,
    )

    const tables: DataTable[] = [
      toDataTable("consumption", "Data Consumption by Role", consumption, [
        "ROLE_NAME",
        "TOTAL_QUERIES",
        "GB_DATA_SCANNED",
        "ACTIVE_USERS",
        "DATABASES_ACCESSED",
      ]),
      toDataTable("writes", "Data Write Activity by Role", writes, [
        "ROLE_NAME",
        "TOTAL_WRITE_QUERIES",
        "TOTAL_ROWS_INSERTED",
        "TOTAL_ROWS_UPDATED",
        "GB_WRITTEN_DAILY",
      ]),
    ]

    const topConsumer = consumption.length > 0 ? textValue(consumption[0].ROLE_NAME) : "N/A"
    const topWriter = writes.length > 0 ? textValue(writes[0].ROLE_NAME) : "N/A"

    return {
      page: "data-activity",
      title: dataActivity.title,
      metrics: [],
      charts: [
        series(
          "consumption",
          "Data Consumption by Role",
          "bar",
          consumption.map((row) => ({
            label: textValue(row.ROLE_NAME),
            value: numberValue(row.GB_DATA_SCANNED) ?? 0,
          })),
        ),
        series(
          "writes",
          "Data Write Activity by Role",
          "bar",
          writes.map((row) => ({
            label: textValue(row.ROLE_NAME),
            value: numberValue(row.TOTAL_ROWS_INSERTED) ?? 0,
          })),
        ),
      ],
      tables,
      failures: s.failures,
      summary: summaryBlock("Data Activity Summary:", [
        `Top Consumer Role: ${topConsumer}`,
        `Total GB Scanned: ${formatNumber(sum(consumption, "GB_DATA_SCANNED"), 2)}`,
        `Top Write Role: ${topWriter}`,
        `Total Rows Inserted: ${formatNumber(sum(writes, "TOTAL_ROWS_INSERTED"))}`,
      ]),
    }
  },
}

export const SECTIONS: readonly SectionDefinition[] = [
  home,
  anomalies,
  costs,
  behavior,
  security,
  recommendations,
  dataActivity,
]

export function isPageId(value: string): value is PageId {
  return SECTIONS.some((section) => section.id === value)
}

export function getSection(page: string): SectionDefinition {
  const section = SECTIONS.find((s) => s.id === page)
  if (!section) {
    throw new ValidationError(
      "page",
      `unknown page '${page}'. Expected one of: ${SECTIONS.map((s) => s.id).join(", ")}`,
    )
  }
  return section
}

export function loadSection(page: string, ctx: SectionContext): Promise<SectionData> {
  return getSection(page).load(ctx)
}

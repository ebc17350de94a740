import { toDataTable, type SectionData } from "@behavior-intel/sdk"
import { InvalidArgumentError } from "commander"
import { describe, expect, test, vi } from "vitest"
import { parseFilter, parsePositiveInt } from "../../src/commands/shared"
import { applyFilters, renderSection } from "../../src/commands/show"
import { sanitizeTerminalOutput } from "../../src/utils/sanitize"

const range = { start: "2025-08-18", end: "2025-08-24" }

function costSection(): SectionData {
  return {
    page: "costs",
    title: "Cost Attribution Analysis",
    metrics: [{ label: "Total Credits", value: "15.50", help: "All warehouses" }],
    charts: [
      {
        id: "top-users",
        title: "Top 10 Users by Cost",
        kind: "bar",
        points: [
          { label: "ALICE", value: 4 },
          { label: "BOB", value: 2 },
        ],
      },
      { id: "cost-trend", title: "Cost Trend Over Time", kind: "line", points: [] },
    ],
    tables: [
      toDataTable("costs", "Detailed Cost Breakdown", [
        { USER_NAME: "ALICE", TOTAL_DAILY_CREDITS: 4 },
        { USER_NAME: "BOB", TOTAL_DAILY_CREDITS: 2 },
        { USER_NAME: "CAROL", TOTAL_DAILY_CREDITS: 1.25 },
      ]),
    ],
    failures: {},
    summary: "",
  }
}

describe("parseFilter", () => {
  test("splits the column from its values", () => {
    expect(parseFilter("USER_NAME=ALICE, BOB")).toEqual([
      { column: "USER_NAME", values: ["ALICE", "BOB"] },
    ])
  })

  test("accumulates repeated filters", () => {
    const first = parseFilter("ROLE_NAME=ANALYST")
    expect(parseFilter("USER_NAME=BOB", first)).toEqual([
      { column: "ROLE_NAME", values: ["ANALYST"] },
      { column: "USER_NAME", values: ["BOB"] },
    ])
  })

  test("rejects malformed filters", () => {
    expect(() => parseFilter("USER_NAME")).toThrow(InvalidArgumentError)
    expect(() => parseFilter("=ALICE")).toThrow(InvalidArgumentError)
    expect(() => parseFilter("USER_NAME=,")).toThrow(InvalidArgumentError)
  })
})

describe("parsePositiveInt", () => {
  test("accepts positive integers only", () => {
    expect(parsePositiveInt("5")).toBe(5)
    expect(() => parsePositiveInt("0")).toThrow(InvalidArgumentError)
    expect(() => parsePositiveInt("2.5")).toThrow(InvalidArgumentError)
  })
})

describe("applyFilters", () => {
  test("filters tables that have the column", () => {
    const data = applyFilters(costSection(), [{ column: "USER_NAME", values: ["BOB", "CAROL"] }])
    expect(data.tables[0].rows.map((row) => row.USER_NAME)).toEqual(["BOB", "CAROL"])
    expect(data.tables[0].rowCount).toBe(2)
  })

  test("warns about a column no table has", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {})
    const data = applyFilters(costSection(), [{ column: "REGION", values: ["EU"] }])

    expect(data.tables[0].rowCount).toBe(3)
    expect(sanitizeTerminalOutput(String(spy.mock.calls[0][0]))).toBe(
      "⚠ No table on this page has a column named REGION",
    )
  })
})

describe("renderSection", () => {
  test("prints header, metrics, charts and a capped table", () => {
    const lines = renderSection(costSection(), range, 2).map(sanitizeTerminalOutput)

    expect(lines.slice(0, 5)).toEqual([
      "Cost Attribution Analysis",
      "Aug 18, 2025 to Aug 24, 2025 (7 days)",
      "",
      "Total Credits: 15.50 (All warehouses)",
      "",
    ])
    expect(lines).toContain("Top 10 Users by Cost")
    expect(lines).not.toContain("Cost Trend Over Time")

    const tableIndex = lines.indexOf("Detailed Cost Breakdown")
    const table = lines[tableIndex + 1]
    expect(table).toContain("ALICE")
    expect(table).toContain("BOB")
    expect(table).not.toContain("CAROL")
    expect(lines[tableIndex + 2]).toBe("Showing 2 of 3 rows")
  })

  test("shows the empty message and notes empty tables", () => {
    const data: SectionData = {
      ...costSection(),
      metrics: [],
      charts: [],
      tables: [toDataTable("costs", "Detailed Cost Breakdown", [], ["USER_NAME"])],
      emptyMessage: "No cost data available for the selected period",
    }

    const lines = renderSection(data, range, 20).map(sanitizeTerminalOutput)

    expect(lines).toEqual([
      "Cost Attribution Analysis",
      "Aug 18, 2025 to Aug 24, 2025 (7 days)",
      "",
      "No cost data available for the selected period",
      "",
      "Detailed Cost Breakdown",
      "No rows for this period.",
      "",
    ])
  })
})

import { describe, expect, test } from "vitest"
import {
  REVERSED_RANGE_WARNING,
  clampDate,
  dayCount,
  epochDaysToDate,
  formatCompactDate,
  formatLongDate,
  formatShortDate,
  parseCalendarDate,
  resolveDateRange,
} from "../src/date-range"
import { ValidationError } from "../src/errors"

const window = { start: "2025-08-18", end: "2025-09-18" }

describe("parseCalendarDate", () => {
  test("accepts valid dates", () => {
    expect(parseCalendarDate("2025-08-20")).toBe("2025-08-20")
    expect(parseCalendarDate(" 2024-02-29 ")).toBe("2024-02-29")
  })

  test("rejects impossible or badly shaped dates", () => {
    expect(() => parseCalendarDate("2025-02-30", "start")).toThrow(
      "Validation failed for field 'start': '2025-02-30' is not a valid YYYY-MM-DD date",
    )
    expect(() => parseCalendarDate("08/20/2025")).toThrow(ValidationError)
    expect(() => parseCalendarDate("2025-8-20")).toThrow(ValidationError)
  })
})

describe("dayCount", () => {
  test("counts both ends", () => {
    expect(dayCount(window)).toBe(32)
    expect(dayCount({ start: "2024-02-28", end: "2024-03-01" })).toBe(3)
  })
})

describe("resolveDateRange", () => {
  test("defaults to the full window", () => {
    expect(resolveDateRange({}, window)).toEqual({ range: window })
  })

  test("clamps into the window", () => {
    expect(resolveDateRange({ start: "2025-01-01", end: "2025-08-25" }, window)).toEqual({
      range: { start: "2025-08-18", end: "2025-08-25" },
    })
    expect(clampDate("2026-01-01", window)).toBe("2025-09-18")
  })

  test("a reversed range falls back to the window with a warning", () => {
    expect(resolveDateRange({ start: "2025-09-01", end: "2025-08-20" }, window)).toEqual({
      range: window,
      warning: REVERSED_RANGE_WARNING,
    })
  })

  test("a single day is a valid range", () => {
    expect(resolveDateRange({ start: "2025-08-30", end: "2025-08-30" }, window)).toEqual({
      range: { start: "2025-08-30", end: "2025-08-30" },
    })
  })
})

describe("formatting", () => {
  test("long, short and compact forms", () => {
    expect(formatLongDate("2025-08-05")).toBe("Aug 05, 2025")
    expect(formatShortDate("2025-08-05")).toBe("Aug 05")
    expect(formatCompactDate("2025-08-05")).toBe("20250805")
  })

  test("epoch days", () => {
    expect(epochDaysToDate(0)).toBe("1970-01-01")
    expect(epochDaysToDate(20318)).toBe("2025-08-18")
  })
})

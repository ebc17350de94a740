import { afterEach, describe, expect, test, vi } from "vitest"
import { ConsoleLogger, JSONLogger, LogLevel, getLogger, setLogger } from "../src/logger"

describe("logger", () => {
  const original = getLogger()

  afterEach(() => {
    setLogger(original)
  })

  test("writes to stderr at or above the level", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {})
    const logger = new ConsoleLogger()
    logger.setLevel(LogLevel.WARN)

    logger.info("hidden")
    logger.warn("shown")

    expect(spy).toHaveBeenCalledTimes(1)
    expect(spy.mock.calls[0][1]).toBe("shown")
  })

  test("JSON entries carry the error", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {})
    const logger = new JSONLogger()
    logger.setLevel(LogLevel.DEBUG)

    logger.error("query failed", new Error("boom"), { view: "VW_COST_ATTRIBUTION" })

    const line = spy.mock.calls[0][0]
    expect(typeof line).toBe("string")
    const entry = typeof line === "string" ? JSON.parse(line) : null
    expect(entry.level).toBe("ERROR")
    expect(entry.message).toBe("query failed")
    expect(entry.context).toEqual({ view: "VW_COST_ATTRIBUTION" })
    expect(entry.error.message).toBe("boom")
  })

  test("SILENT drops everything", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {})
    const logger = new ConsoleLogger()
    logger.setLevel(LogLevel.SILENT)
    logger.error("nothing")
    expect(spy).not.toHaveBeenCalled()
  })

  test("setLogger swaps the global instance", () => {
    const replacement = new JSONLogger()
    setLogger(replacement)
    expect(getLogger()).toBe(replacement)
  })
})

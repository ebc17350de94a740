import { describe, expect, test } from "vitest"
import {
  AgentHttpError,
  BehaviorIntelError,
  DecodeError,
  QueryError,
  ValidationError,
} from "../src/errors"

describe("errors", () => {
  test("all errors share the base class", () => {
    for (const error of [
      new AgentHttpError(500, "Internal Server Error"),
      new DecodeError("bad"),
      new QueryError("bad"),
      new ValidationError("field", "bad"),
    ]) {
      expect(error).toBeInstanceOf(BehaviorIntelError)
      expect(error).toBeInstanceOf(Error)
    }
  })

  test("AgentHttpError formats status and body", () => {
    const error = new AgentHttpError(401, "Unauthorized", '{"message":"token expired"}')
    expect(error.name).toBe("AgentHttpError")
    expect(error.message).toBe(
      'Agent HTTP 401 - Status: 401, Reason: Unauthorized, Content: {"message":"token expired"}',
    )
  })

  test("AgentHttpError without a status describes the failure", () => {
    const error = new AgentHttpError(0, "Request timed out after 60000ms")
    expect(error.message).toBe("Agent request failed: Request timed out after 60000ms")
    expect(error.bodyExcerpt).toBe("")
  })

  test("excerpts are capped at 500 characters", () => {
    expect(new DecodeError("bad", "x".repeat(501)).bodyExcerpt).toHaveLength(500)
    expect(new AgentHttpError(500, "err", "y".repeat(1000)).bodyExcerpt).toHaveLength(500)
  })

  test("QueryError defaults", () => {
    const error = new QueryError("boom")
    expect(error.status).toBe(0)
    expect(error.sql).toBeUndefined()
  })

  test("ValidationError keeps its field", () => {
    const error = new ValidationError("start", "not a date")
    expect(error.field).toBe("start")
    expect(error.reason).toBe("not a date")
    expect(error.message).toBe("Validation failed for field 'start': not a date")
  })
})

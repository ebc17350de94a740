import { describe, expect, test } from "vitest"
import { frameEvents, parseEventStream } from "../src/sse"

describe("parseEventStream", () => {
  test("keeps data records in order", () => {
    const raw = 'data: {"n":1}\n\ndata: {"n":2}\n\n'
    expect(parseEventStream(raw)).toEqual([{ n: 1 }, { n: 2 }])
  })

  test("drops the terminator and empty payloads", () => {
    const raw = 'data: {"n":1}\n\ndata:   \n\ndata: [DONE]\n\n'
    expect(parseEventStream(raw)).toEqual([{ n: 1 }])
  })

  test("skips blocks without the data prefix", () => {
    const raw = 'event: message\n\n: comment\n\ndata: {"n":3}\n\n'
    expect(parseEventStream(raw)).toEqual([{ n: 3 }])
  })

  test("a bad block does not cost the ones after it", () => {
    const raw = 'data: {"n":\n\ndata: {"n":4}\n\n'
    expect(parseEventStream(raw)).toEqual([{ n: 4 }])
  })

  test("accepts payloads without a space after the prefix", () => {
    expect(parseEventStream('data:{"n":5}')).toEqual([{ n: 5 }])
  })

  test("normalizes CRLF separators", () => {
    expect(parseEventStream('data: {"n":1}\r\n\r\ndata: {"n":2}')).toEqual([{ n: 1 }, { n: 2 }])
  })
})

describe("frameEvents", () => {
  test("reports SSE framing when records were found", () => {
    expect(frameEvents('data: {"n":1}\n\n')).toEqual({ ok: true, framing: "sse", events: [{ n: 1 }] })
  })

  test("reads a JSON array as the event list", () => {
    expect(frameEvents('[{"n":1},{"n":2}]')).toEqual({
      ok: true,
      framing: "json",
      events: [{ n: 1 }, { n: 2 }],
    })
  })

  test("wraps any other JSON value as one event", () => {
    expect(frameEvents('{"n":1}')).toEqual({ ok: true, framing: "json", events: [{ n: 1 }] })
    expect(frameEvents('"plain"')).toEqual({ ok: true, framing: "json", events: ["plain"] })
  })

  test("fails when the body is neither", () => {
    const framed = frameEvents("not json at all")
    expect(framed.ok).toBe(false)
    if (!framed.ok) {
      expect(framed.error.message).toBe("Failed to parse response content")
      expect(framed.error.bodyExcerpt).toBe("not json at all")
    }
  })

  test("a body holding only the terminator is not valid JSON", () => {
    expect(frameEvents("data: [DONE]\n\n").ok).toBe(false)
  })
})

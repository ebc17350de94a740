import { describe, expect, test } from "vitest"
import { decodeAgentResponse } from "../src/decoder"
import { DecodeError } from "../src/errors"
import { messageDelta, sseBody, textDelta, textSnapshot } from "./helpers"

function decodedText(raw: string): string | null {
  const result = decodeAgentResponse(raw)
  return result.status === "text" ? result.text : null
}

describe("decodeAgentResponse", () => {
  test("accumulates deltas across event generations", () => {
    const body = sseBody([
      textDelta("Hel"),
      textDelta("lo"),
      messageDelta([{ type: "text", text: " wor" }]),
      { choices: [{ delta: { content: "ld" } }] },
    ])

    expect(decodeAgentResponse(body)).toEqual({
      status: "text",
      text: "Hello world",
      eventCount: 4,
    })
  })

  test("ignores noise blocks between valid records", () => {
    const events = [textDelta("Top "), textDelta("users"), textDelta(" ranked")]
    const clean = sseBody(events)
    const noisy = [
      "event: ping\n\n",
      `data: ${JSON.stringify(events[0])}\n\n`,
      "data: {not json\n\n",
      ": keep-alive\n\n",
      `data: ${JSON.stringify(events[1])}\n\n`,
      "garbage line\n\n",
      "data:\n\n",
      `data: ${JSON.stringify(events[2])}\n\n`,
    ].join("")

    expect(decodedText(noisy)).toBe("Top users ranked")
    expect(decodedText(noisy)).toBe(decodedText(clean))
  })

  test("a complete text event replaces earlier deltas", () => {
    const body = sseBody([textDelta("Hel"), textDelta("lo"), textSnapshot("Goodbye")])
    expect(decodedText(body)).toBe("Goodbye")
  })

  test("deltas after a snapshot append to it", () => {
    const body = sseBody([textSnapshot("Hello"), textDelta("!")])
    expect(decodedText(body)).toBe("Hello!")
  })

  test("an empty complete text does not clear the answer", () => {
    const body = sseBody([textDelta("abc"), textSnapshot("")])
    expect(decodedText(body)).toBe("abc")
  })

  test("response events replace with the last text item", () => {
    const body = sseBody([
      textDelta("draft"),
      {
        event: "response",
        data: {
          content: [
            { type: "text", text: "first" },
            { type: "tool_use", tool_use: { name: "sql" } },
            { type: "text", text: "final answer" },
          ],
        },
      },
    ])
    expect(decodedText(body)).toBe("final answer")
  })

  test("a bare JSON array decodes like the same events framed as SSE", () => {
    const events = [
      textDelta("Cost "),
      messageDelta([{ type: "text", text: "is up" }]),
      textDelta(" 12%"),
    ]

    const framed = decodeAgentResponse(sseBody(events))
    const bare = decodeAgentResponse(JSON.stringify(events))

    expect(bare).toEqual(framed)
    expect(bare).toEqual({ status: "text", text: "Cost is up 12%", eventCount: 3 })
  })

  test("a bare JSON object is treated as a single event", () => {
    const body = JSON.stringify({ choices: [{ message: {}, content: "single" }] })
    expect(decodeAgentResponse(body)).toEqual({ status: "text", text: "single", eventCount: 1 })
  })

  test("garbage is malformed, not empty", () => {
    const result = decodeAgentResponse("<html>Bad gateway</html>")
    expect(result.status).toBe("malformed")
    if (result.status === "malformed") {
      expect(result.error).toBeInstanceOf(DecodeError)
      expect(result.error.message).toBe("Failed to parse response content")
      expect(result.error.bodyExcerpt).toBe("<html>Bad gateway</html>")
    }
  })

  test("SSE blocks that all fail to parse fall through to malformed", () => {
    const result = decodeAgentResponse("data: {bad\n\ndata: also bad\n\n")
    expect(result.status).toBe("malformed")
  })

  test("valid events without text yield no_text with a preview", () => {
    const body = sseBody([
      { event: "status", data: { message: "thinking" } },
      { event: "response.tool_use", data: { name: "sql" } },
    ])

    expect(decodeAgentResponse(body)).toEqual({
      status: "no_text",
      eventCount: 2,
      preview: '{"event":"status","data":{"message":"thinking"}}',
    })
  })

  test("the preview is capped at 200 characters", () => {
    const body = sseBody([{ event: "status", data: { message: "x".repeat(400) } }])
    const result = decodeAgentResponse(body)
    expect(result.status).toBe("no_text")
    if (result.status === "no_text") {
      expect(result.preview).toHaveLength(200)
    }
  })

  test("an empty JSON array yields no_text without a preview", () => {
    expect(decodeAgentResponse("[]")).toEqual({ status: "no_text", eventCount: 0, preview: null })
  })

  test("the terminator contributes nothing and costs no other block", () => {
    const events = [textDelta("Done "), textDelta("here")]
    const withTerminator = `${sseBody(events)}data: [DONE]\n\n`
    const terminatorFirst = `data: [DONE]\n\n${sseBody(events)}`

    expect(decodedText(withTerminator)).toBe("Done here")
    expect(decodedText(terminatorFirst)).toBe("Done here")
  })

  test("tool items in message deltas never reach the text", () => {
    const body = sseBody([
      messageDelta([
        { type: "text", text: "Checking " },
        { type: "tool_use", tool_use: { name: "cortex_analyst", input: { query: "text" } } },
        { type: "tool_results", tool_results: { content: [{ type: "text", text: "42 rows" }] } },
        { type: "text", text: "the views." },
      ]),
    ])
    expect(decodedText(body)).toBe("Checking the views.")
  })

  test("non-object events are skipped", () => {
    const body = JSON.stringify([1, "text", null, [textDelta("nested")], textDelta("ok")])
    expect(decodeAgentResponse(body)).toEqual({ status: "text", text: "ok", eventCount: 5 })
  })

  test("CRLF record separators are honoured", () => {
    const body = `data: ${JSON.stringify(textDelta("a"))}\r\n\r\ndata: ${JSON.stringify(textDelta("b"))}\r\n\r\n`
    expect(decodedText(body)).toBe("ab")
  })
})

import { applyEvent, classifyEvent } from "./events"
import { frameEvents } from "./sse"
import type { DecodeResult } from "./types"

const PREVIEW_LENGTH = 200

function previewOf(event: unknown): string {
  const text = typeof event === "string" ? event : JSON.stringify(event)
  return text.slice(0, PREVIEW_LENGTH)
}

/**
 * Reduces a raw agent response body to the answer text.
 *
 * Never throws. A body that is neither SSE nor JSON yields `malformed`; a
 * body that parses but carries no text yields `no_text` together with the
 * event count and a preview of the first event.
 */
export function decodeAgentResponse(raw: string): DecodeResult {
  const framed = frameEvents(raw)
  if (!framed.ok) {
    return { status: "malformed", error: framed.error }
  }

  let answer = ""
  for (const payload of framed.events) {
    answer = applyEvent(answer, classifyEvent(payload))
  }

  const eventCount = framed.events.length
  if (answer) {
    return { status: "text", text: answer, eventCount }
  }
  return {
    status: "no_text",
    eventCount,
    preview: eventCount > 0 ? previewOf(framed.events[0]) : null,
  }
}

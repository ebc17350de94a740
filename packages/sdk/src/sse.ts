/**
 * Framing for agent response bodies.
 *
 * The agent endpoint answers either with Server-Sent Events (one
 * `data: <json>` record per blank-line separated block) or, on some
 * deployments, with a plain JSON document. Both are reduced to an ordered
 * list of parsed event payloads here; what the payloads mean is decided in
 * `./events`.
 */

import { DecodeError } from "./errors"

/** Payload that marks the end of the stream rather than carrying content. */
export const STREAM_TERMINATOR = "[DONE]"

const DATA_PREFIX = "data:"

export type FramedEvents =
  | { ok: true; framing: "sse" | "json"; events: unknown[] }
  | { ok: false; error: DecodeError }

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) }
  } catch {
    return { ok: false }
  }
}

/**
 * Splits an SSE body into parsed `data:` payloads.
 *
 * Blocks without the `data:` prefix, empty payloads, the terminator and
 * payloads that are not valid JSON are dropped one by one; a bad block never
 * costs the blocks after it.
 */
export function parseEventStream(raw: string): unknown[] {
  const events: unknown[] = []

  for (const chunk of raw.replace(/\r\n/g, "\n").split("\n\n")) {
    if (!chunk.startsWith(DATA_PREFIX)) continue

    const payload = chunk.slice(DATA_PREFIX.length).trim()
    if (!payload || payload === STREAM_TERMINATOR) continue

    const parsed = tryParseJson(payload)
    if (parsed.ok) events.push(parsed.value)
  }

  return events
}

/**
 * Produces the event list for a raw body: SSE records when there are any,
 * otherwise the whole body read as one JSON document (an array is taken as
 * the list itself, any other value as a single event).
 */
export function frameEvents(raw: string): FramedEvents {
  const events = parseEventStream(raw)
  if (events.length > 0) {
    return { ok: true, framing: "sse", events }
  }

  const parsed = tryParseJson(raw)
  if (!parsed.ok) {
    return {
      ok: false,
      error: new DecodeError("Failed to parse response content", raw),
    }
  }

  return {
    ok: true,
    framing: "json",
    events: Array.isArray(parsed.value) ? parsed.value : [parsed.value],
  }
}

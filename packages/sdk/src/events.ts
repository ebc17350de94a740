/**
 * Interpretation of agent stream events.
 *
 * Several generations of the agent protocol are live at once and a single
 * stream may mix them. Each payload is classified into one {@link AgentEvent}
 * kind, and each kind either appends to the answer (deltas) or replaces it
 * (snapshots). Unknown shapes are classified as `unrecognized` and leave the
 * answer alone.
 */

export const EVENT_TAGS = {
  textDelta: "response.text.delta",
  text: "response.text",
  messageDelta: "message.delta",
  response: "response",
} as const

export type AgentEvent =
  /** Incremental fragment; appended. */
  | { kind: "text_delta"; text: string | null }
  /** Full text so far; replaces the answer. */
  | { kind: "text_complete"; text: string | null }
  /** Content items of a message delta, text items only; appended in order. */
  | { kind: "message_delta"; fragments: string[] }
  /** Text items of a response snapshot; the last one replaces the answer. */
  | { kind: "response"; snapshots: string[] }
  /** Chat-completions style `choices` and bare `content`; appended in order. */
  | { kind: "legacy_choice"; fragments: string[] }
  | { kind: "unrecognized"; tag: string | null }

type JsonObject = Record<string, unknown>

function isRecord(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/** Non-empty string field, or null. */
function textField(source: unknown, key: string): string | null {
  if (!isRecord(source)) return null
  const value = source[key]
  return typeof value === "string" && value !== "" ? value : null
}

function listField(source: unknown, key: string): unknown[] {
  if (!isRecord(source)) return []
  const value = source[key]
  return Array.isArray(value) ? value : []
}

/** Text of every `{ type: "text" }` item; tool items are dropped. */
function textItems(items: unknown[]): string[] {
  const texts: string[] = []
  for (const item of items) {
    if (!isRecord(item) || item.type !== "text") continue
    const text = textField(item, "text")
    if (text !== null) texts.push(text)
  }
  return texts
}

function legacyFragments(event: JsonObject): string[] {
  const fragments: string[] = []
  const container = "data" in event ? event.data : event

  for (const choice of listField(container, "choices")) {
    if (!isRecord(choice)) continue
    const delta = choice.delta
    if (isRecord(delta) && "content" in delta) {
      const content = textField(delta, "content")
      if (content !== null) fragments.push(content)
    } else if ("content" in choice) {
      const content = textField(choice, "content")
      if (content !== null) fragments.push(content)
    }
  }

  const direct = textField(event, "content")
  if (direct !== null) fragments.push(direct)

  return fragments
}

export function classifyEvent(payload: unknown): AgentEvent {
  if (!isRecord(payload)) {
    return { kind: "unrecognized", tag: null }
  }

  const tag = typeof payload.event === "string" ? payload.event : null
  const data = payload.data

  switch (tag) {
    case EVENT_TAGS.textDelta:
      return { kind: "text_delta", text: textField(data, "text") }
    case EVENT_TAGS.text:
      return { kind: "text_complete", text: textField(data, "text") }
    case EVENT_TAGS.messageDelta: {
      const delta = isRecord(data) ? data.delta : undefined
      return { kind: "message_delta", fragments: textItems(listField(delta, "content")) }
    }
    case EVENT_TAGS.response:
      return { kind: "response", snapshots: textItems(listField(data, "content")) }
    default: {
      const fragments = legacyFragments(payload)
      return fragments.length > 0
        ? { kind: "legacy_choice", fragments }
        : { kind: "unrecognized", tag }
    }
  }
}

/** Folds one event into the answer accumulated so far. */
export function applyEvent(answer: string, event: AgentEvent): string {
  switch (event.kind) {
    case "text_delta":
      return event.text === null ? answer : answer + event.text
    case "text_complete":
      return event.text ?? answer
    case "message_delta":
    case "legacy_choice":
      return answer + event.fragments.join("")
    case "response":
      return event.snapshots.length > 0 ? event.snapshots[event.snapshots.length - 1] : answer
    case "unrecognized":
      return answer
  }
}

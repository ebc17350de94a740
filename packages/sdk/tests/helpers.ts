import { vi } from "vitest"

export type FetchHandler = (url: string, init?: RequestInit) => Response | Promise<Response>

/** Replaces the global fetch for one test; undone by `vi.unstubAllGlobals()`. */
export function mockFetch(handler: FetchHandler) {
  const fn = vi.fn(async (input: string | URL | Request, init?: RequestInit) =>
    handler(String(input), init),
  )
  vi.stubGlobal("fetch", fn)
  return fn
}

export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json" },
  })
}

/** Frames each payload as its own `data:` record. */
export function sseBody(events: unknown[]): string {
  return events.map((e) => `data: ${JSON.stringify(e)}\n\n`).join("")
}

export function textDelta(text: string) {
  return { event: "response.text.delta", data: { text } }
}

export function textSnapshot(text: string) {
  return { event: "response.text", data: { text } }
}

export function messageDelta(content: unknown[]) {
  return { event: "message.delta", data: { delta: { content } } }
}

export function requestBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === "string" ? JSON.parse(init.body) : undefined
}

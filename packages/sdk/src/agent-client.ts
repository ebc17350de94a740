import { AgentHttpError } from "./errors"
import { getLogger } from "./logger"
import type {
  AgentClientOptions,
  AgentDispatcher,
  AgentRawResponse,
  AgentRunRequest,
  Message,
} from "./types"

export const DEFAULT_AGENT_TIMEOUT = 60_000

export const AGENT_ACCEPT_HEADER = "application/json, text/event-stream"

export const TOKEN_TYPE_HEADER = "X-Snowflake-Authorization-Token-Type"

/** `/api/v2/databases/{db}/schemas/{schema}/agents/{name}:run` */
export function agentRunPath(database: string, schema: string, agentName: string): string {
  return `/api/v2/databases/${encodeURIComponent(database)}/schemas/${encodeURIComponent(
    schema,
  )}/agents/${encodeURIComponent(agentName)}:run`
}

/**
 * Posts a conversation to a hosted agent and hands back the raw body.
 *
 * One request per call, no retries. Anything but a 200 becomes an
 * {@link AgentHttpError}; timeouts and network failures do too, with
 * status 0.
 *
 * @example
 * ```ts
 * const client = new AgentClient({
 *   baseUrl: "https://myorg-myaccount.snowflakecomputing.com",
 *   token: process.env.BEHAVIOR_INTEL_TOKEN ?? "",
 *   database: "SNOWFLAKE_INTELLIGENCE",
 *   schema: "AGENTS",
 *   agentName: "BEHAVIOR_AGENT",
 * })
 * const response = await client.run(history.messages)
 * const decoded = decodeAgentResponse(response.body)
 * ```
 */
export class AgentClient implements AgentDispatcher {
  private readonly _baseUrl: string
  private readonly _token: string
  private readonly _tokenType: string | undefined
  private readonly _timeout: number
  readonly endpoint: string

  constructor(options: AgentClientOptions) {
    this._baseUrl = options.baseUrl.replace(/\/+$/, "")
    this._token = options.token
    this._tokenType = options.tokenType
    this._timeout = options.timeout ?? DEFAULT_AGENT_TIMEOUT
    this.endpoint = agentRunPath(options.database, options.schema, options.agentName)
  }

  async run(messages: readonly Message[]): Promise<AgentRawResponse> {
    const body: AgentRunRequest = {
      messages: [...messages],
      tool_choice: { type: "auto" },
    }

    const headers: Record<string, string> = {
      Accept: AGENT_ACCEPT_HEADER,
      "Content-Type": "application/json",
      Authorization: `Bearer ${this._token}`,
    }
    if (this._tokenType) {
      headers[TOKEN_TYPE_HEADER] = this._tokenType
    }

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this._timeout)
    const url = `${this._baseUrl}${this.endpoint}`
    const logger = getLogger()

    logger.debug("Calling agent", { url, messages: messages.length })

    let response: Response
    let text: string
    try {
      response = await fetch(url, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal: controller.signal,
      })
      text = await response.text()
    } catch (e) {
      if (e instanceof Error && e.name === "AbortError") {
        throw new AgentHttpError(0, `Request timed out after ${this._timeout}ms`)
      }
      throw new AgentHttpError(0, "Network request failed")
    } finally {
      clearTimeout(timeoutId)
    }

    if (response.status !== 200) {
      logger.debug("Agent returned an error status", { status: response.status })
      throw new AgentHttpError(response.status, response.statusText, text)
    }

    return {
      status: response.status,
      reason: response.statusText,
      contentType: response.headers.get("Content-Type"),
      body: text,
    }
  }
}

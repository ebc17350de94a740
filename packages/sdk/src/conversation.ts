import { injectContext } from "./context"
import { decodeAgentResponse } from "./decoder"
import { ConversationHistory } from "./history"
import { getLogger, type ILogger } from "./logger"
import type { AgentDispatcher, AskOptions, DecodeResult, Message } from "./types"

/**
 * One user's conversation with the agent.
 *
 * Owns its history; separate sessions never share state. Each
 * {@link ask} appends the context-wrapped question, calls the agent and,
 * when the answer decodes to text, appends the answer. If the call itself
 * fails the question is rolled back before the error propagates, so the
 * history looks exactly as it did before the send.
 *
 * @example
 * ```ts
 * const session = new ConversationSession(agentClient)
 * const result = await session.ask({
 *   question: "Who drove the cost spike?",
 *   pageContext: "Cost Analysis",
 *   dataSummary: section.summary,
 *   range,
 * })
 * if (result.status === "text") console.log(result.text)
 * ```
 */
export class ConversationSession {
  readonly history = new ConversationHistory()

  private readonly _agent: AgentDispatcher
  private readonly _logger: ILogger

  constructor(agent: AgentDispatcher, options: { logger?: ILogger } = {}) {
    this._agent = agent
    this._logger = options.logger ?? getLogger()
  }

  async ask(options: AskOptions): Promise<DecodeResult> {
    const prompt = injectContext(options)
    this.history.appendUser(prompt)

    let body: string
    try {
      const response = await this._agent.run(this.history.messages)
      body = response.body
    } catch (e) {
      this.history.rollbackLast()
      throw e
    }

    const result = decodeAgentResponse(body)
    switch (result.status) {
      case "text":
        this.history.appendAssistant(result.text)
        break
      case "no_text":
        this._logger.debug("No text response received from agent", {
          eventCount: result.eventCount,
          firstEvent: result.preview,
        })
        break
      case "malformed":
        this._logger.debug(result.error.message, { body: result.error.bodyExcerpt })
        break
    }
    return result
  }

  recent(n = 3): Message[] {
    return this.history.recent(n)
  }

  reset(): void {
    this.history.reset()
  }
}

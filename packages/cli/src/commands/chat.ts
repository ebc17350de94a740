import {
  AgentClient,
  AgentHttpError,
  ConversationSession,
  getSection,
  messageText,
  type AskOptions,
  type DecodeResult,
  type Message,
} from "@behavior-intel/sdk"
import { Command } from "commander"
import pc from "picocolors"
import { HISTORY_PREVIEW_LENGTH } from "../config/constants"
import { loadSettings, requireConnection } from "../config/settings"
import { handleError, withErrorHandler } from "../errors"
import { formatDuration, formatRange, truncate } from "../utils/format"
import { log } from "../utils/logger"
import { promptUser } from "../utils/prompt"
import { sanitizeTerminalOutput } from "../utils/sanitize"
import { createSpinner } from "../utils/spinner"
import { resolveRange, sectionContext } from "./shared"

export type ChatInput =
  | { kind: "exit" }
  | { kind: "clear" }
  | { kind: "history" }
  | { kind: "skip" }
  | { kind: "ask"; question: string }

export function parseChatInput(line: string | null): ChatInput {
  if (line === null) return { kind: "exit" }
  const trimmed = line.trim()
  if (!trimmed) return { kind: "skip" }
  switch (trimmed.toLowerCase()) {
    case "exit":
    case "quit":
    case "/exit":
      return { kind: "exit" }
    case "/clear":
      return { kind: "clear" }
    case "/history":
      return { kind: "history" }
    default:
      return { kind: "ask", question: trimmed }
  }
}

/** One line per message: role and a single-line preview of its text. */
export function historyPreview(messages: Message[]): string[] {
  return messages.map((m) => {
    const text = sanitizeTerminalOutput(messageText(m)).replace(/\s+/g, " ").trim()
    const label = m.role === "user" ? "You" : "Agent"
    return `${label}: ${truncate(text, HISTORY_PREVIEW_LENGTH)}`
  })
}

export function printResult(result: DecodeResult, elapsedMs: number): void {
  switch (result.status) {
    case "text":
      console.log(`${pc.bold("Agent>")} ${sanitizeTerminalOutput(result.text)}`)
      log.muted(formatDuration(elapsedMs))
      break
    case "no_text":
      log.warning("No text response received from agent")
      log.hint(`Received ${result.eventCount} events.`)
      if (result.preview) log.hint(`First event: ${sanitizeTerminalOutput(result.preview)}`)
      break
    case "malformed":
      handleError(result.error)
      break
  }
}

async function askOnce(session: ConversationSession, options: AskOptions): Promise<DecodeResult> {
  const spinner = createSpinner({ showElapsed: true })
  const started = performance.now()
  spinner.start("Analyzing your question...")
  try {
    const result = await session.ask(options)
    spinner.stop()
    printResult(result, Math.round(performance.now() - started))
    return result
  } finally {
    spinner.stop()
  }
}

interface ChatOptions {
  start?: string
  end?: string
  message?: string
}

export const chat = new Command("chat")
  .description("Ask the agent about a dashboard page")
  .argument("[page]", "Page the questions are about", "home")
  .option("--start <date>", "First day of the range (YYYY-MM-DD)")
  .option("--end <date>", "Last day of the range (YYYY-MM-DD)")
  .option("-m, --message <text>", "Ask one question and exit")
  .action(
    withErrorHandler(async (page: string, options: ChatOptions) => {
      const section = getSection(page)
      const settings = loadSettings()
      const range = resolveRange(settings, options)
      const connection = requireConnection(settings)

      const spinner = createSpinner()
      spinner.start(`Loading ${section.title}...`)
      let dataSummary: string
      try {
        dataSummary = (await section.load(sectionContext(settings, range))).summary
      } finally {
        spinner.stop()
      }

      const session = new ConversationSession(
        new AgentClient({
          ...connection,
          database: settings.agent.database,
          schema: settings.agent.schema,
          agentName: settings.agent.name,
          timeout: settings.agent.timeoutMs,
        }),
      )
      const ask = (question: string): AskOptions => ({
        question,
        pageContext: section.pageContext,
        dataSummary,
        range,
      })

      if (options.message !== undefined) {
        const result = await askOnce(session, ask(options.message))
        if (result.status !== "text") process.exitCode = 1
        return
      }

      log.info(`${pc.bold(section.pageContext)} ${pc.dim(formatRange(range))}`)
      log.muted("Type /history, /clear or exit.")

      while (true) {
        const input = parseChatInput(await promptUser())
        if (input.kind === "exit") break
        if (input.kind === "skip") continue

        if (input.kind === "clear") {
          session.reset()
          log.success("Conversation cleared.")
          continue
        }

        if (input.kind === "history") {
          const recent = session.recent(3)
          if (recent.length === 0) log.muted("No messages yet.")
          for (const line of historyPreview(recent)) log.info(line)
          continue
        }

        try {
          await askOnce(session, ask(input.question))
        } catch (e) {
          // Failed sends are rolled back, so the conversation can go on.
          if (!(e instanceof AgentHttpError)) throw e
          handleError(e)
        }
      }
    }),
  )

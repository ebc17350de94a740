import {
  AgentHttpError,
  DecodeError,
  getLogger,
  QueryError,
  ValidationError,
} from "@behavior-intel/sdk"
import { truncate } from "./utils/format"
import { log } from "./utils/logger"
import { sanitizeTerminalOutput } from "./utils/sanitize"

/** Missing or invalid local configuration; the hint says how to fix it. */
export class ConfigError extends Error {
  readonly hint: string | undefined

  constructor(message: string, hint?: string) {
    super(message)
    this.name = "ConfigError"
    this.hint = hint
  }
}

export const ERROR_HINTS: Record<number, string> = {
  0: "Check your network connection and the account URL.",
  401: "Run `behavior-intel login` to store a valid access token.",
  403: "Your role lacks access to this object. Check the configured role.",
  404: "Check the agent database, schema and name in behavior-intel.yaml.",
  422: "The statement was rejected. Check the dataset database and schema.",
  429: "Too many requests. Please wait and try again.",
  500: "This is a server issue. Please try again later.",
  502: "The service is temporarily unavailable. Please try again later.",
  503: "The service is temporarily unavailable. Please try again later.",
}

export function isCancellation(e: unknown): boolean {
  return e instanceof Error && (e.name === "AbortError" || e.message === "SIGINT")
}

export function handleError(e: unknown): number {
  if (e instanceof AgentHttpError) {
    log.error(e.message)
    const hint = ERROR_HINTS[e.status]
    if (hint) log.hint(hint)
    return 1
  }

  if (e instanceof QueryError) {
    log.error(`Query failed: ${e.message}`)
    const hint = ERROR_HINTS[e.status]
    if (hint) log.hint(hint)
    return 1
  }

  if (e instanceof DecodeError) {
    log.error(e.message)
    if (e.bodyExcerpt) {
      log.hint(`Response began: ${sanitizeTerminalOutput(truncate(e.bodyExcerpt, 80))}`)
    }
    return 1
  }

  if (e instanceof ValidationError) {
    log.error(e.message)
    return 1
  }

  if (e instanceof ConfigError) {
    log.error(e.message)
    if (e.hint) log.hint(e.hint)
    return 1
  }

  if (isCancellation(e)) {
    console.error()
    return 130
  }

  if (e instanceof Error) {
    getLogger().debug("Unhandled error", { name: e.name, message: e.message, stack: e.stack })
    log.error("An unexpected error occurred. Please try again.")
    return 1
  }

  log.error("An unexpected error occurred. Please try again.")
  return 1
}

/** Wraps a commander action so failures end in a log line and an exit code. */
export function withErrorHandler<A extends unknown[]>(
  fn: (...args: A) => Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args)
    } catch (e) {
      process.exitCode = handleError(e)
    }
  }
}

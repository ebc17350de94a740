/** Longest body excerpt carried by an {@link AgentHttpError}. */
export const BODY_EXCERPT_LIMIT = 500

export class BehaviorIntelError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "BehaviorIntelError"
  }
}

/**
 * The agent endpoint answered with something other than 200, or never
 * answered at all. Status 0 means a timeout or a network failure.
 */
export class AgentHttpError extends BehaviorIntelError {
  readonly status: number
  readonly reason: string
  readonly bodyExcerpt: string

  constructor(status: number, reason: string, body = "") {
    const bodyExcerpt = body.slice(0, BODY_EXCERPT_LIMIT)
    super(
      status === 0
        ? `Agent request failed: ${reason}`
        : `Agent HTTP ${status} - Status: ${status}, Reason: ${reason}, Content: ${bodyExcerpt}`,
    )
    this.name = "AgentHttpError"
    this.status = status
    this.reason = reason
    this.bodyExcerpt = bodyExcerpt
  }
}

/** The agent response could not be read as SSE records nor as plain JSON. */
export class DecodeError extends BehaviorIntelError {
  readonly bodyExcerpt: string

  constructor(message: string, body = "") {
    super(message)
    this.name = "DecodeError"
    this.bodyExcerpt = body.slice(0, BODY_EXCERPT_LIMIT)
  }
}

export class QueryError extends BehaviorIntelError {
  readonly status: number
  readonly sql: string | undefined

  constructor(message: string, options: { status?: number; sql?: string } = {}) {
    super(message)
    this.name = "QueryError"
    this.status = options.status ?? 0
    this.sql = options.sql
  }
}

export class ValidationError extends BehaviorIntelError {
  constructor(
    public readonly field: string,
    public readonly reason: string,
  ) {
    super(`Validation failed for field '${field}': ${reason}`)
    this.name = "ValidationError"
  }
}

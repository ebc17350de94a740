import { dayCount, formatLongDate } from "./date-range"
import { ValidationError } from "./errors"
import type { DateRange } from "./types"

export interface ContextInput {
  question: string
  pageContext: string
  dataSummary: string
  range: DateRange
}

/**
 * Validates a string is not empty
 */
export function validateNonEmpty(value: unknown, fieldName: string): asserts value is string {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError(fieldName, "must be a non-empty string")
  }
}

/**
 * Prefixes a user question with the page the user is looking at, the active
 * date range and the on-screen summary, so the agent answers about the same
 * data the user sees. The question and summary are passed through untouched.
 */
export function injectContext({ question, pageContext, dataSummary, range }: ContextInput): string {
  validateNonEmpty(question, "question")

  return `**Context**: You are viewing the ${pageContext} dashboard page.
**Date Range**: ${formatLongDate(range.start)} to ${formatLongDate(range.end)} (${dayCount(range)} days selected)

**Current Data Summary**:
${dataSummary}

**User Question**: ${question}
`
}

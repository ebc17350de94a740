/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/**
 * Structured log entry
 */
export interface LogEntry {
  timestamp: string
  level: string
  message: string
  context?: Record<string, unknown>
  error?: {
    name: string
    message: string
    stack?: string
  }
}

/**
 * Logger interface
 */
export interface ILogger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, error?: unknown, context?: Record<string, unknown>): void
  setLevel(level: LogLevel): void
}

const DEBUG_NAMESPACE = "behavior-intel:*"

function initialLevel(): LogLevel {
  if (typeof process !== "undefined" && process.env.DEBUG === DEBUG_NAMESPACE) {
    return LogLevel.DEBUG
  }
  return LogLevel.INFO
}

function describeError(error: unknown): LogEntry["error"] | undefined {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack }
  }
  return undefined
}

abstract class BaseLogger implements ILogger {
  protected level: LogLevel = initialLevel()

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) this.write(this.entry("DEBUG", message, context))
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) this.write(this.entry("INFO", message, context))
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) this.write(this.entry("WARN", message, context))
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      this.write(this.entry("ERROR", message, context, describeError(error)))
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level
  }

  protected abstract write(entry: LogEntry): void

  private entry(
    level: string,
    message: string,
    context?: Record<string, unknown>,
    error?: LogEntry["error"],
  ): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      message,
      context,
      error,
    }
  }
}

/**
 * Human-readable logger. Writes to stderr so that stdout stays reserved for
 * agent answers and table output.
 */
export class ConsoleLogger extends BaseLogger {
  protected write(entry: LogEntry): void {
    const parts: unknown[] = [`[${entry.timestamp}] [${entry.level}]`, entry.message]
    if (entry.error) parts.push(`${entry.error.name}: ${entry.error.message}`)
    if (entry.context) parts.push(entry.context)
    console.error(...parts)
  }
}

/**
 * JSON logger for production
 */
export class JSONLogger extends BaseLogger {
  protected write(entry: LogEntry): void {
    console.error(JSON.stringify(entry))
  }
}

// Global logger instance
let globalLogger: ILogger = new ConsoleLogger()

/**
 * Get the global logger
 */
export function getLogger(): ILogger {
  return globalLogger
}

/**
 * Set the global logger
 */
export function setLogger(logger: ILogger): void {
  globalLogger = logger
}

/**
 * Configure logger for production (JSON format)
 */
export function configureProductionLogging(): void {
  setLogger(new JSONLogger())
}

import { existsSync, readFileSync } from "node:fs"
import { join } from "node:path"
import { DEFAULT_AGENT_TIMEOUT, parseCalendarDate, type DateRange } from "@behavior-intel/sdk"
import yaml from "js-yaml"
import { z } from "zod"
import { ConfigError } from "../errors"
import { getCredentials, type Credentials } from "./auth"
import { ENV_PREFIX, SETTINGS_YAML } from "./constants"

export const DEFAULT_WINDOW: DateRange = { start: "2025-08-18", end: "2025-09-18" }

// js-yaml reads unquoted dates as Date objects
const calendarDate = z
  .union([z.string(), z.date()])
  .transform((value) => (typeof value === "string" ? value : value.toISOString().slice(0, 10)))

const identifier = z.string().regex(/^[A-Za-z_][A-Za-z0-9_$]*$/, "must be a plain SQL identifier")

const settingsFileSchema = z
  .object({
    account_url: z.string().url().optional(),
    token_type: z.string().optional(),
    warehouse: z.string().optional(),
    role: z.string().optional(),
    dataset: z
      .object({ database: identifier.optional(), schema: identifier.optional() })
      .strict()
      .optional(),
    agent: z
      .object({
        database: z.string().min(1).optional(),
        schema: z.string().min(1).optional(),
        name: z.string().min(1).optional(),
        timeout_ms: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    window: z.object({ start: calendarDate, end: calendarDate }).strict().optional(),
  })
  .strict()

export type SettingsFile = z.infer<typeof settingsFileSchema>

export interface Settings {
  accountUrl: string | null
  token: string | null
  tokenType: string | undefined
  warehouse: string | undefined
  role: string | undefined
  dataset: { database: string; schema: string }
  agent: { database: string; schema: string; name: string; timeoutMs: number }
  window: DateRange
}

export interface Connection {
  baseUrl: string
  token: string
  tokenType: string | undefined
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ")
}

/** Parses the YAML text of a settings file. */
export function parseSettingsFile(text: string): SettingsFile {
  let raw: unknown
  try {
    raw = yaml.load(text)
  } catch {
    throw new ConfigError(
      `Invalid YAML in ${SETTINGS_YAML}.`,
      "Check your syntax and try again.",
    )
  }
  if (raw === undefined || raw === null) return {}

  const parsed = settingsFileSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${SETTINGS_YAML}: ${describeIssues(parsed.error)}`)
  }
  return parsed.data
}

export function readSettingsFile(dir: string): SettingsFile {
  const path = join(dir, SETTINGS_YAML)
  if (!existsSync(path)) return {}
  return parseSettingsFile(readFileSync(path, "utf-8"))
}

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[`${ENV_PREFIX}${key}`]
  return value && value.trim() !== "" ? value.trim() : undefined
}

function validWindow(window: DateRange): DateRange {
  const start = parseCalendarDate(window.start, "window.start")
  const end = parseCalendarDate(window.end, "window.end")
  if (start > end) {
    throw new ConfigError(`Invalid ${SETTINGS_YAML}: window.start is after window.end`)
  }
  return { start, end }
}

/**
 * Resolves settings from defaults, then the settings file, then the
 * environment, then stored credentials for anything still unset.
 */
export function resolveSettings(
  file: SettingsFile,
  env: NodeJS.ProcessEnv,
  credentials: Credentials | null,
): Settings {
  return {
    accountUrl:
      envValue(env, "ACCOUNT_URL") ?? file.account_url ?? credentials?.accountUrl ?? null,
    token: envValue(env, "TOKEN") ?? credentials?.token ?? null,
    tokenType: envValue(env, "TOKEN_TYPE") ?? file.token_type ?? credentials?.tokenType,
    warehouse: envValue(env, "WAREHOUSE") ?? file.warehouse,
    role: envValue(env, "ROLE") ?? file.role,
    dataset: {
      database: file.dataset?.database ?? "ANALYTICS",
      schema: file.dataset?.schema ?? "USER_BEHAVIOR",
    },
    agent: {
      database: file.agent?.database ?? "SNOWFLAKE_INTELLIGENCE",
      schema: file.agent?.schema ?? "AGENTS",
      name: file.agent?.name ?? "BEHAVIOR_AGENT",
      timeoutMs: file.agent?.timeout_ms ?? DEFAULT_AGENT_TIMEOUT,
    },
    window: validWindow(file.window ?? DEFAULT_WINDOW),
  }
}

export function loadSettings(options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}): Settings {
  return resolveSettings(
    readSettingsFile(options.cwd ?? process.cwd()),
    options.env ?? process.env,
    getCredentials(),
  )
}

export function requireConnection(settings: Settings): Connection {
  if (!settings.accountUrl) {
    throw new ConfigError(
      "No account URL configured.",
      `Set account_url in ${SETTINGS_YAML} or ${ENV_PREFIX}ACCOUNT_URL, or run \`behavior-intel login\`.`,
    )
  }
  if (!settings.token) {
    throw new ConfigError(
      "Not logged in.",
      `Run \`behavior-intel login\` or set ${ENV_PREFIX}TOKEN.`,
    )
  }
  return { baseUrl: settings.accountUrl, token: settings.token, tokenType: settings.tokenType }
}

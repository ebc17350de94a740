import { mkdtempSync, rmSync, writeFileSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, describe, expect, test } from "vitest"
import {
  DEFAULT_WINDOW,
  parseSettingsFile,
  readSettingsFile,
  requireConnection,
  resolveSettings,
} from "../../src/config/settings"
import { ConfigError } from "../../src/errors"

const SAMPLE = `
account_url: https://example-account.test
warehouse: COMPUTE_WH
dataset:
  database: ANALYTICS_DEV
  schema: BEHAVIOR
agent:
  name: TEST_AGENT
  timeout_ms: 30000
window:
  start: 2025-08-01
  end: "2025-08-31"
`

describe("parseSettingsFile", () => {
  test("reads unquoted YAML dates as calendar dates", () => {
    const file = parseSettingsFile(SAMPLE)
    expect(file.window).toEqual({ start: "2025-08-01", end: "2025-08-31" })
    expect(file.agent).toEqual({ name: "TEST_AGENT", timeout_ms: 30000 })
  })

  test("an empty file is an empty config", () => {
    expect(parseSettingsFile("")).toEqual({})
  })

  test("rejects invalid YAML", () => {
    expect(() => parseSettingsFile("dataset: [")).toThrow("Invalid YAML in behavior-intel.yaml.")
  })

  test("rejects unknown keys and bad identifiers", () => {
    expect(() => parseSettingsFile("warehouse_name: WH")).toThrow(ConfigError)
    expect(() => parseSettingsFile("dataset:\n  schema: bad-name")).toThrow(
      "Invalid behavior-intel.yaml: dataset.schema: must be a plain SQL identifier",
    )
  })
})

describe("resolveSettings", () => {
  test("falls back to defaults", () => {
    const settings = resolveSettings({}, {}, null)

    expect(settings).toEqual({
      accountUrl: null,
      token: null,
      tokenType: undefined,
      warehouse: undefined,
      role: undefined,
      dataset: { database: "ANALYTICS", schema: "USER_BEHAVIOR" },
      agent: {
        database: "SNOWFLAKE_INTELLIGENCE",
        schema: "AGENTS",
        name: "BEHAVIOR_AGENT",
        timeoutMs: 60000,
      },
      window: DEFAULT_WINDOW,
    })
  })

  test("environment overrides the file", () => {
    const settings = resolveSettings(
      parseSettingsFile(SAMPLE),
      { BEHAVIOR_INTEL_WAREHOUSE: "ENV_WH", BEHAVIOR_INTEL_ROLE: "ANALYST", BEHAVIOR_INTEL_TOKEN: "test-token" },
      null,
    )

    expect(settings.warehouse).toBe("ENV_WH")
    expect(settings.role).toBe("ANALYST")
    expect(settings.token).toBe("test-token")
    expect(settings.accountUrl).toBe("https://example-account.test")
    expect(settings.dataset).toEqual({ database: "ANALYTICS_DEV", schema: "BEHAVIOR" })
    expect(settings.agent.timeoutMs).toBe(30000)
  })

  test("stored credentials fill what is still unset", () => {
    const creds = { token: "stored-token", accountUrl: "https://stored.test", tokenType: "PROGRAMMATIC_ACCESS_TOKEN" }

    expect(resolveSettings({}, {}, creds)).toMatchObject({
      token: "stored-token",
      accountUrl: "https://stored.test",
      tokenType: "PROGRAMMATIC_ACCESS_TOKEN",
    })
    expect(resolveSettings({}, { BEHAVIOR_INTEL_TOKEN: "env-token" }, creds).token).toBe("env-token")
  })

  test("blank environment values are ignored", () => {
    expect(resolveSettings({ warehouse: "FILE_WH" }, { BEHAVIOR_INTEL_WAREHOUSE: "  " }, null).warehouse).toBe(
      "FILE_WH",
    )
  })

  test("rejects a reversed window", () => {
    expect(() =>
      resolveSettings({ window: { start: "2025-09-01", end: "2025-08-01" } }, {}, null),
    ).toThrow(ConfigError)
  })
})

describe("requireConnection", () => {
  test("needs an account URL and a token", () => {
    const base = resolveSettings({}, {}, null)
    expect(() => requireConnection(base)).toThrow("No account URL configured.")
    expect(() => requireConnection({ ...base, accountUrl: "https://a.test" })).toThrow("Not logged in.")
    expect(
      requireConnection({ ...base, accountUrl: "https://a.test", token: "test-token" }),
    ).toEqual({ baseUrl: "https://a.test", token: "test-token", tokenType: undefined })
  })
})

describe("readSettingsFile", () => {
  let dir = ""

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true })
    dir = ""
  })

  test("reads the file from the directory", () => {
    dir = mkdtempSync(join(tmpdir(), "behavior-intel-settings-"))
    writeFileSync(join(dir, "behavior-intel.yaml"), SAMPLE)
    expect(readSettingsFile(dir).warehouse).toBe("COMPUTE_WH")
  })

  test("a missing file is an empty config", () => {
    dir = mkdtempSync(join(tmpdir(), "behavior-intel-settings-"))
    expect(readSettingsFile(dir)).toEqual({})
  })
})

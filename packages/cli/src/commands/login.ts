import { SnowflakeSqlClient, textValue } from "@behavior-intel/sdk"
import { Command } from "commander"
import { credentialsSchema, getCredentials, saveCredentials, type Credentials } from "../config/auth"
import { loadSettings } from "../config/settings"
import { ConfigError, withErrorHandler } from "../errors"
import { log } from "../utils/logger"
import { confirm, promptUser } from "../utils/prompt"
import { createSpinner } from "../utils/spinner"

interface LoginOptions {
  token?: string
  accountUrl?: string
  tokenType?: string
  verify: boolean
}

async function promptRequired(label: string): Promise<string> {
  const value = (await promptUser(label))?.trim()
  if (!value) throw new ConfigError(`${label.replace(/:\s*$/, "")} is required.`)
  return value
}

async function verify(
  creds: Credentials & { accountUrl: string },
  warehouse?: string,
  role?: string,
): Promise<string> {
  const client = new SnowflakeSqlClient({
    baseUrl: creds.accountUrl,
    token: creds.token,
    tokenType: creds.tokenType,
    warehouse,
    role,
  })
  const spinner = createSpinner()
  spinner.start("Checking access token...")
  try {
    const [row] = await client.query("SELECT CURRENT_USER() AS USER_NAME")
    return textValue(row?.USER_NAME)
  } finally {
    spinner.stop()
  }
}

export const login = new Command("login")
  .description("Store an access token for the warehouse account")
  .option("--token <token>", "Programmatic access token")
  .option("--account-url <url>", "Account URL, e.g. https://myorg-myaccount.snowflakecomputing.com")
  .option("--token-type <type>", "Token type header value, e.g. PROGRAMMATIC_ACCESS_TOKEN")
  .option("--no-verify", "Store the token without running a test query")
  .action(
    withErrorHandler(async (options: LoginOptions) => {
      const settings = loadSettings()

      if (getCredentials() && !options.token) {
        if (!(await confirm("Already logged in. Replace the stored token?"))) return
      }

      const accountUrl =
        options.accountUrl ?? settings.accountUrl ?? (await promptRequired("Account URL: "))
      const token = options.token ?? (await promptRequired("Access token: "))

      const parsed = credentialsSchema.safeParse({
        token,
        accountUrl,
        tokenType: options.tokenType ?? settings.tokenType,
      })
      if (!parsed.success) {
        throw new ConfigError(`Invalid account URL: ${accountUrl}`)
      }
      const creds = { ...parsed.data, accountUrl }

      if (options.verify) {
        const user = await verify(creds, settings.warehouse, settings.role)
        saveCredentials(creds)
        log.success(user ? `Authenticated as ${user}.` : "Authenticated successfully.")
        return
      }

      saveCredentials(creds)
      log.success("Access token saved.")
    }),
  )

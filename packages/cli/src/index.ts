#!/usr/bin/env node
import { Command } from "commander"
import { chat } from "./commands/chat"
import { login } from "./commands/login"
import { logout } from "./commands/logout"
import { pages } from "./commands/pages"
import { report } from "./commands/report"
import { show } from "./commands/show"
import { CLI_VERSION } from "./config/constants"
import { configureLogging } from "./config/logging"
import { handleError } from "./errors"

const program = new Command()
  .name("behavior-intel")
  .description("Behavior intelligence dashboard for the data warehouse")
  .version(CLI_VERSION, "-v, --version")
  .option("--no-color", "Disable colored output")

// Authentication
program.addCommand(login)
program.addCommand(logout)

// Dashboard
program.addCommand(pages)
program.addCommand(show)

// Agent
program.addCommand(chat)

// Export
program.addCommand(report)

// Global error handler (safety net)
async function main() {
  configureLogging()
  try {
    await program.parseAsync(process.argv)
  } catch (e) {
    process.exitCode = handleError(e)
  }
}

void main()

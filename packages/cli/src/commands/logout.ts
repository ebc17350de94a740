import { Command } from "commander"
import { clearCredentials } from "../config/auth"
import { withErrorHandler } from "../errors"
import { log } from "../utils/logger"

export const logout = new Command("logout")
  .description("Remove the stored access token")
  .action(
    withErrorHandler(async () => {
      if (!clearCredentials()) {
        console.log("Not logged in.")
        return
      }
      log.success("Logged out successfully.")
    }),
  )

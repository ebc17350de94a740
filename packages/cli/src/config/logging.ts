import { configureProductionLogging } from "@behavior-intel/sdk"
import { ENV_PREFIX } from "./constants"

export const LOG_FORMAT_ENV = `${ENV_PREFIX}LOG_FORMAT`

/** `json` switches SDK diagnostics to one JSON object per line. */
export function configureLogging(env: NodeJS.ProcessEnv = process.env): void {
  if (env[LOG_FORMAT_ENV]?.toLowerCase() === "json") configureProductionLogging()
}

import { homedir } from "node:os"
import { join } from "node:path"
import pkg from "../../package.json"

export const CONFIG_DIR = join(homedir(), ".behavior-intel")

export const AUTH_FILE = join(CONFIG_DIR, "auth.json")

export const CLI_VERSION: string = pkg.version

export const SETTINGS_YAML = "behavior-intel.yaml"

export const ENV_PREFIX = "BEHAVIOR_INTEL_"

/** Rows printed per table unless `--limit` says otherwise. */
export const DEFAULT_TABLE_LIMIT = 20

export const HISTORY_PREVIEW_LENGTH = 200

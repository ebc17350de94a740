import { existsSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from "node:fs"
import { dirname } from "node:path"
import { z } from "zod"
import { AUTH_FILE } from "./constants"

export const credentialsSchema = z.object({
  token: z.string().min(1),
  tokenType: z.string().optional(),
  accountUrl: z.string().url().optional(),
})

export type Credentials = z.infer<typeof credentialsSchema>

export function saveCredentials(creds: Credentials, file: string = AUTH_FILE): void {
  mkdirSync(dirname(file), { recursive: true })
  const tmp = `${file}.tmp`
  writeFileSync(tmp, JSON.stringify(creds, null, 2), { mode: 0o600 })
  renameSync(tmp, file)
}

/** Stored credentials, or null. An unreadable file is removed. */
export function getCredentials(file: string = AUTH_FILE): Credentials | null {
  if (!existsSync(file)) return null

  let raw: unknown = null
  try {
    raw = JSON.parse(readFileSync(file, "utf-8"))
  } catch (e) {
    if (!(e instanceof SyntaxError)) throw e
  }
  const parsed = credentialsSchema.safeParse(raw)
  if (parsed.success) return parsed.data

  unlinkSync(file)
  return null
}

export function clearCredentials(file: string = AUTH_FILE): boolean {
  if (!existsSync(file)) return false
  unlinkSync(file)
  return true
}

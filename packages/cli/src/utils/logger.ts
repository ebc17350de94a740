import pc from "picocolors"

export const log = {
  success(message: string): void {
    console.error(`${pc.green("✓")} ${message}`)
  },

  error(message: string): void {
    console.error(`${pc.red("✗")} ${message}`)
  },

  warning(message: string): void {
    console.error(`${pc.yellow("⚠")} ${message}`)
  },

  info(message: string): void {
    console.error(message)
  },

  hint(message: string): void {
    console.error(pc.dim(`  ${message}`))
  },

  muted(message: string): void {
    console.error(pc.dim(message))
  },
}

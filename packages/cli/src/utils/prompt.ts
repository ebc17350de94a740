import { createInterface } from "node:readline"

export async function confirm(message: string): Promise<boolean> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stderr,
  })
  return new Promise((resolve) => {
    rl.question(`${message} (y/N) `, (answer) => {
      rl.close()
      resolve(answer.toLowerCase() === "y" || answer.toLowerCase() === "yes")
    })
  })
}

/** Reads one line; resolves null when input closes (Ctrl+D). */
export async function promptUser(label = "\nYou> "): Promise<string | null> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stderr,
  })
  return new Promise((resolve) => {
    rl.question(label, (answer) => {
      resolve(answer)
      rl.close()
    })
    rl.on("close", () => resolve(null))
  })
}

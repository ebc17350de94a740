import pc from "picocolors"
import { spinnerConfig } from "../config/theme"
import { formatElapsed } from "./format"

const FRAMES = spinnerConfig.frames
const INTERVAL = spinnerConfig.interval

export type Spinner = ReturnType<typeof createSpinner>

/** Stderr spinner; draws nothing when stderr is not a terminal. */
export function createSpinner(options: { showElapsed?: boolean } = {}) {
  const showElapsed = options.showElapsed ?? false
  const enabled = process.stderr.isTTY === true

  let text = ""
  let running = false
  let timer: ReturnType<typeof setInterval> | null = null
  let startTime = 0
  let frameIdx = 0

  function start(initialText = ""): void {
    text = initialText
    if (running || !enabled) return
    running = true
    startTime = performance.now()
    frameIdx = 0

    timer = setInterval(() => {
      if (!running) return
      const frame = FRAMES[frameIdx % FRAMES.length]
      let line = `\r\x1b[K${frame} ${text}`
      if (showElapsed) {
        const elapsed = (performance.now() - startTime) / 1000
        line += ` ${pc.dim(formatElapsed(elapsed))}`
      }
      process.stderr.write(line)
      frameIdx++
    }, INTERVAL)
  }

  function stop(): void {
    const wasRunning = running
    running = false
    if (timer) {
      clearInterval(timer)
      timer = null
    }
    if (wasRunning) {
      process.stderr.write("\r\x1b[K")
    }
  }

  return { start, stop }
}

import logUpdate from 'log-update'

// Constants

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']

const SPINNER_INTERVAL_MS = 80

// Helpers

function isTty(): boolean {
  return Boolean(process.stdout.isTTY)
}

// Main Function

// A single live stage line. Finished stages are persisted above it. Without a TTY every stage is a plain log line.
export function createTerminalDisplay() {
  let stageText: string | null = null
  let frameIndex = 0
  let interval: ReturnType<typeof setInterval> | null = null

  function render(): void {
    if (!isTty() || stageText === null) return

    const frame = SPINNER_FRAMES[frameIndex % SPINNER_FRAMES.length]

    logUpdate(`${frame} ${stageText}`)
  }

  function persistCurrent(mark: string): void {
    if (stageText === null || !isTty()) return

    logUpdate(`${mark} ${stageText}`)
    logUpdate.done()
  }

  return {
    stage(text: string): void {
      if (!isTty()) {
        console.log(text)

        return
      }

      persistCurrent('✔')

      stageText = text
      frameIndex = 0

      render()

      interval ??= setInterval(() => {
        frameIndex += 1

        render()
      }, SPINNER_INTERVAL_MS)
    },

    stop(succeeded = true): void {
      if (interval !== null) {
        clearInterval(interval)

        interval = null
      }

      persistCurrent(succeeded ? '✔' : '✖')

      stageText = null
    }
  }
}

// Types

export type TerminalDisplay = ReturnType<typeof createTerminalDisplay>

/**
 * CLI Logger
 *
 * Progress reporting and logging utilities for the CLI.
 */

export interface Logger {
  log: (msg: string) => void
  verbose: (msg: string) => void
  success: (msg: string) => void
  warn: (msg: string) => void
  error: (msg: string) => void
  progress: (msg: string, current: number, total: number) => void
}

const BAR_WIDTH = 40

export function renderProgressBar(current: number, total: number): string {
  const pct = total === 0 ? 100 : Math.round((current / total) * 100)
  const filled = Math.round((pct / 100) * BAR_WIDTH)
  return `[${'█'.repeat(filled)}${'░'.repeat(BAR_WIDTH - filled)}] ${pct}%`
}

export function createLogger(quiet: boolean, verbose: boolean): Logger {
  // A warning printed mid-bar would be glued to the progress line
  let barActive = false
  const breakBar = () => {
    if (barActive) {
      process.stdout.write('\n')
      barActive = false
    }
  }

  return {
    log: (msg: string) => {
      if (quiet) return
      breakBar()
      console.log(msg)
    },
    verbose: (msg: string) => {
      if (!verbose) return
      breakBar()
      console.log(`  [debug] ${msg}`)
    },
    success: (msg: string) => {
      if (quiet) return
      breakBar()
      console.log(`  ✓ ${msg}`)
    },
    warn: (msg: string) => {
      breakBar()
      console.warn(`  ⚠ ${msg}`)
    },
    error: (msg: string) => {
      breakBar()
      console.error(`  ✗ ${msg}`)
    },
    progress: (msg: string, current: number, total: number) => {
      if (quiet) return
      process.stdout.write(`\r  ${renderProgressBar(current, total)} ${msg}`)
      barActive = current < total
      if (current >= total) {
        process.stdout.write('\n')
      }
    }
  }
}

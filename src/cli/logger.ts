/**
 * CLI Logger
 *
 * Progress reporting and logging utilities for the CLI.
 * Satisfies the scraper's Reporter, so it can be handed to library code.
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

export function createLogger(quiet: boolean, verbose: boolean): Logger {
  return {
    log: (msg: string) => {
      if (!quiet) console.log(msg)
    },
    verbose: (msg: string) => {
      if (verbose) console.log(`  [debug] ${msg}`)
    },
    success: (msg: string) => {
      if (!quiet) console.log(`  ✓ ${msg}`)
    },
    warn: (msg: string) => {
      console.warn(`  ⚠ ${msg}`)
    },
    error: (msg: string) => {
      console.error(`  ✗ ${msg}`)
    },
    progress: (msg: string, current: number, total: number) => {
      if (quiet || total === 0) return
      const filled = Math.round((current / total) * BAR_WIDTH)
      const bar = '█'.repeat(filled) + '░'.repeat(BAR_WIDTH - filled)
      process.stdout.write(`\r  [${bar}] ${current}/${total} ${msg}`)
      if (current === total) {
        process.stdout.write('\n')
      }
    }
  }
}

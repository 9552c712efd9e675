/**
 * CLI Logger
 *
 * Console output for the CLI. The core modules never log; commands turn their
 * callbacks into lines here.
 */

import { formatUnit, type ResultRecord } from '../types'

const BAR_WIDTH = 40

export interface Logger {
  log: (msg: string) => void
  verbose: (msg: string) => void
  success: (msg: string) => void
  warn: (msg: string) => void
  error: (msg: string) => void
  /** Report one persisted record: a line per unit when verbose, else a progress bar */
  unit: (record: ResultRecord, position: number, total: number) => void
}

/** One-line description of a record, e.g. `(A, run 2) ✓ correct (0.92)` */
export function describeRecord(record: ResultRecord): string {
  const unit = formatUnit(record)
  if (record.outcome === 'success') {
    const verdict = record.verdict.isCorrect ? 'correct' : 'incorrect'
    return `${unit} ✓ ${verdict} (${record.verdict.confidence.toFixed(2)})`
  }
  return `${unit} ✗ ${record.errorKind}: ${record.errorMessage}`
}

export function renderProgressBar(current: number, total: number): string {
  const ratio = total > 0 ? Math.min(current / total, 1) : 1
  const filled = Math.round(ratio * BAR_WIDTH)
  return `[${'█'.repeat(filled)}${'░'.repeat(BAR_WIDTH - filled)}] ${Math.round(ratio * 100)}%`
}

export function createLogger(quiet: boolean, verbose: boolean): Logger {
  let successes = 0
  let failures = 0

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
      console.error(`  ⚠ ${msg}`)
    },
    error: (msg: string) => {
      console.error(`  ✗ ${msg}`)
    },
    unit: (record: ResultRecord, position: number, total: number) => {
      if (record.outcome === 'success') successes++
      else failures++
      if (quiet) return

      if (verbose) {
        console.log(`  [${position}/${total}] ${describeRecord(record)}`)
        return
      }
      const tally = `${position}/${total} (${successes} ok, ${failures} failed)`
      process.stdout.write(`\r  ${renderProgressBar(position, total)} ${tally}`)
      if (position === total) {
        process.stdout.write('\n')
      }
    }
  }
}

/**
 * Progress Scanner
 *
 * Replays the durable JSONL log to find which work units already succeeded.
 * Malformed lines are counted and skipped; the scan never aborts on content.
 */

import { createReadStream, existsSync } from 'node:fs'
import { createInterface } from 'node:readline'
import { type ResultRecord, unitKey } from '../types'
import { parseResultRecord } from './record-parser'

export { parseResultRecord, type RecordParseResult } from './record-parser'

export interface ScanWarning {
  /** 1-based line number in the log */
  readonly line: number
  readonly reason: string
}

export interface ScanOptions {
  /** Called for every skipped line, in file order */
  readonly onWarning?: ((warning: ScanWarning) => void) | undefined
}

export interface ScanResult {
  /** Every well-formed record, in log order */
  readonly records: readonly ResultRecord[]
  /** Unit keys with at least one success record */
  readonly completed: ReadonlySet<string>
  readonly warnings: readonly ScanWarning[]
  readonly successCount: number
  readonly failureCount: number
  /** Physical lines read, blank ones included */
  readonly lineCount: number
  readonly blankLines: number
}

function emptyScan(): ScanResult {
  return {
    records: [],
    completed: new Set(),
    warnings: [],
    successCount: 0,
    failureCount: 0,
    lineCount: 0,
    blankLines: 0
  }
}

function describeJsonError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error)
  return `invalid JSON: ${message}`
}

/**
 * Scan a log file. A missing file is an empty log.
 */
export async function scanProgress(path: string, options: ScanOptions = {}): Promise<ScanResult> {
  if (!existsSync(path)) {
    return emptyScan()
  }

  const records: ResultRecord[] = []
  const completed = new Set<string>()
  const warnings: ScanWarning[] = []
  let successCount = 0
  let failureCount = 0

  const warn = (line: number, reason: string): void => {
    const warning = { line, reason }
    warnings.push(warning)
    options.onWarning?.(warning)
  }

  const lines = createInterface({
    input: createReadStream(path, { encoding: 'utf-8' }),
    crlfDelay: Number.POSITIVE_INFINITY
  })

  let lineNumber = 0
  let blankLines = 0
  for await (const raw of lines) {
    lineNumber++
    const line = raw.trim()
    if (!line) {
      blankLines++
      continue
    }

    let decoded: unknown
    try {
      decoded = JSON.parse(line)
    } catch (error) {
      warn(lineNumber, describeJsonError(error))
      continue
    }

    const parsed = parseResultRecord(decoded)
    if (!parsed.ok) {
      warn(lineNumber, parsed.reason)
      continue
    }

    records.push(parsed.record)
    if (parsed.record.outcome === 'success') {
      successCount++
      completed.add(unitKey(parsed.record))
    } else {
      failureCount++
    }
  }

  return {
    records,
    completed,
    warnings,
    successCount,
    failureCount,
    lineCount: lineNumber,
    blankLines
  }
}

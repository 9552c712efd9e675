/**
 * Log Statistics
 *
 * Offline summary of a result log: line health, outcome counts, failure
 * breakdown and per-sample run coverage.
 */

import { scanProgress } from '../progress'
import type { FailureKind } from '../types'

export interface IncompleteSample {
  readonly sampleId: string
  /** Run indexes in [1..runCount] without a success record */
  readonly missingRuns: readonly number[]
}

export interface LogSummary {
  readonly path: string
  readonly totalLines: number
  readonly blankLines: number
  readonly validRecords: number
  readonly malformedLines: number
  readonly successes: number
  readonly failures: number
  readonly failuresByKind: Readonly<Record<FailureKind, number>>
  readonly uniqueSamples: number
  /** successes / validRecords, 0 for an empty log */
  readonly successRate: number
  /** Share of success verdicts that accepted the reference label */
  readonly acceptanceRate: number
  readonly meanConfidence: number
  /** Present when a run count was given */
  readonly coverage?:
    | {
        readonly runCount: number
        readonly completeSamples: number
        readonly incompleteSamples: readonly IncompleteSample[]
      }
    | undefined
}

/**
 * Summarize a log file. A missing file summarizes as empty.
 *
 * @param runCount When given, also report which samples have every run 1..runCount
 */
export async function summarizeLog(path: string, runCount?: number): Promise<LogSummary> {
  if (runCount !== undefined && (!Number.isInteger(runCount) || runCount < 1)) {
    throw new RangeError(`Run count must be a positive integer, got ${runCount}`)
  }

  const scan = await scanProgress(path)

  const failuresByKind: Record<FailureKind, number> = {
    rate_limited: 0,
    transient: 0,
    schema_invalid: 0,
    fatal: 0
  }
  /** Sample ID → successful run indexes, in first-seen order */
  const successfulRunsBySample = new Map<string, Set<number>>()
  let accepted = 0
  let confidenceSum = 0

  for (const record of scan.records) {
    let runs = successfulRunsBySample.get(record.sampleId)
    if (!runs) {
      runs = new Set()
      successfulRunsBySample.set(record.sampleId, runs)
    }

    if (record.outcome === 'success') {
      runs.add(record.runIndex)
      if (record.verdict.isCorrect) accepted++
      confidenceSum += record.verdict.confidence
    } else {
      failuresByKind[record.errorKind]++
    }
  }

  const validRecords = scan.records.length
  const successes = scan.successCount

  let coverage: LogSummary['coverage']
  if (runCount !== undefined) {
    const incompleteSamples: IncompleteSample[] = []
    for (const [sampleId, runs] of successfulRunsBySample) {
      const missingRuns: number[] = []
      for (let runIndex = 1; runIndex <= runCount; runIndex++) {
        if (!runs.has(runIndex)) missingRuns.push(runIndex)
      }
      if (missingRuns.length > 0) {
        incompleteSamples.push({ sampleId, missingRuns })
      }
    }
    coverage = {
      runCount,
      completeSamples: successfulRunsBySample.size - incompleteSamples.length,
      incompleteSamples
    }
  }

  return {
    path,
    totalLines: scan.lineCount,
    blankLines: scan.blankLines,
    validRecords,
    malformedLines: scan.warnings.length,
    successes,
    failures: scan.failureCount,
    failuresByKind,
    uniqueSamples: successfulRunsBySample.size,
    successRate: validRecords > 0 ? successes / validRecords : 0,
    acceptanceRate: successes > 0 ? accepted / successes : 0,
    meanConfidence: successes > 0 ? confidenceSum / successes : 0,
    coverage
  }
}

function percent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`
}

/**
 * Format a summary for display.
 */
export function formatLogSummary(summary: LogSummary, maxListed = 5): string {
  const lines = [
    `Log: ${summary.path}`,
    `  Lines:            ${summary.totalLines} (${summary.blankLines} blank, ${summary.malformedLines} malformed)`,
    `  Valid records:    ${summary.validRecords}`,
    `  Successes:        ${summary.successes}`,
    `  Failures:         ${summary.failures}`,
    `  Success rate:     ${percent(summary.successRate)}`,
    `  Unique samples:   ${summary.uniqueSamples}`,
    `  Accepted labels:  ${percent(summary.acceptanceRate)}`,
    `  Mean confidence:  ${summary.meanConfidence.toFixed(2)}`
  ]

  const kinds = Object.entries(summary.failuresByKind).filter(([, count]) => count > 0)
  if (kinds.length > 0) {
    lines.push('  Failures by kind:')
    for (const [kind, count] of kinds) {
      lines.push(`    ${kind}: ${count}`)
    }
  }

  if (summary.coverage) {
    const { runCount, completeSamples, incompleteSamples } = summary.coverage
    lines.push(`  Complete samples: ${completeSamples}/${summary.uniqueSamples} (${runCount} runs each)`)
    for (const sample of incompleteSamples.slice(0, maxListed)) {
      lines.push(`    ${sample.sampleId}: missing runs ${sample.missingRuns.join(', ')}`)
    }
    if (incompleteSamples.length > maxListed) {
      lines.push(`    ... and ${incompleteSamples.length - maxListed} more`)
    }
  }

  return lines.join('\n')
}

/**
 * Pass report formatting for display.
 */

import { FAILURE_KINDS, formatUnit } from '../types'
import type { PassOutcome, PassReport } from './index'

/** Incomplete units listed individually before summarizing the rest */
const MAX_LISTED_UNITS = 20

export function formatDurationMs(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`
  const seconds = ms / 1000
  if (seconds < 60) return `${seconds.toFixed(1)}s`
  const minutes = Math.floor(seconds / 60)
  return `${minutes}m ${Math.round(seconds - minutes * 60)}s`
}

function formatStatus(outcome: PassOutcome): string {
  switch (outcome.status) {
    case 'completed':
      return 'Pass completed'
    case 'partially_completed':
      return outcome.cancelled
        ? `Pass cancelled (${outcome.remainingCount} units remaining)`
        : `Pass partially completed (${outcome.remainingCount} units remaining)`
    case 'aborted':
      return `Pass aborted: ${outcome.error.message}`
  }
}

/**
 * Format the end-of-pass summary.
 */
export function formatPassReport(outcome: PassOutcome, report: PassReport): string {
  const failureTotal = FAILURE_KINDS.reduce((sum, kind) => sum + report.failuresByKind[kind], 0)
  const failureParts = FAILURE_KINDS.filter((kind) => report.failuresByKind[kind] > 0).map(
    (kind) => `${kind} ${report.failuresByKind[kind]}`
  )

  const lines = [
    formatStatus(outcome),
    `  Model:                ${report.modelId}`,
    `  Log:                  ${report.logPath}`,
    `  Duration:             ${formatDurationMs(report.durationMs)}`,
    `  Planned units:        ${report.plannedUnits}`,
    `  Previously completed: ${report.previouslyCompleted}`,
    `  Calls this pass:      ${report.attemptedCalls}`,
    `  Successes:            ${report.successes}`,
    `  Failures:             ${failureTotal}${failureParts.length > 0 ? ` (${failureParts.join(', ')})` : ''}`,
    `  Malformed log lines:  ${report.malformedLines}`,
    `  Still incomplete:     ${report.incompleteUnits.length}`
  ]

  for (const unit of report.incompleteUnits.slice(0, MAX_LISTED_UNITS)) {
    lines.push(`    ${formatUnit(unit)}`)
  }
  if (report.incompleteUnits.length > MAX_LISTED_UNITS) {
    lines.push(`    ... and ${report.incompleteUnits.length - MAX_LISTED_UNITS} more`)
  }

  return lines.join('\n')
}

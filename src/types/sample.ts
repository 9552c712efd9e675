/**
 * Sample and Work Unit Types
 */

/**
 * One item to classify. Supplied by a sample source and never mutated.
 */
export interface Sample {
  /** Stable unique identifier, used as the resume key in the log */
  readonly id: string
  /** Free text the service judges */
  readonly payload: string
  /** The label the service is asked to confirm or reject */
  readonly referenceLabel: string
  readonly metadata: Readonly<Record<string, string>>
}

/** One required (sample, run) invocation. `runIndex` is 1-based. */
export interface WorkUnit {
  readonly sampleId: string
  readonly runIndex: number
}

/**
 * Stable string key for a unit, used for set membership.
 */
export function unitKey(unit: WorkUnit): string {
  return `${unit.sampleId}#${unit.runIndex}`
}

export function formatUnit(unit: WorkUnit): string {
  return `(${unit.sampleId}, run ${unit.runIndex})`
}

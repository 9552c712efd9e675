/**
 * Result Record Types
 *
 * One record per attempt, one record per line of the durable log.
 * Field names are the on-disk format read by external analysis tooling.
 */

/** Structured judgement returned by the classification service. */
export interface Verdict {
  readonly isCorrect: boolean
  /** 0.0-1.0 */
  readonly confidence: number
  readonly rationale: string
  readonly alternativeCodes: readonly string[]
}

/** Retry-eligible kinds come first; `fatal` aborts the pass. */
export type FailureKind = 'rate_limited' | 'transient' | 'schema_invalid' | 'fatal'

export const FAILURE_KINDS: readonly FailureKind[] = [
  'rate_limited',
  'transient',
  'schema_invalid',
  'fatal'
]

export function isRetryEligible(kind: FailureKind): boolean {
  return kind !== 'fatal'
}

interface BaseRecord {
  readonly sampleId: string
  readonly runIndex: number
  readonly modelId: string
  /** ISO-8601 time the attempt finished */
  readonly timestamp: string
  readonly durationMs?: number | undefined
  readonly referenceLabel?: string | undefined
}

export interface SuccessRecord extends BaseRecord {
  readonly outcome: 'success'
  readonly verdict: Verdict
}

export interface FailureRecord extends BaseRecord {
  readonly outcome: 'failure'
  readonly errorKind: FailureKind
  readonly errorMessage: string
  readonly retryAfterMs?: number | undefined
  /** Truncated raw response text, for schema failures */
  readonly rawResponse?: string | undefined
}

export type ResultRecord = SuccessRecord | FailureRecord

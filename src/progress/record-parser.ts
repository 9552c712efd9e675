/**
 * Log Record Parser
 *
 * Validates one decoded log line into a typed ResultRecord.
 * Unknown extra fields are dropped; optional fields of the wrong type are ignored.
 */

import {
  FAILURE_KINDS,
  type FailureKind,
  type FailureRecord,
  type ResultRecord,
  type SuccessRecord,
  type Verdict
} from '../types'

export type RecordParseResult =
  | { readonly ok: true; readonly record: ResultRecord }
  | { readonly ok: false; readonly reason: string }

function isObject(val: unknown): val is Record<string, unknown> {
  return typeof val === 'object' && val !== null && !Array.isArray(val)
}

function optionalNumber(val: unknown): number | undefined {
  return typeof val === 'number' && Number.isFinite(val) ? val : undefined
}

function optionalString(val: unknown): string | undefined {
  return typeof val === 'string' ? val : undefined
}

function isFailureKind(val: unknown): val is FailureKind {
  return typeof val === 'string' && FAILURE_KINDS.some((kind) => kind === val)
}

function parseStoredVerdict(val: unknown): Verdict | null {
  if (!isObject(val)) return null
  const { isCorrect, confidence, rationale, alternativeCodes } = val
  if (typeof isCorrect !== 'boolean') return null
  if (typeof confidence !== 'number' || confidence < 0 || confidence > 1) return null
  if (typeof rationale !== 'string') return null
  if (!Array.isArray(alternativeCodes)) return null
  const codes = alternativeCodes.filter((c): c is string => typeof c === 'string')
  if (codes.length !== alternativeCodes.length) return null
  return { isCorrect, confidence, rationale, alternativeCodes: codes }
}

/**
 * Validate a decoded JSON value as a ResultRecord.
 */
export function parseResultRecord(value: unknown): RecordParseResult {
  if (!isObject(value)) {
    return { ok: false, reason: 'record is not an object' }
  }

  const { sampleId, runIndex, modelId, timestamp, outcome } = value
  if (typeof sampleId !== 'string' || sampleId === '') {
    return { ok: false, reason: 'missing sampleId' }
  }
  if (typeof runIndex !== 'number' || !Number.isInteger(runIndex) || runIndex < 1) {
    return { ok: false, reason: 'runIndex must be a positive integer' }
  }
  if (typeof modelId !== 'string') {
    return { ok: false, reason: 'missing modelId' }
  }
  if (typeof timestamp !== 'string') {
    return { ok: false, reason: 'missing timestamp' }
  }

  const base = {
    sampleId,
    runIndex,
    modelId,
    timestamp,
    durationMs: optionalNumber(value.durationMs),
    referenceLabel: optionalString(value.referenceLabel)
  }

  if (outcome === 'success') {
    const verdict = parseStoredVerdict(value.verdict)
    if (!verdict) {
      return { ok: false, reason: 'success record has an invalid verdict' }
    }
    const record: SuccessRecord = { ...base, outcome, verdict }
    return { ok: true, record }
  }

  if (outcome === 'failure') {
    if (!isFailureKind(value.errorKind)) {
      return { ok: false, reason: `unknown errorKind: ${String(value.errorKind)}` }
    }
    const record: FailureRecord = {
      ...base,
      outcome,
      errorKind: value.errorKind,
      errorMessage: optionalString(value.errorMessage) ?? '',
      retryAfterMs: optionalNumber(value.retryAfterMs),
      rawResponse: optionalString(value.rawResponse)
    }
    return { ok: true, record }
  }

  return { ok: false, reason: `unknown outcome: ${String(outcome)}` }
}

/**
 * Response Parser
 *
 * Parses a raw classification response into a Verdict.
 * Two outcomes only: a complete verdict, or schema-invalid with the raw text.
 * No field is defaulted: a response missing a required field is invalid.
 */

import type { Verdict } from '../types'

export type VerdictParseResult =
  | { readonly ok: true; readonly verdict: Verdict }
  | { readonly ok: false; readonly rawText: string; readonly reason: string }

function extractJsonObject(response: string): string | null {
  // Try to extract JSON from response (might be wrapped in ```json```)
  const fenced = response.match(/```(?:json)?\s*(\{[\s\S]*?\})\s*```/)
  if (fenced?.[1]) {
    return fenced[1]
  }
  const start = response.indexOf('{')
  const end = response.lastIndexOf('}')
  return start !== -1 && end > start ? response.slice(start, end + 1) : null
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function firstDefined(obj: Record<string, unknown>, keys: readonly string[]): unknown {
  for (const key of keys) {
    if (obj[key] !== undefined) return obj[key]
  }
  return undefined
}

function parseCodes(val: unknown): string[] | null {
  if (val === undefined || val === null) return []
  if (!Array.isArray(val)) return null
  const codes: string[] = []
  for (const item of val) {
    if (typeof item === 'string') {
      codes.push(item)
    } else if (typeof item === 'number' && Number.isFinite(item)) {
      codes.push(String(item))
    } else {
      return null
    }
  }
  return codes
}

function invalid(rawText: string, reason: string): VerdictParseResult {
  return { ok: false, rawText, reason }
}

/**
 * Parse the verdict from a raw service response.
 *
 * Accepted keys: `is_correct`, `confidence_score` (or `confidence`),
 * `reasoning` (or `rationale`), optional `alternative_codes`.
 */
export function parseVerdictResponse(response: string): VerdictParseResult {
  const jsonStr = extractJsonObject(response)
  if (!jsonStr) {
    return invalid(response, 'no JSON object in response')
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(jsonStr)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    return invalid(response, `invalid JSON: ${message}`)
  }

  if (!isPlainObject(parsed)) {
    return invalid(response, 'response JSON is not an object')
  }
  const obj = parsed

  const isCorrect = firstDefined(obj, ['is_correct', 'isCorrect'])
  if (typeof isCorrect !== 'boolean') {
    return invalid(response, 'is_correct must be a boolean')
  }

  const confidence = firstDefined(obj, ['confidence_score', 'confidence'])
  if (typeof confidence !== 'number' || !Number.isFinite(confidence)) {
    return invalid(response, 'confidence_score must be a number')
  }
  if (confidence < 0 || confidence > 1) {
    return invalid(response, `confidence_score ${confidence} is outside [0, 1]`)
  }

  const rationale = firstDefined(obj, ['reasoning', 'rationale'])
  if (typeof rationale !== 'string' || !rationale.trim()) {
    return invalid(response, 'reasoning must be a non-empty string')
  }

  const alternativeCodes = parseCodes(firstDefined(obj, ['alternative_codes', 'alternativeCodes']))
  if (!alternativeCodes) {
    return invalid(response, 'alternative_codes must be a list of codes')
  }

  return { ok: true, verdict: { isCorrect, confidence, rationale, alternativeCodes } }
}

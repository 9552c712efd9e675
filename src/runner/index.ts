/**
 * Orchestrator
 *
 * Runs one pass over the work plan:
 *
 *   initializing → scanning → iterating → completed | partially_completed | aborted
 *
 * Strictly sequential. Before each call the rate limiter is acquired; after
 * each call exactly one record is persisted. Units that fail with a
 * retry-eligible kind are retried in-pass up to maxInPassRetries times and
 * otherwise left for the next pass. A fatal failure or a persistence failure
 * ends the pass.
 */

import { getRpmTable, type InvocationResult, type ServiceInvoker } from '../invoker'
import { buildWorkPlan, remainingUnits } from '../plan'
import { type ScanWarning, scanProgress } from '../progress'
import { RateLimiter } from '../rate-limit'
import {
  type FailureKind,
  formatUnit,
  isRetryEligible,
  type ResultRecord,
  type Sample,
  unitKey,
  type WorkUnit
} from '../types'
import { JsonlResultWriter, type ResultWriter } from '../writer'

export { formatDurationMs, formatPassReport } from './report'

export type PassState =
  | 'initializing'
  | 'scanning'
  | 'iterating'
  | 'completed'
  | 'partially_completed'
  | 'aborted'

/**
 * Raised into the pass outcome when the service reports a failure that
 * retrying cannot fix (bad key, unknown model, malformed request).
 */
export class FatalInvocationError extends Error {
  readonly unit: WorkUnit
  /** Whether the failure record reached the log */
  readonly persisted: boolean

  constructor(unit: WorkUnit, message: string, persisted: boolean, cause?: unknown) {
    super(`Fatal failure on ${formatUnit(unit)}: ${message}`, cause === undefined ? undefined : { cause })
    this.name = 'FatalInvocationError'
    this.unit = unit
    this.persisted = persisted
  }
}

export interface UnitStartInfo {
  readonly unit: WorkUnit
  /** 1-based attempt number within this pass */
  readonly attempt: number
  /** 1-based position among this pass's remaining units */
  readonly position: number
  readonly total: number
  /** Time spent waiting on the rate limiter */
  readonly waitedMs: number
}

export interface UnitCompleteInfo {
  readonly unit: WorkUnit
  readonly attempt: number
  readonly position: number
  readonly total: number
  readonly record: ResultRecord
}

export interface RunPassOptions {
  readonly samples: readonly Sample[]
  /** N: independent runs required per sample */
  readonly runCount: number
  readonly modelId: string
  readonly logPath: string
  readonly invoker: ServiceInvoker
  /** Request text for a sample. Default: the sample payload. */
  readonly buildRequest?: ((sample: Sample) => string) | undefined
  /** Default: limiter over the built-in model RPM table */
  readonly rateLimiter?: RateLimiter | undefined
  /** Default: JsonlResultWriter on logPath */
  readonly writer?: ResultWriter | undefined
  /** Extra attempts per unit within this pass. Default: 0 */
  readonly maxInPassRetries?: number | undefined
  /**
   * Checked at unit boundaries and interrupts the rate-limit wait. A call already
   * in flight runs to completion (bounded by the invoker's timeout) and is recorded.
   */
  readonly signal?: AbortSignal | undefined
  /** Clock for timestamps and durations. Default: Date.now */
  readonly now?: (() => number) | undefined
  readonly onStateChange?: ((state: PassState) => void) | undefined
  readonly onWarning?: ((warning: ScanWarning) => void) | undefined
  readonly onUnitStart?: ((info: UnitStartInfo) => void) | undefined
  readonly onUnitComplete?: ((info: UnitCompleteInfo) => void) | undefined
}

export interface PassReport {
  readonly modelId: string
  readonly logPath: string
  readonly plannedUnits: number
  readonly previouslyCompleted: number
  readonly attemptedCalls: number
  readonly successes: number
  readonly failuresByKind: Readonly<Record<FailureKind, number>>
  /** Units still lacking a success record, in plan order */
  readonly incompleteUnits: readonly WorkUnit[]
  readonly malformedLines: number
  readonly durationMs: number
}

export type PassOutcome =
  | { readonly status: 'completed' }
  | {
      readonly status: 'partially_completed'
      readonly remainingCount: number
      readonly cancelled: boolean
    }
  | { readonly status: 'aborted'; readonly error: Error }

export interface PassResult {
  readonly outcome: PassOutcome
  readonly report: PassReport
}

function emptyFailureCounts(): Record<FailureKind, number> {
  return { rate_limited: 0, transient: 0, schema_invalid: 0, fatal: 0 }
}

function indexSamples(samples: readonly Sample[]): Map<string, Sample> {
  const byId = new Map<string, Sample>()
  for (const sample of samples) {
    if (byId.has(sample.id)) {
      throw new Error(`Duplicate sample id: ${sample.id}`)
    }
    byId.set(sample.id, sample)
  }
  return byId
}

function toRecord(
  unit: WorkUnit,
  sample: Sample,
  modelId: string,
  result: InvocationResult,
  finishedAt: number,
  durationMs: number
): ResultRecord {
  const base = {
    sampleId: unit.sampleId,
    runIndex: unit.runIndex,
    modelId,
    timestamp: new Date(finishedAt).toISOString(),
    durationMs,
    referenceLabel: sample.referenceLabel
  }

  if (result.ok) {
    return { ...base, outcome: 'success', verdict: result.verdict }
  }

  return {
    ...base,
    outcome: 'failure',
    errorKind: result.failure.kind,
    errorMessage: result.failure.message,
    retryAfterMs: result.failure.retryAfterMs,
    rawResponse: result.failure.rawResponse
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Run one pass: scan the log, then attempt every unit without a success record.
 * Never throws; errors end the pass with status `aborted`.
 *
 * @example
 * ```ts
 * const { outcome, report } = await runPass({
 *   samples,
 *   runCount: 5,
 *   modelId: 'gemini-2.5-flash-lite',
 *   logPath: 'results/gemini-2.5-flash-lite_retail.jsonl',
 *   invoker: createInvoker()
 * })
 * ```
 */
export async function runPass(options: RunPassOptions): Promise<PassResult> {
  const now = options.now ?? Date.now
  const startedAt = now()
  const { modelId, signal } = options
  const maxRetries = options.maxInPassRetries ?? 0

  let plan: WorkUnit[] = []
  let remaining: WorkUnit[] = []
  let previouslyCompleted = 0
  let malformedLines = 0
  let attemptedCalls = 0
  let successes = 0
  let cancelled = false
  const failuresByKind = emptyFailureCounts()
  const succeededThisPass = new Set<string>()

  const setState = (state: PassState): void => options.onStateChange?.(state)

  const finish = (outcome: PassOutcome): PassResult => {
    setState(outcome.status)
    return {
      outcome,
      report: {
        modelId,
        logPath: options.logPath,
        plannedUnits: plan.length,
        previouslyCompleted,
        attemptedCalls,
        successes,
        failuresByKind,
        incompleteUnits: remaining.filter((unit) => !succeededThisPass.has(unitKey(unit))),
        malformedLines,
        durationMs: now() - startedAt
      }
    }
  }

  try {
    setState('initializing')
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new RangeError(`Max in-pass retries must be a non-negative integer, got ${maxRetries}`)
    }
    const samplesById = indexSamples(options.samples)
    plan = buildWorkPlan(options.samples, options.runCount)
    const limiter = options.rateLimiter ?? new RateLimiter({ rpmByModel: getRpmTable() })
    const writer = options.writer ?? new JsonlResultWriter(options.logPath)
    const buildRequest = options.buildRequest ?? ((sample: Sample) => sample.payload)

    setState('scanning')
    const scan = await scanProgress(options.logPath, { onWarning: options.onWarning })
    malformedLines = scan.warnings.length
    remaining = remainingUnits(plan, scan.completed)
    previouslyCompleted = plan.length - remaining.length

    setState('iterating')
    units: for (const [index, unit] of remaining.entries()) {
      if (signal?.aborted) {
        cancelled = true
        break
      }

      const sample = samplesById.get(unit.sampleId)
      if (!sample) {
        throw new Error(`No sample for ${formatUnit(unit)}`)
      }
      const requestText = buildRequest(sample)
      const position = index + 1

      for (let attempt = 1; attempt <= maxRetries + 1; attempt++) {
        let waitedMs: number
        try {
          waitedMs = await limiter.acquire(modelId, signal)
        } catch (error) {
          if (signal?.aborted) {
            cancelled = true
            break units
          }
          throw error
        }

        options.onUnitStart?.({ unit, attempt, position, total: remaining.length, waitedMs })

        const callStart = now()
        const result = await options.invoker.invoke({ unit, sample, requestText, modelId })
        const finishedAt = now()
        attemptedCalls++

        const record = toRecord(unit, sample, modelId, result, finishedAt, finishedAt - callStart)

        if (!result.ok && !isRetryEligible(result.failure.kind)) {
          failuresByKind[result.failure.kind]++
          let persisted = true
          let persistError: unknown
          try {
            await writer.append(record)
          } catch (error) {
            persisted = false
            persistError = error
          }
          return finish({
            status: 'aborted',
            error: new FatalInvocationError(unit, result.failure.message, persisted, persistError)
          })
        }

        await writer.append(record)
        options.onUnitComplete?.({ unit, attempt, position, total: remaining.length, record })

        if (result.ok) {
          successes++
          succeededThisPass.add(unitKey(unit))
          break
        }

        failuresByKind[result.failure.kind]++
        if (result.failure.kind === 'rate_limited' && result.failure.retryAfterMs !== undefined) {
          limiter.noteRetryAfter(modelId, result.failure.retryAfterMs)
        }
        if (signal?.aborted) {
          cancelled = true
          break units
        }
      }
    }
  } catch (error) {
    return finish({ status: 'aborted', error: toError(error) })
  }

  const remainingCount = remaining.length - succeededThisPass.size
  if (remainingCount === 0) {
    return finish({ status: 'completed' })
  }
  return finish({ status: 'partially_completed', remainingCount, cancelled })
}

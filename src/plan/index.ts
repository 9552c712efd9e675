/**
 * Work Plan
 *
 * Expands samples × run count into the ordered list of required work units.
 * Pure functions, no IO.
 */

import { type Sample, unitKey, type WorkUnit } from '../types'

/**
 * Build the full work plan: sample-major, run-minor.
 *
 * @example
 * ```ts
 * buildWorkPlan([a, b], 2)
 * // [(a,1), (a,2), (b,1), (b,2)]
 * ```
 */
export function buildWorkPlan(samples: readonly Sample[], runCount: number): WorkUnit[] {
  if (!Number.isInteger(runCount) || runCount < 1) {
    throw new RangeError(`Run count must be a positive integer, got ${runCount}`)
  }

  const plan: WorkUnit[] = []
  for (const sample of samples) {
    for (let runIndex = 1; runIndex <= runCount; runIndex++) {
      plan.push({ sampleId: sample.id, runIndex })
    }
  }
  return plan
}

/**
 * Units of the plan not yet in the completed set, in plan order.
 */
export function remainingUnits(
  plan: readonly WorkUnit[],
  completed: ReadonlySet<string>
): WorkUnit[] {
  return plan.filter((unit) => !completed.has(unitKey(unit)))
}

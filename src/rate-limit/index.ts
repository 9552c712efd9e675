/**
 * Rate Limiter
 *
 * Enforces a minimum spacing between request starts, per model:
 *
 *   minimumInterval(model) = (60 / rpm(model)) × safetyFactor
 *
 * A server-suggested retry-after can stretch the next wait for a model.
 * Single-threaded: callers hold at most one in-flight request per model.
 */

import { setTimeout as delay } from 'node:timers/promises'

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>

export interface RateLimiterConfig {
  /** Requests per minute by model ID */
  readonly rpmByModel?: Readonly<Record<string, number>> | undefined
  /** RPM for models missing from rpmByModel. Default: 15 */
  readonly defaultRpm?: number | undefined
  /** Multiplier over the theoretical interval. Default: 1.1 */
  readonly safetyFactor?: number | undefined
  /** Whether noteRetryAfter() stretches the next wait. Default: true */
  readonly honorRetryAfter?: boolean | undefined
  /** Clock in ms. Default: Date.now */
  readonly now?: (() => number) | undefined
  /** Abortable sleep. Default: node:timers/promises setTimeout */
  readonly sleep?: SleepFn | undefined
}

export const DEFAULT_RPM = 15
export const DEFAULT_SAFETY_FACTOR = 1.1

const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, signal ? { signal } : undefined)
}

function assertValidRpm(model: string, rpm: number): void {
  if (!Number.isFinite(rpm) || rpm <= 0) {
    throw new RangeError(`RPM for ${model} must be a positive number, got ${rpm}`)
  }
}

export class RateLimiter {
  private readonly rpmByModel: Readonly<Record<string, number>>
  private readonly defaultRpm: number
  private readonly safetyFactor: number
  private readonly honorRetryAfter: boolean
  private readonly now: () => number
  private readonly sleep: SleepFn
  /** Last request start per model */
  private readonly lastStart = new Map<string, number>()
  /** Earliest allowed next start per model, from a retry-after hint */
  private readonly retryAfterUntil = new Map<string, number>()

  constructor(config: RateLimiterConfig = {}) {
    this.rpmByModel = config.rpmByModel ?? {}
    this.defaultRpm = config.defaultRpm ?? DEFAULT_RPM
    this.safetyFactor = config.safetyFactor ?? DEFAULT_SAFETY_FACTOR
    this.honorRetryAfter = config.honorRetryAfter ?? true
    this.now = config.now ?? Date.now
    this.sleep = config.sleep ?? defaultSleep

    if (!Number.isFinite(this.safetyFactor) || this.safetyFactor < 1) {
      throw new RangeError(`Safety factor must be at least 1, got ${this.safetyFactor}`)
    }
    assertValidRpm('default', this.defaultRpm)
    for (const [model, rpm] of Object.entries(this.rpmByModel)) {
      assertValidRpm(model, rpm)
    }
  }

  rpm(model: string): number {
    return this.rpmByModel[model] ?? this.defaultRpm
  }

  minimumIntervalMs(model: string): number {
    return (60 / this.rpm(model)) * this.safetyFactor * 1000
  }

  /**
   * How long acquire() would block right now. No side effects.
   */
  pendingWaitMs(model: string): number {
    const now = this.now()
    let wait = 0

    const last = this.lastStart.get(model)
    if (last !== undefined) {
      wait = Math.max(wait, last + this.minimumIntervalMs(model) - now)
    }

    const until = this.retryAfterUntil.get(model)
    if (until !== undefined) {
      wait = Math.max(wait, until - now)
    }

    return wait
  }

  /**
   * Block until a request to `model` may start, then record the start.
   * Rejects (without recording) if the signal aborts while waiting.
   *
   * @returns The time spent waiting, in ms
   */
  async acquire(model: string, signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted()

    const wait = this.pendingWaitMs(model)
    if (wait > 0) {
      await this.sleep(wait, signal)
    }

    this.lastStart.set(model, this.now())
    this.retryAfterUntil.delete(model)
    return wait
  }

  /**
   * Record a server-suggested wait. The next acquire() for this model
   * waits at least `ms` from now, if that is longer than the interval.
   */
  noteRetryAfter(model: string, ms: number): void {
    if (!this.honorRetryAfter || !Number.isFinite(ms) || ms <= 0) return

    const until = this.now() + ms
    const existing = this.retryAfterUntil.get(model) ?? 0
    this.retryAfterUntil.set(model, Math.max(existing, until))
  }
}

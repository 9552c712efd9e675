import { describe, expect, it } from 'vitest'
import { RateLimiter, type SleepFn } from './index'

/**
 * Fake clock whose sleep advances time instantly.
 */
function createFakeClock(start = 1_000_000) {
  let time = start
  const sleeps: number[] = []
  const sleep: SleepFn = async (ms, signal) => {
    signal?.throwIfAborted()
    sleeps.push(ms)
    time += ms
  }
  return {
    now: () => time,
    sleep,
    sleeps,
    advance: (ms: number) => {
      time += ms
    }
  }
}

describe('RateLimiter', () => {
  describe('minimumIntervalMs', () => {
    it('applies the safety factor to 60 / rpm', () => {
      const limiter = new RateLimiter({ rpmByModel: { flash: 15 }, safetyFactor: 1.1 })
      expect(limiter.minimumIntervalMs('flash')).toBeCloseTo(4400, 6)
    })

    it('falls back to the default rpm for unknown models', () => {
      const limiter = new RateLimiter({ rpmByModel: { pro: 2 }, defaultRpm: 30, safetyFactor: 1 })
      expect(limiter.minimumIntervalMs('pro')).toBe(30_000)
      expect(limiter.minimumIntervalMs('other')).toBe(2_000)
    })

    it('uses 15 rpm and 1.1 when nothing is configured', () => {
      const limiter = new RateLimiter()
      expect(limiter.rpm('anything')).toBe(15)
      expect(limiter.minimumIntervalMs('anything')).toBeCloseTo(4400, 6)
    })
  })

  describe('configuration validation', () => {
    it('rejects a safety factor below 1', () => {
      expect(() => new RateLimiter({ safetyFactor: 0.9 })).toThrow(
        'Safety factor must be at least 1, got 0.9'
      )
    })

    it('rejects non-positive rpm values', () => {
      expect(() => new RateLimiter({ rpmByModel: { flash: 0 } })).toThrow(RangeError)
      expect(() => new RateLimiter({ defaultRpm: -1 })).toThrow(RangeError)
    })
  })

  describe('acquire', () => {
    it('does not wait on the first call for a model', async () => {
      const clock = createFakeClock()
      const limiter = new RateLimiter({ rpmByModel: { flash: 15 }, ...clock })

      const waited = await limiter.acquire('flash')

      expect(waited).toBe(0)
      expect(clock.sleeps).toEqual([])
    })

    it('waits for the remaining deficit on back-to-back calls', async () => {
      const clock = createFakeClock()
      const limiter = new RateLimiter({ rpmByModel: { flash: 60 }, safetyFactor: 1, ...clock })

      await limiter.acquire('flash')
      clock.advance(400)
      const waited = await limiter.acquire('flash')

      expect(waited).toBe(600)
      expect(clock.sleeps).toEqual([600])
    })

    it('proceeds immediately once the interval has elapsed', async () => {
      const clock = createFakeClock()
      const limiter = new RateLimiter({ rpmByModel: { flash: 60 }, safetyFactor: 1, ...clock })

      await limiter.acquire('flash')
      clock.advance(1500)
      const waited = await limiter.acquire('flash')

      expect(waited).toBe(0)
    })

    it('keeps consecutive starts at least the minimum interval apart', async () => {
      const clock = createFakeClock()
      const limiter = new RateLimiter({ rpmByModel: { flash: 15 }, safetyFactor: 1.1, ...clock })
      const starts: number[] = []
      const workDurations = [0, 100, 5000, 2500, 0, 4399]

      for (const work of workDurations) {
        await limiter.acquire('flash')
        starts.push(clock.now())
        clock.advance(work)
      }

      for (let i = 1; i < starts.length; i++) {
        const gap = (starts[i] ?? 0) - (starts[i - 1] ?? 0)
        expect(gap).toBeGreaterThanOrEqual(limiter.minimumIntervalMs('flash') - 1e-6)
      }
    })

    it('tracks models independently', async () => {
      const clock = createFakeClock()
      const limiter = new RateLimiter({ rpmByModel: { a: 60, b: 60 }, safetyFactor: 1, ...clock })

      await limiter.acquire('a')
      const waited = await limiter.acquire('b')

      expect(waited).toBe(0)
    })

    it('rejects without recording a start when already aborted', async () => {
      const clock = createFakeClock()
      const limiter = new RateLimiter({ rpmByModel: { flash: 60 }, safetyFactor: 1, ...clock })
      const controller = new AbortController()
      controller.abort()

      await expect(limiter.acquire('flash', controller.signal)).rejects.toThrow()
      expect(limiter.pendingWaitMs('flash')).toBe(0)
    })

    it('interrupts a real wait when the signal aborts', async () => {
      const limiter = new RateLimiter({ rpmByModel: { flash: 1 }, safetyFactor: 1 })
      await limiter.acquire('flash')

      const controller = new AbortController()
      const pending = limiter.acquire('flash', controller.signal)
      controller.abort()

      await expect(pending).rejects.toMatchObject({ name: 'AbortError' })
    })
  })

  describe('noteRetryAfter', () => {
    it('stretches the next wait beyond the computed interval', async () => {
      const clock = createFakeClock()
      const limiter = new RateLimiter({ rpmByModel: { flash: 60 }, safetyFactor: 1, ...clock })

      await limiter.acquire('flash')
      limiter.noteRetryAfter('flash', 27_000)
      const waited = await limiter.acquire('flash')

      expect(waited).toBe(27_000)
    })

    it('does not shorten the computed interval', async () => {
      const clock = createFakeClock()
      const limiter = new RateLimiter({ rpmByModel: { flash: 60 }, safetyFactor: 1, ...clock })

      await limiter.acquire('flash')
      limiter.noteRetryAfter('flash', 200)
      const waited = await limiter.acquire('flash')

      expect(waited).toBe(1000)
    })

    it('applies only to the next acquire', async () => {
      const clock = createFakeClock()
      const limiter = new RateLimiter({ rpmByModel: { flash: 60 }, safetyFactor: 1, ...clock })

      await limiter.acquire('flash')
      limiter.noteRetryAfter('flash', 10_000)
      await limiter.acquire('flash')
      const waited = await limiter.acquire('flash')

      expect(waited).toBe(1000)
    })

    it('is ignored when retry-after overrides are disabled', async () => {
      const clock = createFakeClock()
      const limiter = new RateLimiter({
        rpmByModel: { flash: 60 },
        safetyFactor: 1,
        honorRetryAfter: false,
        ...clock
      })

      await limiter.acquire('flash')
      limiter.noteRetryAfter('flash', 10_000)
      const waited = await limiter.acquire('flash')

      expect(waited).toBe(1000)
    })

    it('applies before the first call to a model', async () => {
      const clock = createFakeClock()
      const limiter = new RateLimiter({ ...clock })

      limiter.noteRetryAfter('flash', 5000)

      expect(await limiter.acquire('flash')).toBe(5000)
    })
  })
})

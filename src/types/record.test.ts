import { describe, expect, it } from 'vitest'
import { FAILURE_KINDS, isRetryEligible } from './record'

describe('isRetryEligible', () => {
  it('allows every kind except fatal to be retried', () => {
    expect(FAILURE_KINDS.filter(isRetryEligible)).toEqual([
      'rate_limited',
      'transient',
      'schema_invalid'
    ])
  })
})

import { describe, expect, it } from 'vitest'
import { parseVerdictResponse } from './response-parser'

const VALID = {
  is_correct: true,
  confidence_score: 0.85,
  reasoning: 'The description matches the retail trade code.',
  alternative_codes: ['47111', '47112']
}

describe('parseVerdictResponse', () => {
  it('parses a bare JSON object', () => {
    const result = parseVerdictResponse(JSON.stringify(VALID))

    expect(result).toEqual({
      ok: true,
      verdict: {
        isCorrect: true,
        confidence: 0.85,
        rationale: 'The description matches the retail trade code.',
        alternativeCodes: ['47111', '47112']
      }
    })
  })

  it('extracts JSON from a ```json fence', () => {
    const raw = `Here is my answer:\n\`\`\`json\n${JSON.stringify(VALID)}\n\`\`\`\nThanks`

    const result = parseVerdictResponse(raw)

    expect(result.ok).toBe(true)
  })

  it('extracts JSON embedded in prose', () => {
    const raw = `Verdict: ${JSON.stringify({ ...VALID, is_correct: false })} (end)`

    const result = parseVerdictResponse(raw)

    expect(result.ok && result.verdict.isCorrect).toBe(false)
    expect(result.ok).toBe(true)
  })

  it('accepts the alternative key names', () => {
    const raw = JSON.stringify({ isCorrect: false, confidence: 0, rationale: 'No match' })

    const result = parseVerdictResponse(raw)

    expect(result).toEqual({
      ok: true,
      verdict: { isCorrect: false, confidence: 0, rationale: 'No match', alternativeCodes: [] }
    })
  })

  it('stringifies numeric alternative codes', () => {
    const raw = JSON.stringify({ ...VALID, alternative_codes: [47111, '47112'] })

    const result = parseVerdictResponse(raw)

    expect(result.ok && result.verdict.alternativeCodes).toEqual(['47111', '47112'])
  })

  it('treats null alternative codes as none', () => {
    const raw = JSON.stringify({ ...VALID, alternative_codes: null })

    const result = parseVerdictResponse(raw)

    expect(result.ok && result.verdict.alternativeCodes).toEqual([])
  })

  describe('schema failures', () => {
    function reasonFor(raw: string): string | undefined {
      const result = parseVerdictResponse(raw)
      return result.ok ? undefined : result.reason
    }

    it('rejects text without a JSON object', () => {
      expect(reasonFor('I think the code is correct.')).toBe('no JSON object in response')
    })

    it('rejects malformed JSON and keeps the raw text', () => {
      const raw = '{"is_correct": true, "confidence_score": }'

      const result = parseVerdictResponse(raw)

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.rawText).toBe(raw)
        expect(result.reason).toMatch(/^invalid JSON: /)
      }
    })

    it('rejects a string verdict', () => {
      const raw = JSON.stringify({ ...VALID, is_correct: 'true' })
      expect(reasonFor(raw)).toBe('is_correct must be a boolean')
    })

    it('rejects a missing verdict', () => {
      const { is_correct: _omit, ...rest } = VALID
      expect(reasonFor(JSON.stringify(rest))).toBe('is_correct must be a boolean')
    })

    it('rejects confidence above 1', () => {
      const raw = JSON.stringify({ ...VALID, confidence_score: 1.2 })
      expect(reasonFor(raw)).toBe('confidence_score 1.2 is outside [0, 1]')
    })

    it('rejects negative confidence', () => {
      const raw = JSON.stringify({ ...VALID, confidence_score: -0.1 })
      expect(reasonFor(raw)).toBe('confidence_score -0.1 is outside [0, 1]')
    })

    it('rejects a string confidence', () => {
      const raw = JSON.stringify({ ...VALID, confidence_score: '0.9' })
      expect(reasonFor(raw)).toBe('confidence_score must be a number')
    })

    it('rejects an empty rationale', () => {
      const raw = JSON.stringify({ ...VALID, reasoning: '   ' })
      expect(reasonFor(raw)).toBe('reasoning must be a non-empty string')
    })

    it('rejects alternative codes that are not a list', () => {
      const raw = JSON.stringify({ ...VALID, alternative_codes: '47111' })
      expect(reasonFor(raw)).toBe('alternative_codes must be a list of codes')
    })

    it('rejects alternative codes containing objects', () => {
      const raw = JSON.stringify({ ...VALID, alternative_codes: [{ code: '47111' }] })
      expect(reasonFor(raw)).toBe('alternative_codes must be a list of codes')
    })
  })
})

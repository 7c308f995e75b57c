import { describe, expect, it } from 'vitest'
import { clampConfidence, edgeConfidence, isAcceptable, isLowConfidence, normalizeScore, scoreCandidates } from './confidence'
import { defaultConfig } from './config'

describe('normalizeScore', () => {
  it('maps zero (and negatives) to zero', () => {
    expect(normalizeScore(0, 1)).toBe(0)
    expect(normalizeScore(-2, 1)).toBe(0)
  })

  it('is monotonic and stays below one', () => {
    const scores = [0.1, 0.5, 1, 2, 5, 50].map((s) => normalizeScore(s, 1))
    for (let i = 1; i < scores.length; i++) expect(scores[i]).toBeGreaterThan(scores[i - 1])
    expect(scores[scores.length - 1]).toBeLessThan(1)
    expect(normalizeScore(1, 1)).toBe(0.5)
  })
})

describe('thresholds', () => {
  it('flags scores strictly below tau as low confidence', () => {
    expect(isLowConfidence(0.39, defaultConfig.confidence)).toBe(true)
    expect(isLowConfidence(0.4, defaultConfig.confidence)).toBe(false)
  })

  it('accepts fallback answers at or above the acceptance threshold', () => {
    expect(isAcceptable(0.6, defaultConfig.confidence)).toBe(true)
    expect(isAcceptable(0.59, defaultConfig.confidence)).toBe(false)
  })
})

describe('edge and clamp helpers', () => {
  it('uses the minimum endpoint confidence', () => {
    expect(edgeConfidence(0.8, 0.3)).toBe(0.3)
  })

  it('clamps into [0,1]', () => {
    expect(clampConfidence(1.7)).toBe(1)
    expect(clampConfidence(-1)).toBe(0)
    expect(clampConfidence(Number.NaN)).toBe(0)
  })
})

describe('scoreCandidates', () => {
  it('takes the top candidate and flags weak matches', () => {
    const res = scoreCandidates(
      [
        { type: 'Dataset', score: 0.5, evidence: ['ds.participants'] },
        { type: 'Experiment', score: 0.4, evidence: ['exp.dose'] }
      ],
      defaultConfig.confidence
    )
    expect(res.type).toBe('Dataset')
    expect(res.confidence).toBeCloseTo(1 / 3, 10)
    expect(res.lowConfidence).toBe(true)
    expect(res.evidence).toEqual(['ds.participants'])
  })
})

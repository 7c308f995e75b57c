import appRoot from 'app-root-path'
import path from 'path'
import { SECTIONS, type ImradConfig } from './types'

export const defaultConfig: ImradConfig = {
  // Multipliers over the raw cue score; a missing (section, type) pair means 1.0
  sectionPriors: {
    Abstract: { Hypothesis: 1.2, Conclusion: 1.2 },
    Introduction: { Hypothesis: 1.5, Experiment: 0.8, Dataset: 0.8 },
    Methods: { Experiment: 1.3, Dataset: 1.3, Conclusion: 0.6 },
    Results: { Analysis: 1.3, Dataset: 1.1, Experiment: 1.1 },
    Discussion: { Analysis: 1.2, Conclusion: 1.4, Hypothesis: 1.1 },
    Conclusion: { Conclusion: 1.5 }
  },
  confidence: {
    k: 1.0,
    lowConfidenceThreshold: 0.4,
    acceptanceThreshold: 0.6
  },
  fallback: {
    enabled: true,
    topN: 3,
    timeoutMs: 20_000,
    retries: 2,
    backoffMs: 200,
    concurrency: 2,
    minWords: 6,
    maxChars: 500
  },
  learning: {
    enabled: true,
    maxCuesPerSentence: 3,
    maxNgram: 3,
    learnedWeight: 1.0
  },
  dedup: {
    maxNormalizedDistance: 0.1
  },
  patternStorePath: path.join(appRoot.path, 'learned_patterns.json')
}

export type ConfigOverrides = {
  [K in keyof ImradConfig]?: ImradConfig[K] extends object ? Partial<ImradConfig[K]> : ImradConfig[K]
}

export function mergeConfig(partial?: ConfigOverrides, base: ImradConfig = defaultConfig): ImradConfig {
  if (!partial) return base
  const sectionPriors = { ...base.sectionPriors }
  for (const section of SECTIONS) {
    const priors = partial.sectionPriors?.[section]
    if (priors) sectionPriors[section] = { ...base.sectionPriors[section], ...priors }
  }
  const merged: ImradConfig = {
    sectionPriors,
    confidence: { ...base.confidence, ...partial.confidence },
    fallback: { ...base.fallback, ...partial.fallback },
    learning: { ...base.learning, ...partial.learning },
    dedup: { ...base.dedup, ...partial.dedup },
    patternStorePath: partial.patternStorePath ?? base.patternStorePath
  }
  validateConfig(merged)
  return merged
}

export function validateConfig(cfg: ImradConfig) {
  for (const [section, priors] of Object.entries(cfg.sectionPriors)) {
    for (const [type, value] of Object.entries(priors ?? {})) {
      if (!(typeof value === 'number' && Number.isFinite(value) && value > 0)) {
        throw new RangeError(`section prior ${section}/${type} must be a positive finite number, got ${value}`)
      }
    }
  }
  const { k, lowConfidenceThreshold, acceptanceThreshold } = cfg.confidence
  if (!(k > 0)) throw new RangeError(`confidence.k must be positive, got ${k}`)
  for (const [name, value] of [
    ['lowConfidenceThreshold', lowConfidenceThreshold],
    ['acceptanceThreshold', acceptanceThreshold],
    ['dedup.maxNormalizedDistance', cfg.dedup.maxNormalizedDistance]
  ] as const) {
    if (!(value >= 0 && value <= 1)) throw new RangeError(`${name} must be within [0,1], got ${value}`)
  }
  if (cfg.fallback.concurrency < 1) throw new RangeError('fallback.concurrency must be at least 1')
  if (cfg.fallback.retries < 0) throw new RangeError('fallback.retries must not be negative')
}

export default defaultConfig

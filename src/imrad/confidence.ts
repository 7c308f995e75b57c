import { DEFAULT_NODE_TYPE } from './cues'
import type { Candidate, ImradConfig, ScoredClassification } from './types'

type ConfidenceConfig = ImradConfig['confidence']

// score / (score + k): monotonic, 0 at 0, approaches 1
export function normalizeScore(raw: number, k: number) {
  if (!(raw > 0)) return 0
  return raw / (raw + k)
}

export function isLowConfidence(confidence: number, cfg: Pick<ConfidenceConfig, 'lowConfidenceThreshold'>) {
  return confidence < cfg.lowConfidenceThreshold
}

export function isAcceptable(confidence: number, cfg: Pick<ConfidenceConfig, 'acceptanceThreshold'>) {
  return confidence >= cfg.acceptanceThreshold
}

export function edgeConfidence(start: number, end: number) {
  return Math.min(start, end)
}

export function clampConfidence(value: number) {
  if (!Number.isFinite(value)) return 0
  return Math.max(0, Math.min(1, value))
}

/** Turn ranked candidates into a final rule-based decision. */
export function scoreCandidates(candidates: Candidate[], cfg: ConfidenceConfig): ScoredClassification {
  const top = candidates[0]
  if (!top) {
    return { type: DEFAULT_NODE_TYPE, confidence: 0, lowConfidence: true, evidence: [], candidates }
  }
  const confidence = normalizeScore(top.score, cfg.k)
  return {
    type: top.type,
    confidence,
    lowConfidence: isLowConfidence(confidence, cfg),
    evidence: [...top.evidence],
    candidates
  }
}

export * from './types'
export * from './errors'
export { defaultConfig, mergeConfig, validateConfig, type ConfigOverrides } from './config'
export { segmentDocument, sentenceSplit, matchHeading, flattenSegments, validateDocument } from './segment'
export { CuePhraseClassifier, builtinCues, compileCues, learnedCueRules, type CueRule } from './cues'
export { normalizeScore, scoreCandidates, isLowConfidence, isAcceptable, edgeConfidence } from './confidence'
export { FallbackClassifier, type FallbackBackend, type FallbackRequest, type FallbackResponse, type FallbackOutcome } from './fallback'
export { createLLMFallbackBackend, parseReply } from './llmFallback'
export { PatternStore } from './patternStore'
export { PatternLearner, extractCues } from './learner'
export { ruleBasedAugmenter, type SemanticAugmenter } from './augment'
export { assembleGraph, deduplicateNodes, inferEdges, verifyGraph, EDGE_RULES } from './graph'
export { documentFromText, documentFromCsv, documentFromJson, loadDocument } from './input'
export { exportAll, toNodeRecord, toEdgeRecord } from './export'
export { runImradPipeline, runImradBatch, type PipelineOptions, type BatchResult } from './pipeline'

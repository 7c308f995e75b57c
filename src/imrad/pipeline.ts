import { createLogger } from '../logger'
import type { SemanticAugmenter } from './augment'
import { mergeConfig, type ConfigOverrides } from './config'
import { clampConfidence, scoreCandidates } from './confidence'
import { CuePhraseClassifier } from './cues'
import { exportAll } from './export'
import { FallbackClassifier, type FallbackBackend, type FallbackOutcome, type FallbackRequest } from './fallback'
import { assembleGraph } from './graph'
import { PatternLearner, type AcceptedDecision } from './learner'
import type { PatternStore } from './patternStore'
import { flattenSegments, segmentDocument, validateDocument } from './segment'
import type {
  DocumentInput,
  EdgeType,
  ImradConfig,
  ImradGraph,
  ImradNode,
  NodeSource,
  NodeType,
  PatternEntry,
  PipelineArtifacts,
  RunSummary,
  ScoredClassification,
  SentenceRecord
} from './types'

const log = createLogger('pipeline')

export interface PipelineOptions {
  config?: ConfigOverrides
  /** learned cues are read from a snapshot at run start; accepted fallbacks are added back */
  store?: PatternStore
  backend?: FallbackBackend
  augmenter?: SemanticAugmenter
  signal?: AbortSignal
  runId?: string
  clock?: () => Date
  exportDir?: string
  baseName?: string
}

interface Decision {
  type: NodeType
  confidence: number
  evidence: string[]
  lowConfidence: boolean
  source: NodeSource
}

const wordCount = (s: string) => s.split(/\s+/).filter(Boolean).length

export function newRunId(clock: () => Date = () => new Date()) {
  return `run-${clock().getTime().toString(36)}`
}

export function nodeIdPrefix(type: NodeType) {
  return type.slice(0, 3).toUpperCase()
}

export function isFallbackEligible(sentence: string, cfg: Pick<ImradConfig['fallback'], 'minWords' | 'maxChars'>) {
  return wordCount(sentence) >= cfg.minWords && sentence.length <= cfg.maxChars
}

export function buildFallbackRequest(sentence: SentenceRecord, classification: ScoredClassification, topN: number): FallbackRequest {
  return {
    sentence: sentence.text,
    section: sentence.section,
    candidates: classification.candidates.slice(0, topN).map((c) => ({ type: c.type, score: c.score }))
  }
}

function ruleDecision(c: ScoredClassification): Decision {
  return { type: c.type, confidence: c.confidence, evidence: [...c.evidence], lowConfidence: c.lowConfidence, source: 'rules' }
}

/** An accepted outcome replaces the rule result; anything else leaves it as it was. */
export function applyOutcome(rule: ScoredClassification, outcome: FallbackOutcome | undefined, backendName: string): Decision {
  if (outcome?.status !== 'accepted') return ruleDecision(rule)
  return {
    type: outcome.type,
    confidence: clampConfidence(outcome.confidence),
    evidence: [`fallback:${backendName}`],
    lowConfidence: false,
    source: 'fallback'
  }
}

function countNodeTypes(nodes: ImradNode[]) {
  const counts: Record<NodeType, number> = { Hypothesis: 0, Experiment: 0, Dataset: 0, Analysis: 0, Conclusion: 0 }
  for (const n of nodes) counts[n.type]++
  return counts
}

function countEdgeTypes(graph: ImradGraph) {
  const counts: Record<EdgeType, number> = { supports: 0, produces: 0, analyzes: 0, concludes: 0, informs: 0 }
  for (const e of graph.edges) counts[e.type]++
  return counts
}

function summarize(args: {
  documentId: string
  runId: string
  sentences: number
  graph: ImradGraph
  duplicatesRemoved: number
  fallbackCalls: number
  fallbackAccepted: number
  learned: PatternEntry[]
  persisted: boolean
}): RunSummary {
  return {
    documentId: args.documentId,
    runId: args.runId,
    sentences: args.sentences,
    nodesByType: countNodeTypes(args.graph.nodes),
    edgesByType: countEdgeTypes(args.graph),
    duplicatesRemoved: args.duplicatesRemoved,
    fallbackCalls: args.fallbackCalls,
    fallbackAccepted: args.fallbackAccepted,
    unverified: args.graph.nodes.filter((n) => n.lowConfidence).length,
    learnedCues: args.learned.length,
    patternStorePersisted: args.persisted
  }
}

/**
 * Classify every sentence of one document and assemble its graph.
 * Throws InputError for unusable documents and GraphConsistencyError on an
 * internal invariant breach; fallback and store-write problems only degrade
 * the affected nodes.
 */
export async function runImradPipeline(doc: DocumentInput, opts: PipelineOptions = {}): Promise<PipelineArtifacts> {
  const cfg = mergeConfig(opts.config)
  const clock = opts.clock ?? (() => new Date())
  const runId = opts.runId ?? newRunId(clock)
  const docLog = log.child(doc.id)

  // 1. Segment
  validateDocument(doc)
  const segments = segmentDocument(doc.spans)
  const sentences = flattenSegments(segments)
  docLog.debug(`${segments.length} segment(s), ${sentences.length} sentence(s)`)

  // 2. Rule classification against a frozen view of the store
  const classifier = new CuePhraseClassifier({
    sectionPriors: cfg.sectionPriors,
    learned: opts.store?.snapshot() ?? [],
    learnedWeight: cfg.learning.learnedWeight
  })
  const classifications = sentences.map((s) => scoreCandidates(classifier.classify(s.text, s.section), cfg.confidence))

  // 3. Fallback for low-confidence sentences
  const outcomes = new Map<number, FallbackOutcome>()
  let fallbackCalls = 0
  if (cfg.fallback.enabled && opts.backend) {
    const fallback = new FallbackClassifier(opts.backend, { ...cfg.fallback, acceptanceThreshold: cfg.confidence.acceptanceThreshold })
    const eligible = sentences.filter((s) => classifications[s.index].lowConfidence && isFallbackEligible(s.text, cfg.fallback))
    fallbackCalls = eligible.length
    const results = await fallback.resolveAll(
      eligible.map((s) => buildFallbackRequest(s, classifications[s.index], cfg.fallback.topN)),
      opts.signal
    )
    eligible.forEach((s, i) => outcomes.set(s.index, results[i]))
  }
  const backendName = opts.backend?.name ?? 'none'
  const decisions = sentences.map((s) => applyOutcome(classifications[s.index], outcomes.get(s.index), backendName))

  // 4. Nodes, in document order with per-type counters
  const counters = new Map<string, number>()
  const nodes: ImradNode[] = sentences.map((s) => {
    const d = decisions[s.index]
    const prefix = nodeIdPrefix(d.type)
    const n = (counters.get(prefix) ?? 0) + 1
    counters.set(prefix, n)
    const node: ImradNode = {
      id: `${prefix}_${n}`,
      type: d.type,
      text: s.text,
      section: s.section,
      confidence: d.confidence,
      evidence: d.evidence,
      timestamp: clock().toISOString(),
      lowConfidence: d.lowConfidence,
      source: d.source
    }
    const context = opts.augmenter?.contextFor(node)
    if (context) node.semanticContext = context
    return node
  })

  // 5. Learn from accepted fallbacks
  const accepted: AcceptedDecision[] = nodes
    .filter((n) => n.source === 'fallback')
    .map((n) => ({ sentence: n.text, type: n.type, confidence: n.confidence }))
  let learned: PatternEntry[] = []
  let persisted = true
  if (cfg.learning.enabled && opts.store && accepted.length) {
    const learner = new PatternLearner(opts.store, { runId, config: cfg.learning, clock })
    const report = await learner.learn(accepted)
    learned = report.added
    persisted = report.persisted
  }

  // 6. Graph
  const { graph, duplicatesRemoved } = assembleGraph(nodes, { dedup: cfg.dedup, augmenter: opts.augmenter })
  const summary = summarize({
    documentId: doc.id,
    runId,
    sentences: sentences.length,
    graph,
    duplicatesRemoved,
    fallbackCalls,
    fallbackAccepted: accepted.length,
    learned,
    persisted
  })
  docLog.debug(`${graph.nodes.length} node(s), ${graph.edges.length} edge(s), ${duplicatesRemoved} duplicate(s) removed`)

  // 7. Export
  let exports
  if (opts.exportDir) {
    exports = await exportAll(opts.exportDir, opts.baseName || doc.id, graph, summary)
  }

  return { document: doc, segments, sentences, classifications, nodes, graph, learned, summary, exports }
}

export type BatchResult = { document: string; ok: true; artifacts: PipelineArtifacts } | { document: string; ok: false; error: Error }

/**
 * Documents run in parallel. Every run takes its store snapshot before the
 * first fallback call, so learning in one document never changes another's
 * rule output within the batch.
 */
export async function runImradBatch(docs: DocumentInput[], opts: Omit<PipelineOptions, 'baseName'> = {}): Promise<BatchResult[]> {
  const settled = await Promise.allSettled(docs.map((doc) => runImradPipeline(doc, opts)))
  return settled.map((r, i) =>
    r.status === 'fulfilled'
      ? { document: docs[i].id, ok: true, artifacts: r.value }
      : { document: docs[i].id, ok: false, error: r.reason instanceof Error ? r.reason : new Error(String(r.reason)) }
  )
}

// Data model for the IMRaD classification-and-graph engine

export const NODE_TYPES = ['Hypothesis', 'Experiment', 'Dataset', 'Analysis', 'Conclusion'] as const

/** Priority order doubles as the tie-break order when two types score equally. */
export type NodeType = (typeof NODE_TYPES)[number]

export const SECTIONS = ['Abstract', 'Introduction', 'Methods', 'Results', 'Discussion', 'Conclusion', 'Unknown'] as const

export type Section = (typeof SECTIONS)[number]

export const EDGE_TYPES = ['supports', 'produces', 'analyzes', 'concludes', 'informs'] as const

export type EdgeType = (typeof EDGE_TYPES)[number]

export type NodeSource = 'rules' | 'fallback'

export interface SemanticContext {
  role: string
  entities: string[]
}

export interface ImradNode {
  id: string
  type: NodeType
  text: string
  section: Section
  confidence: number // [0,1]
  evidence: string[]
  semanticContext?: SemanticContext
  timestamp: string
  /** true when the rule score fell below the threshold and no fallback decision replaced it */
  lowConfidence: boolean
  source: NodeSource
}

export interface ImradEdge {
  start: string
  end: string
  type: EdgeType
  confidence: number
  semanticEvidence?: string
}

export interface ImradGraph {
  nodes: ImradNode[]
  edges: ImradEdge[]
}

export interface TextSpan {
  text: string
  /** section label hint from the extraction collaborator */
  section?: string
}

export interface DocumentInput {
  id: string
  title?: string
  spans: TextSpan[]
}

export interface SectionSegment {
  section: Section
  sentences: string[]
}

/** A single sentence with the section it was found in, in document order. */
export interface SentenceRecord {
  index: number
  section: Section
  text: string
}

export interface Candidate {
  type: NodeType
  /** sum of matched cue weights times the section prior */
  score: number
  evidence: string[]
}

export interface ScoredClassification {
  type: NodeType
  confidence: number
  lowConfidence: boolean
  evidence: string[]
  candidates: Candidate[]
}

export interface PatternEntry {
  pattern: string
  type: NodeType
  run_id: string
  timestamp: string
}

// Export records (wire format for external exporters and the comparison tool)

export interface NodeExportRecord {
  id: string
  type: NodeType
  text: string
  section: Section
  confidence: number
  evidence: string[]
  semantic_context: SemanticContext | null
  timestamp: string
  low_confidence: boolean
  source: NodeSource
}

export interface EdgeExportRecord {
  start: string
  end: string
  type: EdgeType
  confidence: number
  semantic_evidence: string | null
}

export interface ExportBundle {
  graphJsonPath: string
  csvNodesPath: string
  csvEdgesPath: string
  mermaidPath: string
}

export interface RunSummary {
  documentId: string
  runId: string
  sentences: number
  nodesByType: Record<NodeType, number>
  edgesByType: Record<EdgeType, number>
  duplicatesRemoved: number
  fallbackCalls: number
  fallbackAccepted: number
  unverified: number
  learnedCues: number
  patternStorePersisted: boolean
}

export interface PipelineArtifacts {
  document: DocumentInput
  segments: SectionSegment[]
  sentences: SentenceRecord[]
  classifications: ScoredClassification[]
  /** one node per sentence, after fallback and before deduplication */
  nodes: ImradNode[]
  graph: ImradGraph
  learned: PatternEntry[]
  summary: RunSummary
  exports?: ExportBundle
}

export interface ImradConfig {
  sectionPriors: Partial<Record<Section, Partial<Record<NodeType, number>>>>
  confidence: {
    /** half-saturation constant of score / (score + k) */
    k: number
    lowConfidenceThreshold: number
    acceptanceThreshold: number
  }
  fallback: {
    enabled: boolean
    topN: number
    timeoutMs: number
    retries: number
    backoffMs: number
    concurrency: number
    minWords: number
    maxChars: number
  }
  learning: {
    enabled: boolean
    maxCuesPerSentence: number
    maxNgram: number
    learnedWeight: number
  }
  dedup: {
    maxNormalizedDistance: number
  }
  patternStorePath: string
}

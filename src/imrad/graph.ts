import type { SemanticAugmenter } from './augment'
import { edgeConfidence } from './confidence'
import { GraphConsistencyError } from './errors'
import type { EdgeType, ImradConfig, ImradEdge, ImradGraph, ImradNode, NodeType } from './types'

/** Lower-case, punctuation stripped, whitespace collapsed. */
export function normalizeForDedup(text: string) {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim()
}

export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0
  if (a.length === 0) return b.length
  if (b.length === 0) return a.length

  let prev = Array.from({ length: b.length + 1 }, (_, j) => j)
  for (let i = 1; i <= a.length; i++) {
    const row = [i]
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1
      row[j] = Math.min(
        prev[j] + 1, // deletion
        row[j - 1] + 1, // insertion
        prev[j - 1] + cost // substitution
      )
    }
    prev = row
  }
  return prev[b.length]
}

/** Edit distance divided by the longer length; 0 for two empty strings. */
export function normalizedDistance(a: string, b: string) {
  const maxLen = Math.max(a.length, b.length)
  if (maxLen === 0) return 0
  return levenshteinDistance(a, b) / maxLen
}

export interface DedupResult {
  nodes: ImradNode[]
  removed: ImradNode[]
}

/**
 * Keep the highest-confidence node of every group of near-identical nodes
 * sharing section and type. Survivors keep their document order.
 */
export function deduplicateNodes(nodes: ImradNode[], cfg: ImradConfig['dedup']): DedupResult {
  const normalized = nodes.map((n) => normalizeForDedup(n.text))
  const order = nodes.map((_, i) => i).sort((a, b) => nodes[b].confidence - nodes[a].confidence || a - b)

  const kept: number[] = []
  const dropped = new Set<number>()
  for (const i of order) {
    const node = nodes[i]
    const text = normalized[i]
    const duplicate = kept.some((k) => {
      const other = nodes[k]
      if (other.section !== node.section || other.type !== node.type) return false
      const maxLen = Math.max(text.length, normalized[k].length)
      // length difference is a lower bound on the edit distance
      if (maxLen > 0 && Math.abs(text.length - normalized[k].length) / maxLen > cfg.maxNormalizedDistance) return false
      return normalizedDistance(text, normalized[k]) <= cfg.maxNormalizedDistance
    })
    if (duplicate) dropped.add(i)
    else kept.push(i)
  }

  return {
    nodes: nodes.filter((_, i) => !dropped.has(i)),
    removed: nodes.filter((_, i) => dropped.has(i))
  }
}

export interface EdgeRule {
  from: NodeType
  to: NodeType
  type: EdgeType
}

export const EDGE_RULES: readonly EdgeRule[] = [
  { from: 'Hypothesis', to: 'Experiment', type: 'supports' },
  { from: 'Experiment', to: 'Dataset', type: 'produces' },
  { from: 'Dataset', to: 'Analysis', type: 'analyzes' },
  { from: 'Experiment', to: 'Analysis', type: 'analyzes' },
  { from: 'Analysis', to: 'Conclusion', type: 'concludes' }
]

/**
 * Link each node to the nearest following node of the rule's target type.
 * Nodes without an eligible successor get no edge.
 */
export function inferEdges(
  nodes: ImradNode[],
  opts: { rules?: readonly EdgeRule[]; augmenter?: SemanticAugmenter } = {}
): ImradEdge[] {
  const rules = opts.rules ?? EDGE_RULES
  const edges: ImradEdge[] = []
  nodes.forEach((start, i) => {
    for (const rule of rules) {
      if (rule.from !== start.type) continue
      const end = nodes.slice(i + 1).find((n) => n.type === rule.to)
      if (!end) continue
      const edge: ImradEdge = {
        start: start.id,
        end: end.id,
        type: rule.type,
        confidence: edgeConfidence(start.confidence, end.confidence)
      }
      const evidence = opts.augmenter?.edgeEvidence(start, end)
      if (evidence !== undefined) edge.semanticEvidence = evidence
      edges.push(edge)
    }
  })
  return edges
}

/** Throws on duplicate node ids or on any edge whose endpoint is missing. */
export function verifyGraph(graph: ImradGraph) {
  const ids = new Set<string>()
  for (const n of graph.nodes) {
    if (ids.has(n.id)) throw new GraphConsistencyError(`duplicate node id ${n.id}`)
    ids.add(n.id)
  }
  for (const e of graph.edges) {
    if (!ids.has(e.start) || !ids.has(e.end)) {
      throw new GraphConsistencyError(`edge ${e.start} -> ${e.end} references a missing node`, e)
    }
  }
  return graph
}

export interface AssembledGraph {
  graph: ImradGraph
  duplicatesRemoved: number
}

export function assembleGraph(
  nodes: ImradNode[],
  opts: { dedup: ImradConfig['dedup']; augmenter?: SemanticAugmenter; rules?: readonly EdgeRule[] }
): AssembledGraph {
  const { nodes: finalNodes, removed } = deduplicateNodes(nodes, opts.dedup)
  const edges = inferEdges(finalNodes, { rules: opts.rules, augmenter: opts.augmenter })
  return { graph: verifyGraph({ nodes: finalNodes, edges }), duplicatesRemoved: removed.length }
}

import { describe, expect, it } from 'vitest'
import { ruleBasedAugmenter } from './augment'
import { defaultConfig } from './config'
import { GraphConsistencyError } from './errors'
import { assembleGraph, deduplicateNodes, inferEdges, levenshteinDistance, normalizedDistance, normalizeForDedup, verifyGraph } from './graph'
import type { ImradNode, NodeType, Section } from './types'

function node(id: string, type: NodeType, confidence: number, text = `${id} text.`, section: Section = 'Results'): ImradNode {
  return {
    id,
    type,
    text,
    section,
    confidence,
    evidence: [],
    timestamp: '2024-01-01T00:00:00.000Z',
    lowConfidence: false,
    source: 'rules'
  }
}

const dedup = defaultConfig.dedup

describe('edit distance', () => {
  it('computes Levenshtein distance', () => {
    expect(levenshteinDistance('kitten', 'sitting')).toBe(3)
    expect(levenshteinDistance('', 'abc')).toBe(3)
    expect(levenshteinDistance('same', 'same')).toBe(0)
  })

  it('normalises by the longer length', () => {
    expect(normalizedDistance('abcd', 'abce')).toBe(0.25)
    expect(normalizedDistance('', '')).toBe(0)
  })

  it('ignores case, punctuation and spacing', () => {
    expect(normalizeForDedup('  Cells, were   TREATED (again).')).toBe('cells were treated again')
  })
})

describe('deduplicateNodes', () => {
  it('keeps the most confident of near-identical nodes in the same section and type', () => {
    const nodes = [
      node('EXP_1', 'Experiment', 0.5, 'Cells were treated with drug A.', 'Methods'),
      node('EXP_2', 'Experiment', 0.8, 'Cells were treated with drug B.', 'Methods'),
      node('EXP_3', 'Experiment', 0.4, 'Cells were treated with drug A.', 'Results')
    ]
    const { nodes: kept, removed } = deduplicateNodes(nodes, dedup)
    expect(kept.map((n) => n.id)).toEqual(['EXP_2', 'EXP_3'])
    expect(removed.map((n) => n.id)).toEqual(['EXP_1'])
  })

  it('keeps the earliest node on a confidence tie', () => {
    const nodes = [node('A', 'Analysis', 0.6, 'Same text.'), node('B', 'Analysis', 0.6, 'Same text!')]
    expect(deduplicateNodes(nodes, dedup).nodes.map((n) => n.id)).toEqual(['A'])
  })

  it('does not merge different types', () => {
    const nodes = [node('A', 'Analysis', 0.6, 'Same text.'), node('B', 'Dataset', 0.6, 'Same text.')]
    expect(deduplicateNodes(nodes, dedup).nodes).toHaveLength(2)
  })

  it('is idempotent', () => {
    const nodes = [
      node('A', 'Analysis', 0.3, 'abcdefghij'),
      node('B', 'Analysis', 0.9, 'abcdefghiz'),
      node('C', 'Analysis', 0.5, 'abcdefghyj'),
      node('D', 'Analysis', 0.2, 'completely different')
    ]
    const once = deduplicateNodes(nodes, dedup).nodes
    const twice = deduplicateNodes(once, dedup).nodes
    expect(once.map((n) => n.id)).toEqual(['B', 'C', 'D'])
    expect(twice).toEqual(once)
  })
})

describe('inferEdges', () => {
  it('links each node to the nearest following node per rule with min confidence', () => {
    const nodes = [
      node('HYP_1', 'Hypothesis', 0.9),
      node('EXP_1', 'Experiment', 0.8),
      node('DAT_1', 'Dataset', 0.7),
      node('ANA_1', 'Analysis', 0.6),
      node('CON_1', 'Conclusion', 0.5)
    ]
    expect(inferEdges(nodes)).toEqual([
      { start: 'HYP_1', end: 'EXP_1', type: 'supports', confidence: 0.8 },
      { start: 'EXP_1', end: 'DAT_1', type: 'produces', confidence: 0.7 },
      { start: 'EXP_1', end: 'ANA_1', type: 'analyzes', confidence: 0.6 },
      { start: 'DAT_1', end: 'ANA_1', type: 'analyzes', confidence: 0.6 },
      { start: 'ANA_1', end: 'CON_1', type: 'concludes', confidence: 0.5 }
    ])
  })

  it('never links backwards and creates nothing without a successor', () => {
    const nodes = [node('CON_1', 'Conclusion', 0.9), node('ANA_1', 'Analysis', 0.9), node('HYP_1', 'Hypothesis', 0.9)]
    expect(inferEdges(nodes)).toEqual([])
  })

  it('adds semantic evidence when an augmenter is given', () => {
    const a = { ...node('ANA_1', 'Analysis', 0.7), semanticContext: { role: 'data_presentation', entities: ['compound', 'receptor'] } }
    const c = { ...node('CON_1', 'Conclusion', 0.6), semanticContext: { role: 'interpretation_conclusion', entities: ['compound', 'dose'] } }
    expect(inferEdges([a, c], { augmenter: ruleBasedAugmenter })).toEqual([
      { start: 'ANA_1', end: 'CON_1', type: 'concludes', confidence: 0.6, semanticEvidence: 'similarity:0.33' }
    ])
  })
})

describe('verifyGraph', () => {
  it('rejects dangling edges', () => {
    const edge = { start: 'HYP_1', end: 'EXP_9', type: 'supports' as const, confidence: 0.5 }
    try {
      verifyGraph({ nodes: [node('HYP_1', 'Hypothesis', 0.5)], edges: [edge] })
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(GraphConsistencyError)
      if (err instanceof GraphConsistencyError) expect(err.edge).toEqual(edge)
    }
  })

  it('rejects duplicate node ids', () => {
    expect(() => verifyGraph({ nodes: [node('X', 'Dataset', 1), node('X', 'Dataset', 1)], edges: [] })).toThrow(/duplicate node id X/)
  })
})

describe('assembleGraph', () => {
  it('only references surviving nodes', () => {
    const nodes = [
      node('DAT_1', 'Dataset', 0.4, 'Samples were collected from donors.'),
      node('DAT_2', 'Dataset', 0.9, 'Samples were collected from donors!'),
      node('ANA_1', 'Analysis', 0.8)
    ]
    const { graph, duplicatesRemoved } = assembleGraph(nodes, { dedup })
    expect(duplicatesRemoved).toBe(1)
    expect(graph.edges).toEqual([{ start: 'DAT_2', end: 'ANA_1', type: 'analyzes', confidence: 0.8 }])
    const ids = new Set(graph.nodes.map((n) => n.id))
    expect(graph.edges.every((e) => ids.has(e.start) && ids.has(e.end))).toBe(true)
  })
})

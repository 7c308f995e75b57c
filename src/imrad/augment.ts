import { isContentToken, tokenize } from './text'
import type { ImradNode, Section, SemanticContext } from './types'

/**
 * Optional collaborator that annotates nodes and edges. The core never
 * depends on its output; it only copies it into `semanticContext` and
 * `semanticEvidence`.
 */
export interface SemanticAugmenter {
  contextFor(node: ImradNode): SemanticContext | undefined
  edgeEvidence(start: ImradNode, end: ImradNode): string | undefined
}

const SECTION_ROLES: Partial<Record<Section, string>> = {
  Introduction: 'background_hypothesis',
  Methods: 'methodology_procedure',
  Results: 'data_presentation',
  Discussion: 'interpretation_conclusion',
  Conclusion: 'interpretation_conclusion'
}

const STRUCTURE_ROLES: Array<[RegExp, string]> = [
  [/\bwe (hypothesi[sz]e|propose|predict)\b/i, 'hypothesis_statement'],
  [/\bwe (conducted|performed|used)\b/i, 'experimental_action'],
  [/\bwe (analy[sz]ed|calculated)\b|\bstatistical/i, 'analytical_action'],
  [/\bin conclusion\b|\bwe conclude\b|\bour findings\b/i, 'conclusive_statement']
]

export const MAX_ENTITIES = 5

export function semanticRole(sentence: string, section: Section) {
  for (const [re, role] of STRUCTURE_ROLES) if (re.test(sentence)) return role
  return SECTION_ROLES[section] ?? 'general'
}

/** Distinct content words of four or more letters, in order of appearance. */
export function keyEntities(sentence: string, limit = MAX_ENTITIES) {
  const seen = new Set<string>()
  for (const t of tokenize(sentence)) {
    if (t.length >= 4 && isContentToken(t)) seen.add(t)
    if (seen.size >= limit) break
  }
  return Array.from(seen)
}

export function jaccard(a: readonly string[], b: readonly string[]) {
  if (!a.length || !b.length) return 0
  const left = new Set(a)
  const right = new Set(b)
  let shared = 0
  for (const x of left) if (right.has(x)) shared++
  return shared / (left.size + right.size - shared)
}

export const ruleBasedAugmenter: SemanticAugmenter = {
  contextFor(node) {
    return { role: semanticRole(node.text, node.section), entities: keyEntities(node.text) }
  },
  edgeEvidence(start, end) {
    if (!start.semanticContext || !end.semanticContext) return undefined
    const sim = jaccard(start.semanticContext.entities, end.semanticContext.entities)
    return `similarity:${sim.toFixed(2)}`
  }
}

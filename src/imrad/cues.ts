import builtinCueTable from './cues.json'
import { cueDefinitionSchema, type CueDefinition } from './schemas'
import { NODE_TYPES, type Candidate, type ImradConfig, type NodeType, type PatternEntry, type Section } from './types'

export interface CueRule {
  id: string
  type: NodeType
  pattern: RegExp
  weight: number
}

export function compileCues(defs: CueDefinition[]): CueRule[] {
  return defs.map((d) => ({ id: d.id, type: d.type, pattern: new RegExp(d.pattern, 'i'), weight: d.weight }))
}

export const builtinCues: CueRule[] = compileCues(cueDefinitionSchema.array().parse(builtinCueTable))

function escapeReg(s: string) {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/** Learned cues are literal phrases matched as whole words. */
export function learnedCueRules(entries: readonly PatternEntry[], weight: number): CueRule[] {
  return entries.map((e) => ({
    id: `learned:${e.pattern}`,
    type: e.type,
    pattern: new RegExp(`(?<![\\p{L}\\p{N}])${escapeReg(e.pattern)}(?![\\p{L}\\p{N}])`, 'iu'),
    weight
  }))
}

export function typePriority(type: NodeType) {
  return NODE_TYPES.indexOf(type)
}

/** Lowest-priority type, assigned when nothing matched at all. */
export const DEFAULT_NODE_TYPE: NodeType = NODE_TYPES[NODE_TYPES.length - 1]

export function sectionPrior(priors: ImradConfig['sectionPriors'], section: Section, type: NodeType) {
  return priors[section]?.[type] ?? 1.0
}

export interface CuePhraseClassifierOptions {
  sectionPriors: ImradConfig['sectionPriors']
  cues?: CueRule[]
  /** pattern-store snapshot taken when the run starts */
  learned?: readonly PatternEntry[]
  learnedWeight?: number
}

/**
 * Scores a sentence against per-type cue patterns weighted by section priors.
 * Output depends only on (sentence, section, cue table, learned snapshot).
 */
export class CuePhraseClassifier {
  private readonly rules: CueRule[]
  private readonly priors: ImradConfig['sectionPriors']

  constructor(opts: CuePhraseClassifierOptions) {
    this.priors = opts.sectionPriors
    this.rules = [...(opts.cues ?? builtinCues), ...learnedCueRules(opts.learned ?? [], opts.learnedWeight ?? 1.0)]
  }

  get ruleCount() {
    return this.rules.length
  }

  /**
   * Ranked (type, score) candidates for the sentence. Only types with at least
   * one matching cue are returned; equal scores rank by type priority.
   */
  classify(sentence: string, section: Section): Candidate[] {
    const sums = new Map<NodeType, { raw: number; evidence: string[] }>()
    for (const rule of this.rules) {
      if (!rule.pattern.test(sentence)) continue
      const acc = sums.get(rule.type) ?? { raw: 0, evidence: [] }
      acc.raw += rule.weight
      acc.evidence.push(rule.id)
      sums.set(rule.type, acc)
    }

    const candidates: Candidate[] = []
    for (const [type, { raw, evidence }] of sums) {
      candidates.push({ type, score: raw * sectionPrior(this.priors, section, type), evidence })
    }
    return candidates.sort((a, b) => b.score - a.score || typePriority(a.type) - typePriority(b.type))
  }
}

import { createLogger } from '../logger'
import type { PatternStore } from './patternStore'
import { isContentToken, tokenize } from './text'
import type { ImradConfig, NodeType, PatternEntry } from './types'

const log = createLogger('learner')

export interface AcceptedDecision {
  sentence: string
  type: NodeType
  confidence: number
}

export interface LearnReport {
  added: PatternEntry[]
  persisted: boolean
}

type LearningConfig = Pick<ImradConfig['learning'], 'maxCuesPerSentence' | 'maxNgram'>

/**
 * Short lexical cues most specific to the sentence: a leading "we <verb>" or
 * "these <noun>" phrase first, then runs of content words (longer runs and
 * longer words first). A cue contained in one already chosen is skipped.
 */
export function extractCues(sentence: string, cfg: LearningConfig): string[] {
  const tokens = tokenize(sentence)
  const anchored: string[] = []
  for (let i = 0; i + 1 < tokens.length; i++) {
    if (['we', 'this', 'these'].includes(tokens[i]) && isContentToken(tokens[i + 1])) {
      anchored.push(`${tokens[i]} ${tokens[i + 1]}`)
    }
  }

  const grams: Array<{ text: string; n: number; avgLen: number; pos: number }> = []
  for (let n = Math.max(1, cfg.maxNgram); n >= 1; n--) {
    for (let i = 0; i + n <= tokens.length; i++) {
      const window = tokens.slice(i, i + n)
      if (!window.every(isContentToken)) continue
      // single words only when long enough to be specific
      if (n === 1 && window[0].length < 6) continue
      const avgLen = window.reduce((sum, t) => sum + t.length, 0) / n
      grams.push({ text: window.join(' '), n, avgLen, pos: i })
    }
  }
  grams.sort((a, b) => b.n - a.n || b.avgLen - a.avgLen || a.pos - b.pos)

  const chosen: string[] = []
  for (const cue of [...anchored, ...grams.map((g) => g.text)]) {
    if (chosen.length >= cfg.maxCuesPerSentence) break
    if (chosen.some((c) => ` ${c} `.includes(` ${cue} `))) continue
    chosen.push(cue)
  }
  return chosen
}

export interface PatternLearnerOptions {
  runId: string
  config: LearningConfig
  clock?: () => Date
}

/** Turns accepted fallback decisions into pattern-store entries. */
export class PatternLearner {
  private readonly store: PatternStore
  private readonly opts: PatternLearnerOptions

  constructor(store: PatternStore, opts: PatternLearnerOptions) {
    this.store = store
    this.opts = opts
  }

  propose(decision: AcceptedDecision): PatternEntry[] {
    const timestamp = (this.opts.clock ?? (() => new Date()))().toISOString()
    return extractCues(decision.sentence, this.opts.config).map((pattern) => ({
      pattern,
      type: decision.type,
      run_id: this.opts.runId,
      timestamp
    }))
  }

  /**
   * Add cues for every decision and persist them. A failed write is logged
   * and reported; it never throws, so the run's results stand.
   */
  async learn(decisions: AcceptedDecision[]): Promise<LearnReport> {
    const added = decisions.flatMap((d) => this.store.add(this.propose(d)))
    if (added.length === 0) return { added, persisted: true }
    try {
      await this.store.save()
      log.debug(`learned ${added.length} cue(s) into ${this.store.filePath}`)
      return { added, persisted: true }
    } catch (err) {
      log.warn('pattern store write failed; learned cues kept for this process only:', err instanceof Error ? err.message : err)
      return { added, persisted: false }
    }
  }
}

import { createLogger } from '../logger'
import { InputError } from './errors'
import type { DocumentInput, Section, SectionSegment, SentenceRecord, TextSpan } from './types'

const log = createLogger('segment')

// Heading vocabulary: canonical IMRaD names plus common synonyms
const HEADING_SYNONYMS: Record<string, Section> = {
  abstract: 'Abstract',
  introduction: 'Introduction',
  background: 'Introduction',
  methods: 'Methods',
  method: 'Methods',
  'materials and methods': 'Methods',
  'material and methods': 'Methods',
  'methods and materials': 'Methods',
  methodology: 'Methods',
  'experimental procedures': 'Methods',
  'experimental section': 'Methods',
  results: 'Results',
  result: 'Results',
  findings: 'Results',
  'results and discussion': 'Results',
  discussion: 'Discussion',
  conclusion: 'Conclusion',
  conclusions: 'Conclusion',
  'concluding remarks': 'Conclusion',
  summary: 'Conclusion'
}

// "2.", "2.1", "II." or "A." prefixes in front of a heading
const HEADING_NUMBERING = /^(?:\d+(?:\.\d+)*\.?|[IVXLC]+\.|[A-Z]\.)\s+/

const ABBREVIATIONS = /(?:\be\.g\.|\bi\.e\.|\bet al\.|\bfig\.|\bfigs\.|\bvs\.|\bcf\.|\bapprox\.|\bref\.|\beq\.)$/i

export function normalizeText(text: string) {
  return text.replace(/\r\n?/g, '\n').replace(/\u00a0/g, ' ')
}

/**
 * Map a heading line or an extraction hint to a section label.
 * Returns undefined when the text is not a recognised heading.
 */
export function matchHeading(line: string): Section | undefined {
  const stripped = line
    .trim()
    .replace(HEADING_NUMBERING, '')
    .replace(/[:.]\s*$/, '')
    .replace(/\s+/g, ' ')
    .toLowerCase()
  if (!stripped || stripped.length > 40) return undefined
  return HEADING_SYNONYMS[stripped]
}

/**
 * Split a block of prose into sentences, preserving order. A paragraph break
 * always ends a sentence.
 */
export function sentenceSplit(text: string): string[] {
  const out: string[] = []
  const paragraphs = normalizeText(text).split(/\n\s*\n/)
  for (const paragraph of paragraphs) {
    const flat = paragraph.replace(/\s+/g, ' ').trim()
    if (!flat) continue
    const pieces = flat.split(/(?<=[.!?])\s+(?=[A-Z0-9("[])/)
    let pending = ''
    for (const piece of pieces) {
      pending = pending ? `${pending} ${piece}` : piece
      if (ABBREVIATIONS.test(pending)) continue
      out.push(pending.trim())
      pending = ''
    }
    if (pending.trim()) out.push(pending.trim())
  }
  return out
}

function pushSentences(segments: SectionSegment[], section: Section, lines: string[]) {
  const sentences = sentenceSplit(lines.join('\n'))
  if (sentences.length === 0) return
  const last = segments[segments.length - 1]
  if (last && last.section === section) last.sentences.push(...sentences)
  else segments.push({ section, sentences })
}

/**
 * Split document spans into ordered (section, sentences) segments. Text before
 * the first recognised heading is labelled Unknown. A span's section hint wins
 * over heading detection for that span; a hint outside the vocabulary
 * (References, Acknowledgements) labels the span Unknown.
 */
export function segmentDocument(spans: TextSpan[]): SectionSegment[] {
  const segments: SectionSegment[] = []
  let current: Section = 'Unknown'

  for (const span of spans) {
    if (span.section !== undefined) {
      const hinted = span.section.trim().toLowerCase() === 'unknown' ? 'Unknown' : matchHeading(span.section)
      if (!hinted) log.debug(`unrecognised section hint "${span.section}", labelling span Unknown`)
      current = hinted ?? 'Unknown'
      pushSentences(segments, current, [span.text])
      continue
    }

    let buffer: string[] = []
    for (const line of normalizeText(span.text).split('\n')) {
      const heading = matchHeading(line)
      if (heading) {
        pushSentences(segments, current, buffer)
        buffer = []
        current = heading
      } else {
        buffer.push(line)
      }
    }
    pushSentences(segments, current, buffer)
  }
  return segments
}

export function flattenSegments(segments: SectionSegment[]): SentenceRecord[] {
  const out: SentenceRecord[] = []
  for (const seg of segments) {
    for (const text of seg.sentences) out.push({ index: out.length, section: seg.section, text })
  }
  return out
}

export function validateDocument(doc: DocumentInput) {
  if (!doc.id || !doc.id.trim()) throw new InputError('document id is required')
  if (!Array.isArray(doc.spans) || doc.spans.length === 0) {
    throw new InputError(`document "${doc.id}" has no text spans`)
  }
  if (doc.spans.every((s) => !s.text || !s.text.trim())) {
    throw new InputError(`document "${doc.id}" is empty`)
  }
}

import { z } from 'zod'
import { callLLM, extractJSONObject } from '../llm'
import { FallbackError } from './errors'
import type { FallbackBackend, FallbackRequest, FallbackResponse } from './fallback'
import { NODE_TYPES, type NodeType } from './types'

export const imradOntology: Array<{ label: NodeType; explanation: string }> = [
  { label: 'Hypothesis', explanation: 'A claim, prediction or aim the study sets out to test.' },
  { label: 'Experiment', explanation: 'A procedure, treatment, intervention or measurement that was carried out.' },
  { label: 'Dataset', explanation: 'A source of data: cohorts, samples, sequencing runs, public repositories.' },
  { label: 'Analysis', explanation: 'A statistical or computational treatment of data and its direct outcome.' },
  { label: 'Conclusion', explanation: 'An interpretation, implication or take-away drawn from the results.' }
]

const replySchema = z.object({
  type: z.string(),
  confidence: z
    .union([z.number(), z.string().regex(/^\s*\d*\.?\d+\s*$/).transform(Number)])
    .pipe(z.number().min(0).max(1))
})

export function buildPrompt(request: FallbackRequest) {
  const ontologyText = imradOntology.map((m) => `- ${m.label}: ${m.explanation}`).join('\n')
  const systemPrompt = `You classify sentences from scientific papers into one of five roles. The possible roles are:\n${ontologyText}\n\nRespond with a single JSON object with two keys: "type" (one of ${NODE_TYPES.join(', ')}) and "confidence" (a number between 0 and 1). Do NOT output any other text.`

  const candidateText = request.candidates.length
    ? request.candidates.map((c) => `- ${c.type}: ${c.score.toFixed(2)}`).join('\n')
    : '- none matched'
  const userQuery = `Section: ${request.section}\n\nSentence:\n${request.sentence}\n\nRule-based candidates (type: score):\n${candidateText}`
  return { systemPrompt, userQuery }
}

const normalize = (s: string) => s.replace(/[^a-z0-9]+/gi, '').toLowerCase()

/** Map a free-form label onto the node type vocabulary, or undefined. */
export function normalizeLabel(label: string): NodeType | undefined {
  const n = normalize(label)
  if (!n) return undefined
  return NODE_TYPES.find((t) => normalize(t) === n || (n.length >= 4 && (normalize(t).startsWith(n) || n.startsWith(normalize(t)))))
}

/** Parse a raw model reply into a fallback response. */
export function parseReply(raw: string): FallbackResponse {
  const obj = extractJSONObject(raw)
  if (!obj) return { ok: false, error: new FallbackError('malformed', 'reply did not contain a JSON object') }
  const parsed = replySchema.safeParse(obj)
  if (!parsed.success) {
    return { ok: false, error: new FallbackError('malformed', `unexpected reply shape: ${parsed.error.issues[0]?.message}`) }
  }
  const type = normalizeLabel(parsed.data.type)
  if (!type) return { ok: false, error: new FallbackError('malformed', `unknown label "${parsed.data.type}"`) }
  return { ok: true, type, confidence: parsed.data.confidence }
}

export interface LLMFallbackOptions {
  model?: string
  host?: string
}

export function createLLMFallbackBackend(opts: LLMFallbackOptions = {}): FallbackBackend {
  const model = opts.model ?? 'llama3.1:8b'
  return {
    name: `ollama:${model}`,
    async classify(request, signal) {
      const { systemPrompt, userQuery } = buildPrompt(request)
      const res = await callLLM(systemPrompt, userQuery, { model, host: opts.host, json: true, signal })
      if (!res.success || res.data === undefined) {
        return { ok: false, error: new FallbackError('unavailable', res.error ?? 'LLM call failed or returned no data') }
      }
      return parseReply(res.data)
    }
  }
}

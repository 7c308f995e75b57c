import { beforeEach, describe, expect, it, vi } from 'vitest'

const { chat } = vi.hoisted(() => ({ chat: vi.fn() }))

vi.mock('ollama', () => ({
  Ollama: class {
    chat = chat
  }
}))

import { buildPrompt, createLLMFallbackBackend, normalizeLabel, parseReply } from './llmFallback'

function stream(content: string) {
  return {
    abort: vi.fn(),
    async *[Symbol.asyncIterator]() {
      yield { message: { content } }
    }
  }
}

beforeEach(() => {
  chat.mockReset()
})

describe('normalizeLabel', () => {
  it('maps case and punctuation variants onto node types', () => {
    expect(normalizeLabel('analysis.')).toBe('Analysis')
    expect(normalizeLabel(' DATASET ')).toBe('Dataset')
    expect(normalizeLabel('Conclusions')).toBe('Conclusion')
    expect(normalizeLabel('Hypo')).toBe('Hypothesis')
  })

  it('rejects unknown or too-short labels', () => {
    expect(normalizeLabel('Result')).toBeUndefined()
    expect(normalizeLabel('exp')).toBeUndefined()
    expect(normalizeLabel('')).toBeUndefined()
  })
})

describe('parseReply', () => {
  it('accepts a well-formed reply and coerces numeric strings', () => {
    expect(parseReply('{"type":"Dataset","confidence":"0.85"}')).toEqual({ ok: true, type: 'Dataset', confidence: 0.85 })
  })

  it('marks bad replies as malformed', () => {
    for (const raw of ['nothing useful', '{"type":"Dataset"}', '{"type":"Dataset","confidence":1.5}', '{"type":"Method","confidence":0.9}']) {
      const res = parseReply(raw)
      expect(res.ok).toBe(false)
      if (!res.ok) expect(res.error.kind).toBe('malformed')
    }
  })

  it('rejects non-numeric confidence values', () => {
    for (const confidence of ['true', 'null', '""', '"high"', '[0.9]']) {
      const res = parseReply(`{"type":"Dataset","confidence":${confidence}}`)
      expect(res.ok).toBe(false)
      if (!res.ok) expect(res.error.kind).toBe('malformed')
    }
  })
})

describe('buildPrompt', () => {
  it('includes section, sentence and candidate scores', () => {
    const { systemPrompt, userQuery } = buildPrompt({
      sentence: 'Tumours shrank after dosing.',
      section: 'Results',
      candidates: [{ type: 'Analysis', score: 1.5 }]
    })
    expect(systemPrompt).toContain('Hypothesis, Experiment, Dataset, Analysis, Conclusion')
    expect(userQuery).toBe(
      'Section: Results\n\nSentence:\nTumours shrank after dosing.\n\nRule-based candidates (type: score):\n- Analysis: 1.50'
    )
  })
})

describe('createLLMFallbackBackend', () => {
  const signal = new AbortController().signal
  const request = { sentence: 'Tumours shrank after dosing.', section: 'Results' as const, candidates: [] }

  it('classifies through the ollama client', async () => {
    chat.mockResolvedValue(stream('{"type":"analysis","confidence":0.9}'))
    const backend = createLLMFallbackBackend()
    expect(backend.name).toBe('ollama:llama3.1:8b')
    expect(await backend.classify(request, signal)).toEqual({ ok: true, type: 'Analysis', confidence: 0.9 })
  })

  it('reports an unreachable server as unavailable', async () => {
    chat.mockRejectedValue(new Error('fetch failed'))
    const res = await createLLMFallbackBackend({ model: 'qwen2.5:7b' }).classify(request, signal)
    expect(res.ok).toBe(false)
    if (!res.ok) {
      expect(res.error.kind).toBe('unavailable')
      expect(res.error.message).toBe('fetch failed')
    }
  })
})

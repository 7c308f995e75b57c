import { Ollama } from 'ollama'
import { z } from 'zod'
import { createLogger } from './logger'

const log = createLogger('llm')

const modelSettings: Record<string, { maxContext: number }> = {
  'llama3.2': {
    maxContext: 128000
  },
  'llama3.1:8b': {
    maxContext: 64000
  },
  'qwen2.5:7b': {
    maxContext: 32000
  }
}

const MODEL_MAX_CTX = 8192

export type LLMResponse = {
  success: boolean
  data?: string
  error?: string
}

export interface LLMCallOptions {
  model?: string
  host?: string
  /** ask the model for a JSON document */
  json?: boolean
  signal?: AbortSignal
}

const jsonObject = z.record(z.string(), z.unknown())

/**
 * Pull the first parseable JSON object out of a model reply. Models sometimes
 * wrap the object in prose or a code fence.
 */
export function extractJSONObject(raw: string): Record<string, unknown> | null {
  const candidates = [raw.trim()]
  const fenced = raw.match(/```(?:json)?\s*([\s\S]*?)```/i)
  if (fenced) candidates.push(fenced[1].trim())
  candidates.push(...Array.from(raw.matchAll(/(\{[\s\S]*?\})/g)).map((m) => m[1]))

  for (const text of candidates) {
    try {
      const parsed = jsonObject.safeParse(JSON.parse(text))
      if (parsed.success) return parsed.data
    } catch {
      // not JSON, try the next candidate
    }
  }
  return null
}

const clients = new Map<string, Ollama>()

function clientFor(host: string) {
  let client = clients.get(host)
  if (!client) {
    client = new Ollama({ host })
    clients.set(host, client)
  }
  return client
}

async function callOllama(systemPrompt: string, userQuery: string, opts: Required<Omit<LLMCallOptions, 'signal'>> & { signal?: AbortSignal }) {
  const response = await clientFor(opts.host).chat({
    model: opts.model,
    options: {
      num_ctx: modelSettings[opts.model]?.maxContext ?? MODEL_MAX_CTX,
      temperature: 0
    },
    format: opts.json ? 'json' : undefined,
    stream: true,
    messages: [
      { role: 'system', content: systemPrompt },
      { role: 'user', content: userQuery }
    ]
  })

  // the signal may have fired while chat() was still connecting
  if (opts.signal?.aborted) {
    response.abort()
    throw new Error('LLM request aborted')
  }
  const abort = () => response.abort()
  opts.signal?.addEventListener('abort', abort, { once: true })
  let fullMessage = ''
  try {
    for await (const chunk of response) {
      if (chunk.message?.content) {
        fullMessage += chunk.message.content
      }
    }
  } finally {
    opts.signal?.removeEventListener('abort', abort)
  }
  return fullMessage
}

/**
 * callLLM - single chat round-trip against a local ollama server.
 * Retrying is left to the caller, which knows which failures are transient.
 */
export async function callLLM(systemPrompt: string, userQuery: string, opts: LLMCallOptions = {}): Promise<LLMResponse> {
  const model = opts.model ?? 'llama3.1:8b'
  const tokenCount = `${systemPrompt}\n${userQuery}`.length / 4 // rough estimate
  const maxContext = modelSettings[model]?.maxContext ?? MODEL_MAX_CTX

  log.debug('LLM token count', tokenCount)
  if (tokenCount > maxContext) {
    log.warn(`LLM prompt token count (${tokenCount}) exceeds model max context (${maxContext}).`)
  }

  try {
    const raw = await callOllama(systemPrompt, userQuery, {
      model,
      host: opts.host ?? 'http://127.0.0.1:11434',
      json: opts.json ?? false,
      signal: opts.signal
    })
    log.debug('LLM raw response', raw)
    return { success: true, data: raw }
  } catch (err) {
    log.debug('LLM call failed', err)
    return { success: false, error: err instanceof Error ? err.message : String(err) }
  }
}

import { createLogger } from '../logger'
import { isAcceptable } from './confidence'
import { FallbackError } from './errors'
import type { ImradConfig, NodeType, Section } from './types'

const log = createLogger('fallback')

export interface FallbackRequest {
  sentence: string
  section: Section
  /** top-N rule candidates, best first */
  candidates: Array<{ type: NodeType; score: number }>
}

export type FallbackResponse =
  | { ok: true; type: NodeType; confidence: number }
  | { ok: false; error: FallbackError }

/**
 * The one network-shaped dependency of the engine. Implementations may be an
 * LLM, a rule-expansion service or a human review queue.
 */
export interface FallbackBackend {
  readonly name: string
  classify(request: FallbackRequest, signal: AbortSignal): Promise<FallbackResponse>
}

export type FallbackOutcome =
  | { status: 'accepted'; type: NodeType; confidence: number; attempts: number }
  | { status: 'rejected'; type: NodeType; confidence: number; attempts: number }
  | { status: 'failed'; error: FallbackError; attempts: number }

type FallbackSettings = ImradConfig['fallback'] & Pick<ImradConfig['confidence'], 'acceptanceThreshold'>

function sleep(ms: number, signal?: AbortSignal) {
  return new Promise<void>((resolve) => {
    if (signal?.aborted) return resolve()
    const timer = setTimeout(done, ms)
    function done() {
      clearTimeout(timer)
      signal?.removeEventListener('abort', done)
      resolve()
    }
    signal?.addEventListener('abort', done, { once: true })
  })
}

function toFallbackError(err: unknown): FallbackError {
  if (err instanceof FallbackError) return err
  const message = err instanceof Error ? err.message : String(err)
  return new FallbackError('unavailable', message)
}

export class FallbackClassifier {
  readonly backend: FallbackBackend
  private readonly settings: FallbackSettings

  constructor(backend: FallbackBackend, settings: FallbackSettings) {
    this.backend = backend
    this.settings = settings
  }

  /** One backend call bounded by the per-call timeout and the caller's signal. */
  private async attempt(request: FallbackRequest, outer?: AbortSignal): Promise<FallbackResponse> {
    if (outer?.aborted) return { ok: false, error: new FallbackError('cancelled', 'fallback cancelled') }

    const controller = new AbortController()
    let onAbort: (() => void) | undefined
    let timer: NodeJS.Timeout | undefined

    const interrupted = new Promise<FallbackResponse>((resolve) => {
      timer = setTimeout(() => {
        controller.abort()
        resolve({ ok: false, error: new FallbackError('timeout', `no answer within ${this.settings.timeoutMs}ms`) })
      }, this.settings.timeoutMs)
      onAbort = () => {
        controller.abort()
        resolve({ ok: false, error: new FallbackError('cancelled', 'fallback cancelled') })
      }
      outer?.addEventListener('abort', onAbort, { once: true })
    })

    const call = this.backend
      .classify(request, controller.signal)
      .catch((err: unknown): FallbackResponse => ({ ok: false, error: toFallbackError(err) }))

    try {
      return await Promise.race([call, interrupted])
    } finally {
      clearTimeout(timer)
      if (onAbort) outer?.removeEventListener('abort', onAbort)
    }
  }

  /**
   * Classify one sentence, retrying transient failures with linear backoff.
   * Safe to call again with the same request.
   */
  async resolve(request: FallbackRequest, signal?: AbortSignal): Promise<FallbackOutcome> {
    const { retries, backoffMs } = this.settings
    let lastError = new FallbackError('unavailable', 'no attempt made')
    let attempts = 0
    for (let attempt = 0; attempt <= retries; attempt++) {
      attempts++
      const res = await this.attempt(request, signal)
      if (res.ok) {
        const status = isAcceptable(res.confidence, this.settings) ? 'accepted' : 'rejected'
        return { status, type: res.type, confidence: res.confidence, attempts }
      }
      lastError = res.error
      log.debug(`fallback attempt ${attempt} via ${this.backend.name} failed`, res.error.kind, res.error.message)
      if (!res.error.transient || attempt === retries) break
      await sleep(backoffMs * (attempt + 1), signal)
    }
    return { status: 'failed', error: lastError, attempts }
  }

  /**
   * Resolve many requests with bounded concurrency. The result array lines up
   * with the input array regardless of completion order.
   */
  async resolveAll(requests: FallbackRequest[], signal?: AbortSignal): Promise<FallbackOutcome[]> {
    const results: FallbackOutcome[] = new Array(requests.length)
    const batchSize = Math.max(1, this.settings.concurrency)
    for (let i = 0; i < requests.length; i += batchSize) {
      const batch = requests.slice(i, i + batchSize)
      const outcomes = await Promise.all(batch.map((r) => this.resolve(r, signal)))
      outcomes.forEach((o, j) => (results[i + j] = o))
    }
    return results
  }
}

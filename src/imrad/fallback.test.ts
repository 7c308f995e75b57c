import { describe, expect, it, vi } from 'vitest'
import { defaultConfig } from './config'
import { FallbackError } from './errors'
import { FallbackClassifier, type FallbackBackend, type FallbackRequest, type FallbackResponse } from './fallback'

const settings = {
  ...defaultConfig.fallback,
  timeoutMs: 30,
  backoffMs: 1,
  retries: 2,
  acceptanceThreshold: 0.6
}

const request: FallbackRequest = { sentence: 'Some sentence to classify here.', section: 'Results', candidates: [] }

function backend(classify: FallbackBackend['classify']): FallbackBackend {
  return { name: 'fake', classify }
}

const never = (_req: FallbackRequest, signal: AbortSignal) =>
  new Promise<FallbackResponse>((resolve) => {
    signal.addEventListener('abort', () => resolve({ ok: false, error: new FallbackError('cancelled', 'aborted') }))
  })

describe('FallbackClassifier.resolve', () => {
  it('accepts an answer at or above the acceptance threshold', async () => {
    const fc = new FallbackClassifier(backend(async () => ({ ok: true, type: 'Analysis', confidence: 0.9 })), settings)
    expect(await fc.resolve(request)).toEqual({ status: 'accepted', type: 'Analysis', confidence: 0.9, attempts: 1 })
  })

  it('rejects an answer below the acceptance threshold', async () => {
    const fc = new FallbackClassifier(backend(async () => ({ ok: true, type: 'Analysis', confidence: 0.3 })), settings)
    expect(await fc.resolve(request)).toEqual({ status: 'rejected', type: 'Analysis', confidence: 0.3, attempts: 1 })
  })

  it('times out, aborts the call and retries up to the limit', async () => {
    const signals: AbortSignal[] = []
    const fc = new FallbackClassifier(
      backend((req, signal) => {
        signals.push(signal)
        return never(req, signal)
      }),
      settings
    )
    const outcome = await fc.resolve(request)
    expect(outcome.status).toBe('failed')
    expect(outcome.attempts).toBe(3)
    if (outcome.status === 'failed') expect(outcome.error.kind).toBe('timeout')
    expect(signals.every((s) => s.aborted)).toBe(true)
  })

  it('retries a transient failure and then succeeds', async () => {
    const classify = vi
      .fn<FallbackBackend['classify']>()
      .mockResolvedValueOnce({ ok: false, error: new FallbackError('unavailable', 'connection refused') })
      .mockResolvedValueOnce({ ok: true, type: 'Dataset', confidence: 0.8 })
    const fc = new FallbackClassifier(backend(classify), settings)
    expect(await fc.resolve(request)).toEqual({ status: 'accepted', type: 'Dataset', confidence: 0.8, attempts: 2 })
    expect(classify).toHaveBeenCalledTimes(2)
  })

  it('does not retry a malformed reply', async () => {
    const classify = vi.fn<FallbackBackend['classify']>(async () => ({
      ok: false,
      error: new FallbackError('malformed', 'no JSON')
    }))
    const fc = new FallbackClassifier(backend(classify), settings)
    const outcome = await fc.resolve(request)
    expect(outcome.status).toBe('failed')
    expect(classify).toHaveBeenCalledTimes(1)
  })

  it('turns a thrown backend error into an unavailable failure', async () => {
    const fc = new FallbackClassifier(
      backend(async () => {
        throw new Error('socket hang up')
      }),
      { ...settings, retries: 0 }
    )
    const outcome = await fc.resolve(request)
    expect(outcome).toMatchObject({ status: 'failed', attempts: 1 })
    if (outcome.status === 'failed') {
      expect(outcome.error.kind).toBe('unavailable')
      expect(outcome.error.message).toBe('socket hang up')
    }
  })

  it('reports cancellation when the caller aborts mid-call', async () => {
    const controller = new AbortController()
    const fc = new FallbackClassifier(backend(never), { ...settings, timeoutMs: 5_000 })
    const pending = fc.resolve(request, controller.signal)
    setTimeout(() => controller.abort(), 5)
    const outcome = await pending
    expect(outcome.status).toBe('failed')
    if (outcome.status === 'failed') expect(outcome.error.kind).toBe('cancelled')
    expect(outcome.attempts).toBe(1)
  })

  it('does not call the backend when already cancelled', async () => {
    const classify = vi.fn<FallbackBackend['classify']>()
    const controller = new AbortController()
    controller.abort()
    const outcome = await new FallbackClassifier(backend(classify), settings).resolve(request, controller.signal)
    expect(outcome.status).toBe('failed')
    expect(classify).not.toHaveBeenCalled()
  })
})

describe('FallbackClassifier.resolveAll', () => {
  it('keeps input order regardless of completion order and bounds concurrency', async () => {
    let inFlight = 0
    let maxInFlight = 0
    const delays = [25, 5, 15, 1, 10]
    const fc = new FallbackClassifier(
      backend(async (req) => {
        inFlight++
        maxInFlight = Math.max(maxInFlight, inFlight)
        const i = Number(req.sentence)
        await new Promise((r) => setTimeout(r, delays[i]))
        inFlight--
        return { ok: true, type: i % 2 ? 'Dataset' : 'Analysis', confidence: 0.5 + i / 10 }
      }),
      { ...settings, timeoutMs: 1_000, concurrency: 2 }
    )
    const requests = delays.map((_, i) => ({ ...request, sentence: String(i) }))
    const outcomes = await fc.resolveAll(requests)
    expect(outcomes.map((o) => (o.status === 'failed' ? 'failed' : o.confidence))).toEqual([0.5, 0.6, 0.7, 0.8, 0.9])
    expect(outcomes.map((o) => o.status)).toEqual(['rejected', 'accepted', 'accepted', 'accepted', 'accepted'])
    expect(maxInFlight).toBe(2)
  })

  it('isolates failures to their own sentence', async () => {
    const fc = new FallbackClassifier(
      backend(async (req) =>
        req.sentence === 'bad'
          ? { ok: false, error: new FallbackError('malformed', 'nope') }
          : { ok: true, type: 'Hypothesis', confidence: 0.7 }
      ),
      settings
    )
    const outcomes = await fc.resolveAll([
      { ...request, sentence: 'good' },
      { ...request, sentence: 'bad' },
      { ...request, sentence: 'good' }
    ])
    expect(outcomes.map((o) => o.status)).toEqual(['accepted', 'failed', 'accepted'])
  })
})

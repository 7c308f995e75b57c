import appRootPath from 'app-root-path'
import dotenv from 'dotenv-flow'
import path from 'path'
import { z } from 'zod'
import type { ConfigOverrides } from './imrad/config'
import type { FallbackBackend } from './imrad/fallback'
import { createLLMFallbackBackend } from './imrad/llmFallback'

let loaded = false

/** Loads `.env`, `.env.local`, `.env.<NODE_ENV>` ... from the project root once. */
export function loadEnv() {
  if (loaded) return
  dotenv.config({ path: path.resolve(appRootPath.path), silent: true })
  loaded = true
}

const unit = z.coerce.number().min(0).max(1)
const positiveInt = z.coerce.number().int().positive()

// unset or invalid values leave the default in place
function pick<T>(schema: z.ZodType<T>, value: string | undefined): T | undefined {
  if (value === undefined || value.trim() === '') return undefined
  const parsed = schema.safeParse(value)
  return parsed.success ? parsed.data : undefined
}

export interface EnvSettings {
  overrides: ConfigOverrides
  provider: 'ollama' | 'none'
  model?: string
  host?: string
}

export function readEnvSettings(env: NodeJS.ProcessEnv = process.env): EnvSettings {
  const confidence: Partial<{ lowConfidenceThreshold: number; acceptanceThreshold: number }> = {}
  const low = pick(unit, env.IMRAD_LOW_CONFIDENCE)
  if (low !== undefined) confidence.lowConfidenceThreshold = low
  const accept = pick(unit, env.IMRAD_ACCEPT_CONFIDENCE)
  if (accept !== undefined) confidence.acceptanceThreshold = accept

  const fallback: Partial<{ timeoutMs: number; concurrency: number }> = {}
  const timeoutMs = pick(positiveInt, env.IMRAD_FALLBACK_TIMEOUT_MS)
  if (timeoutMs !== undefined) fallback.timeoutMs = timeoutMs
  const concurrency = pick(positiveInt, env.IMRAD_FALLBACK_CONCURRENCY)
  if (concurrency !== undefined) fallback.concurrency = concurrency

  const overrides: ConfigOverrides = { confidence, fallback }
  if (env.IMRAD_PATTERN_STORE) overrides.patternStorePath = path.resolve(env.IMRAD_PATTERN_STORE)

  return {
    overrides,
    provider: env.IMRAD_FALLBACK_PROVIDER?.trim().toLowerCase() === 'none' ? 'none' : 'ollama',
    model: env.IMRAD_FALLBACK_MODEL || undefined,
    host: env.OLLAMA_HOST || undefined
  }
}

export function createBackend(settings: EnvSettings): FallbackBackend | undefined {
  if (settings.provider === 'none') return undefined
  return createLLMFallbackBackend({ model: settings.model, host: settings.host })
}

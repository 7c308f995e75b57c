declare namespace NodeJS {
  interface ProcessEnv {
    OLLAMA_HOST?: string
    IMRAD_FALLBACK_MODEL?: string
    IMRAD_FALLBACK_PROVIDER?: string
    IMRAD_PATTERN_STORE?: string
    IMRAD_LOW_CONFIDENCE?: string
    IMRAD_ACCEPT_CONFIDENCE?: string
    IMRAD_FALLBACK_TIMEOUT_MS?: string
    IMRAD_FALLBACK_CONCURRENCY?: string
    DEV_LOG?: string
  }
}

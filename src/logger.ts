export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const DEV_LOG =
  process.env.NODE_ENV === 'development' ||
  process.env.DEV_LOG === '1' ||
  process.env.DEV_LOG === 'true' ||
  !!process.env.TEST

export interface Logger {
  debug(...args: unknown[]): void
  info(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void
  child(scope: string): Logger
}

// console is looked up on every call so test spies see the output
const sinks: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args)
}

/** Console logger with `[level] [scope]` prefixes; debug output only when DEV_LOG is on. */
export function createLogger(scope?: string): Logger {
  const prefix = (level: LogLevel) => (scope ? [`[${level}]`, `[${scope}]`] : [`[${level}]`])
  return {
    debug: (...args) => {
      if (DEV_LOG) sinks.debug(...prefix('debug'), ...args)
    },
    info: (...args) => sinks.info(...prefix('info'), ...args),
    warn: (...args) => sinks.warn(...prefix('warn'), ...args),
    error: (...args) => sinks.error(...prefix('error'), ...args),
    child: (name) => createLogger(scope ? `${scope}:${name}` : name)
  }
}

import type { ImradEdge } from './types'

/** Malformed or empty document input. No partial graph is produced. */
export class InputError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InputError'
  }
}

/** An edge references a node that is not in the final node set, or two nodes share an id. */
export class GraphConsistencyError extends Error {
  readonly edge?: ImradEdge

  constructor(message: string, edge?: ImradEdge) {
    super(message)
    this.name = 'GraphConsistencyError'
    this.edge = edge
  }
}

export type FallbackErrorKind = 'timeout' | 'unavailable' | 'malformed' | 'cancelled'

export class FallbackError extends Error {
  readonly kind: FallbackErrorKind

  constructor(kind: FallbackErrorKind, message: string) {
    super(message)
    this.name = 'FallbackError'
    this.kind = kind
  }

  /** timeouts and outages are worth another attempt, bad payloads are not */
  get transient() {
    return this.kind === 'timeout' || this.kind === 'unavailable'
  }
}

export class PatternStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PatternStoreError'
  }
}

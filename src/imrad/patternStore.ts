import fsp from 'fs/promises'
import { atomicWrite } from '../interfaces/atomicWrite'
import { withFileLock, type FileLockOptions } from '../interfaces/fileLock'
import { PatternStoreError } from './errors'
import { patternStoreFileSchema } from './schemas'
import type { NodeType, PatternEntry } from './types'

export const PATTERN_STORE_VERSION = 1

const keyOf = (pattern: string, type: NodeType) => `${type}\u0000${pattern.toLowerCase()}`

function errorCode(err: unknown) {
  return err && typeof err === 'object' && 'code' in err ? String(err.code) : undefined
}

async function readEntries(filePath: string): Promise<PatternEntry[]> {
  let raw: string
  try {
    raw = await fsp.readFile(filePath, 'utf8')
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return []
    throw new PatternStoreError(`cannot read pattern store ${filePath}`, { cause: err })
  }
  if (!raw.trim()) return []
  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (err) {
    throw new PatternStoreError(`pattern store ${filePath} is not valid JSON`, { cause: err })
  }
  const parsed = patternStoreFileSchema.safeParse(json)
  if (!parsed.success) {
    throw new PatternStoreError(`pattern store ${filePath} has an unexpected shape: ${parsed.error.issues[0]?.message}`)
  }
  return parsed.data.entries
}

// Serialises writers inside this process; the lock file covers other processes
const writeQueues = new Map<string, Promise<unknown>>()

function enqueue<T>(filePath: string, task: () => Promise<T>): Promise<T> {
  const previous = writeQueues.get(filePath) ?? Promise.resolve()
  const next = previous.then(task, task)
  writeQueues.set(
    filePath,
    next.catch(() => undefined)
  )
  return next
}

/**
 * Learned cue patterns keyed by (pattern, type). Entries are append-mostly:
 * adding an existing pair is a no-op and nothing is removed except through
 * an explicit remove() call.
 */
export class PatternStore {
  readonly filePath: string
  private readonly entries = new Map<string, PatternEntry>()
  private readonly removed = new Set<string>()
  // added since load; the only entries save() contributes to the file
  private readonly pending = new Set<string>()
  private readonly lockOptions?: FileLockOptions

  constructor(filePath: string, entries: PatternEntry[] = [], lockOptions?: FileLockOptions) {
    this.filePath = filePath
    this.lockOptions = lockOptions
    this.add(entries)
  }

  static async load(filePath: string, lockOptions?: FileLockOptions) {
    const store = new PatternStore(filePath, [], lockOptions)
    for (const e of await readEntries(filePath)) store.insert(e)
    return store
  }

  private insert(entry: PatternEntry) {
    const key = keyOf(entry.pattern, entry.type)
    if (this.entries.has(key)) return false
    this.entries.set(key, { ...entry })
    return true
  }

  get size() {
    return this.entries.size
  }

  has(pattern: string, type: NodeType) {
    return this.entries.has(keyOf(pattern, type))
  }

  /** Immutable copy for a classifier run. */
  snapshot(): readonly PatternEntry[] {
    return Object.freeze(Array.from(this.entries.values(), (e) => Object.freeze({ ...e })))
  }

  /** Adds pairs not yet present; returns the entries that were new. */
  add(entries: PatternEntry[]): PatternEntry[] {
    const added: PatternEntry[] = []
    for (const e of entries) {
      const key = keyOf(e.pattern, e.type)
      this.removed.delete(key)
      if (this.insert(e)) {
        this.pending.add(key)
        added.push(e)
      }
    }
    return added
  }

  /** Manual hygiene action. */
  remove(pattern: string, type: NodeType) {
    const key = keyOf(pattern, type)
    this.removed.add(key)
    this.pending.delete(key)
    return this.entries.delete(key)
  }

  /**
   * Re-read the file under the lock, add the entries added here since load
   * and write the result back. Entries already on disk win over ours for the
   * same pair, so earlier provenance is never overwritten, and an entry
   * another writer removed stays removed.
   */
  async save(): Promise<void> {
    await enqueue(this.filePath, () =>
      withFileLock(
        this.filePath,
        async () => {
          const flushing = new Set(this.pending)
          const removed = new Set(this.removed)
          const onDisk = await readEntries(this.filePath)
          const merged = new Map<string, PatternEntry>()
          for (const e of onDisk) {
            const key = keyOf(e.pattern, e.type)
            if (!removed.has(key) && !merged.has(key)) merged.set(key, e)
          }
          for (const key of flushing) {
            const e = this.entries.get(key)
            if (e && !merged.has(key)) merged.set(key, e)
          }

          const body = { version: PATTERN_STORE_VERSION, entries: Array.from(merged.values()) }
          await atomicWrite(this.filePath, JSON.stringify(body, null, 2) + '\n')

          for (const key of flushing) this.pending.delete(key)
          for (const key of removed) this.removed.delete(key)
          // keep entries added while this save was in flight
          for (const key of this.pending) {
            const e = this.entries.get(key)
            if (e && !merged.has(key)) merged.set(key, e)
          }
          for (const key of this.removed) merged.delete(key)
          this.entries.clear()
          for (const [key, e] of merged) this.entries.set(key, e)
        },
        this.lockOptions
      )
    )
  }
}

import fsp from 'fs/promises'
import path from 'path'

export interface FileLockOptions {
  timeoutMs?: number
  pollIntervalMs?: number
  /** locks older than this are considered abandoned by a crashed writer */
  staleMs?: number
}

export interface FileLockHandle {
  lockPath: string
  release: () => Promise<void>
}

interface LockState {
  pid: number
  startedAt: number
  /** distinguishes holders inside one process */
  token?: string
}

const DEFAULT_TIMEOUT_MS = 10_000
const DEFAULT_POLL_INTERVAL_MS = 50
const DEFAULT_STALE_MS = 30_000

function errorCode(err: unknown) {
  return err && typeof err === 'object' && 'code' in err ? String(err.code) : undefined
}

async function readLockState(lockPath: string): Promise<LockState | null> {
  try {
    const parsed: unknown = JSON.parse(await fsp.readFile(lockPath, 'utf8'))
    if (
      parsed &&
      typeof parsed === 'object' &&
      'pid' in parsed &&
      'startedAt' in parsed &&
      typeof parsed.pid === 'number' &&
      typeof parsed.startedAt === 'number'
    ) {
      const token = 'token' in parsed && typeof parsed.token === 'string' ? parsed.token : undefined
      return { pid: parsed.pid, startedAt: parsed.startedAt, token }
    }
    return null
  } catch {
    // missing or half-written lock file
    return null
  }
}

function isPidAlive(pid: number) {
  if (!Number.isFinite(pid) || pid <= 0) return false
  try {
    process.kill(pid, 0)
    return true
  } catch {
    return false
  }
}

async function removeLockFile(lockPath: string) {
  try {
    await fsp.unlink(lockPath)
  } catch (err) {
    if (errorCode(err) !== 'ENOENT') throw err
  }
}

const ownedBy = (current: LockState | null, expected: LockState) =>
  current !== null && current.pid === expected.pid && current.token === expected.token

async function releaseIfOwned(lockPath: string, expected: LockState) {
  if (!ownedBy(await readLockState(lockPath), expected)) return
  await removeLockFile(lockPath)
}

let lockSeq = 0

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

/**
 * Cross-process mutual exclusion through an exclusively created lock file
 * next to the protected file.
 */
export async function acquireFileLock(targetPath: string, opts: FileLockOptions = {}): Promise<FileLockHandle> {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS
  const pollIntervalMs = opts.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS
  const staleMs = opts.staleMs ?? DEFAULT_STALE_MS
  const lockPath = `${targetPath}.lock`
  await fsp.mkdir(path.dirname(lockPath), { recursive: true })

  const deadline = Date.now() + timeoutMs
  for (;;) {
    const state: LockState = { pid: process.pid, startedAt: Date.now(), token: `${process.pid}-${++lockSeq}` }
    let created = false
    try {
      await fsp.writeFile(lockPath, JSON.stringify(state), { encoding: 'utf8', flag: 'wx' })
      created = true
    } catch (err) {
      if (errorCode(err) !== 'EEXIST') throw err
    }
    // a waiter breaking a stale lock can unlink ours between write and return
    if (created && ownedBy(await readLockState(lockPath), state)) {
      return { lockPath, release: () => releaseIfOwned(lockPath, state) }
    }

    const existing = await readLockState(lockPath)
    const abandoned =
      existing !== null && (Date.now() - existing.startedAt > staleMs || !isPidAlive(existing.pid))
    if (abandoned) {
      await removeLockFile(lockPath)
      continue
    }
    if (Date.now() >= deadline) throw new Error(`timed out waiting for lock ${lockPath}`)
    await sleep(pollIntervalMs)
  }
}

export async function withFileLock<T>(targetPath: string, fn: () => Promise<T>, opts?: FileLockOptions): Promise<T> {
  const lock = await acquireFileLock(targetPath, opts)
  try {
    return await fn()
  } finally {
    await lock.release()
  }
}

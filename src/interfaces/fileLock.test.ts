import fsp from 'fs/promises'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { acquireFileLock, withFileLock } from './fileLock'

let dir: string
let target: string

beforeEach(async () => {
  dir = await fsp.mkdtemp(path.join(os.tmpdir(), 'imrad-lock-'))
  target = path.join(dir, 'store.json')
})

afterEach(async () => {
  await fsp.rm(dir, { recursive: true, force: true })
})

describe('file lock', () => {
  it('creates and removes the lock file', async () => {
    const lock = await acquireFileLock(target)
    expect(lock.lockPath).toBe(`${target}.lock`)
    const state = JSON.parse(await fsp.readFile(lock.lockPath, 'utf8'))
    expect(state.pid).toBe(process.pid)
    await lock.release()
    await expect(fsp.access(lock.lockPath)).rejects.toThrow()
  })

  it('times out while another holder is alive', async () => {
    const lock = await acquireFileLock(target)
    await expect(acquireFileLock(target, { timeoutMs: 60, pollIntervalMs: 10 })).rejects.toThrow(/timed out/)
    await lock.release()
  })

  it('takes over a stale lock', async () => {
    await fsp.writeFile(`${target}.lock`, JSON.stringify({ pid: process.pid, startedAt: Date.now() - 60_000 }))
    const lock = await acquireFileLock(target, { timeoutMs: 100, staleMs: 1_000 })
    await lock.release()
  })

  it('leaves a lock taken over by another holder in place on release', async () => {
    const lock = await acquireFileLock(target)
    const other = { pid: process.pid, startedAt: Date.now(), token: 'other-holder' }
    await fsp.writeFile(lock.lockPath, JSON.stringify(other))
    await lock.release()
    expect(JSON.parse(await fsp.readFile(lock.lockPath, 'utf8'))).toEqual(other)
  })

  it('runs critical sections one at a time', async () => {
    const events: string[] = []
    const section = (name: string) =>
      withFileLock(
        target,
        async () => {
          events.push(`${name}:start`)
          await new Promise((r) => setTimeout(r, 20))
          events.push(`${name}:end`)
        },
        { pollIntervalMs: 5 }
      )
    await Promise.all([section('a'), section('b')])
    expect(events[1]).toBe(`${events[0].split(':')[0]}:end`)
    expect(events[3]).toBe(`${events[2].split(':')[0]}:end`)
  })

  it('releases the lock when the section throws', async () => {
    await expect(
      withFileLock(target, async () => {
        throw new Error('boom')
      })
    ).rejects.toThrow('boom')
    await expect(fsp.access(`${target}.lock`)).rejects.toThrow()
  })
})

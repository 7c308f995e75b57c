import { afterEach, describe, expect, it, vi } from 'vitest'
import { createLogger } from './logger'

afterEach(() => {
  vi.restoreAllMocks()
})

describe('createLogger', () => {
  it('prefixes level and scope', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    createLogger('store').warn('write failed', 3)
    expect(warn).toHaveBeenCalledWith('[warn]', '[store]', 'write failed', 3)
  })

  it('nests child scopes', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined)
    createLogger('pipeline').child('doc-1').error('boom')
    expect(error).toHaveBeenCalledWith('[error]', '[pipeline:doc-1]', 'boom')
  })

  it('omits the scope tag for the root logger', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined)
    createLogger().info('ready')
    expect(info).toHaveBeenCalledWith('[info]', 'ready')
  })
})

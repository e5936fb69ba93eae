import { afterEach, describe, expect, test, vi } from 'vitest'
import { createLogger, isDebugEnabled } from '../utils/logger'

describe('isDebugEnabled', () => {
  test('is off without debug variables', () => {
    expect(isDebugEnabled('agora:generate', {})).toBe(false)
  })

  test('AGORA_DEBUG=true turns every namespace on', () => {
    expect(isDebugEnabled('agora:generate', { AGORA_DEBUG: 'true' })).toBe(true)
  })

  test('DEBUG matches the project, a wildcard or the exact namespace', () => {
    expect(isDebugEnabled('agora:generate', { DEBUG: 'agora' })).toBe(true)
    expect(isDebugEnabled('agora:generate', { DEBUG: 'express, agora:*' })).toBe(true)
    expect(isDebugEnabled('agora:generate', { DEBUG: 'agora:generate' })).toBe(true)
    expect(isDebugEnabled('agora:generate', { DEBUG: 'agora:session' })).toBe(false)
  })
})

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  test('prefixes lines with the namespace', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const log = createLogger('cli', { env: {} })

    log.warn('Could not generate DAG diagram: EACCES')

    expect(log.namespace).toBe('agora:cli')
    expect(warn).toHaveBeenCalledWith('agora:cli Could not generate DAG diagram: EACCES')
  })

  test('appends the cause of an error', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    const log = createLogger('cli', { env: {} })

    log.error('FATAL: Cannot open log file out', new Error('EISDIR'))
    log.error('FATAL: no key')

    expect(error.mock.calls).toEqual([['agora:cli FATAL: Cannot open log file out (EISDIR)'], ['agora:cli FATAL: no key']])
  })

  test('debug lines print only when enabled', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})

    createLogger('generate', { env: {} }).debug('agent round 1 -> openai')
    createLogger('generate', { env: { DEBUG: 'agora:generate' } }).debug('agent round 1 -> openai', {
      promptLength: 42,
    })

    expect(error.mock.calls).toEqual([['agora:generate agent round 1 -> openai {"promptLength":42}']])
  })
})

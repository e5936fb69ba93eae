/**
 * Provider Tests
 */

import { describe, expect, test } from 'vitest'
import { AISDKProvider, DEFAULT_MODELS, providerFactory } from '../providers'

describe('AISDKProvider', () => {
  test('is named after its provider type', () => {
    expect(new AISDKProvider('openai').name).toBe('openai')
    expect(new AISDKProvider('google', { model: 'gemini-test' }).name).toBe('google')
  })

  test('is available only with an API key', async () => {
    await expect(new AISDKProvider('openai').isAvailable()).resolves.toBe(false)
    await expect(new AISDKProvider('openai', { apiKey: 'test-secret' }).isAvailable()).resolves.toBe(true)
  })

  test('defaults to gpt-4o for openai', () => {
    expect(DEFAULT_MODELS.openai).toBe('gpt-4o')
  })
})

describe('providerFactory', () => {
  test('creates providers by name and alias', () => {
    expect(providerFactory.create('openai').name).toBe('openai')
    expect(providerFactory.create('claude').name).toBe('anthropic')
    expect(providerFactory.create('gemini').name).toBe('google')
  })

  test('lists registered names', () => {
    expect(providerFactory.list()).toEqual(expect.arrayContaining(['openai', 'anthropic', 'claude', 'google', 'gemini']))
  })

  test('throws for an unknown provider', () => {
    expect(() => providerFactory.create('nope')).toThrow('Unknown provider: nope')
  })
})

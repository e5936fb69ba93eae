/**
 * Providers Module
 *
 * Re-exports provider implementations and types.
 */

export type { Provider, ProviderConfig, ProviderFactory, ProviderResponse } from './types'

export { AISDKProvider, type AISDKProviderType, DEFAULT_MODELS, DEFAULT_TEMPERATURE } from './ai-sdk'

import { AISDKProvider, type AISDKProviderType } from './ai-sdk'
import type { Provider, ProviderConfig, ProviderFactory } from './types'

const sdkProvider = (type: AISDKProviderType) =>
  class extends AISDKProvider {
    constructor(config?: ProviderConfig) {
      super(type, config)
    }
  }

const providers = new Map<string, new (config?: ProviderConfig) => Provider>([
  ['openai', sdkProvider('openai')],
  ['anthropic', sdkProvider('anthropic')],
  ['claude', sdkProvider('anthropic')], // Alias
  ['google', sdkProvider('google')],
  ['gemini', sdkProvider('google')], // Alias
])

export const providerFactory: ProviderFactory = {
  create(name: string, config?: ProviderConfig): Provider {
    const ProviderClass = providers.get(name)
    if (!ProviderClass) {
      throw new Error(`Unknown provider: ${name}. Available: ${[...providers.keys()].join(', ')}`)
    }
    return new ProviderClass(config)
  },

  list(): string[] {
    return [...providers.keys()]
  },
}

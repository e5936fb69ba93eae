/**
 * AI SDK Provider
 *
 * Generation through the Vercel AI SDK for OpenAI, Anthropic and Google.
 */

import { createAnthropic } from '@ai-sdk/anthropic'
import { createGoogleGenerativeAI } from '@ai-sdk/google'
import { createOpenAI } from '@ai-sdk/openai'
import { generateText, type LanguageModel } from 'ai'
import type { Provider, ProviderConfig, ProviderResponse } from '../types'

export type AISDKProviderType = 'openai' | 'anthropic' | 'google'

/**
 * Default models for each provider
 */
export const DEFAULT_MODELS: Record<AISDKProviderType, string> = {
  openai: 'gpt-4o',
  anthropic: 'claude-sonnet-4-20250514',
  google: 'gemini-2.0-flash',
}

export const DEFAULT_TEMPERATURE = 0.7

function createLanguageModel(type: AISDKProviderType, config: ProviderConfig, modelId: string): LanguageModel {
  const options = { apiKey: config.apiKey, baseURL: config.baseUrl }
  switch (type) {
    case 'openai':
      return createOpenAI(options)(modelId)
    case 'anthropic':
      return createAnthropic(options)(modelId)
    case 'google':
      return createGoogleGenerativeAI(options)(modelId)
  }
}

/**
 * One configured client per process; the engine reuses it for every turn
 * and for the verdict.
 */
export class AISDKProvider implements Provider {
  readonly name: string
  private config: ProviderConfig
  private modelId: string
  private model: LanguageModel

  constructor(type: AISDKProviderType, config: ProviderConfig = {}) {
    this.name = type
    this.config = config
    this.modelId = config.model || DEFAULT_MODELS[type]
    this.model = createLanguageModel(type, config, this.modelId)
  }

  async run(prompt: string): Promise<ProviderResponse> {
    const startTime = Date.now()

    const { text, usage } = await generateText({
      model: this.model,
      prompt,
      temperature: this.config.temperature ?? DEFAULT_TEMPERATURE,
    })

    return {
      content: text,
      metadata: {
        model: this.modelId,
        tokensUsed: usage.totalTokens,
        inputTokens: usage.inputTokens,
        outputTokens: usage.outputTokens,
        latencyMs: Date.now() - startTime,
      },
    }
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.config.apiKey)
  }
}

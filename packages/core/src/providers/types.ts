/**
 * Provider Types
 *
 * The generation capability the engine depends on. The engine only ever
 * calls `run(prompt)` and reads `content`.
 *
 * @packageDocumentation
 * @module providers/types
 */

/**
 * Response from an AI provider.
 *
 * @example
 * ```typescript
 * const response: ProviderResponse = {
 *   content: 'Peer-reviewed studies point the other way.',
 *   metadata: { model: 'gpt-4o', tokensUsed: 412, latencyMs: 900 }
 * }
 * ```
 */
export interface ProviderResponse {
  /** The generated text */
  content: string
  metadata?: {
    /** Model used for generation */
    model?: string
    /** Total tokens consumed */
    tokensUsed?: number
    /** Input/prompt tokens */
    inputTokens?: number
    /** Output/completion tokens */
    outputTokens?: number
    /** Response latency in milliseconds */
    latencyMs?: number
  }
}

/**
 * Configuration for AI providers.
 */
export interface ProviderConfig {
  /** API key for direct API calls */
  apiKey?: string
  /** Model to use (provider-specific) */
  model?: string
  /** Sampling temperature */
  temperature?: number
  /** Base URL for API (for self-hosted or proxy) */
  baseUrl?: string
}

/**
 * Core provider interface.
 *
 * @example Implementing a custom provider
 * ```typescript
 * class MyProvider implements Provider {
 *   readonly name = 'my-ai'
 *
 *   async run(prompt: string): Promise<ProviderResponse> {
 *     const response = await myAiApi.generate(prompt)
 *     return { content: response.text }
 *   }
 *
 *   async isAvailable(): Promise<boolean> {
 *     return !!process.env.MY_AI_KEY
 *   }
 * }
 * ```
 */
export interface Provider {
  /** Unique identifier for this provider */
  readonly name: string
  /**
   * Generate a response to the given prompt. May reject on transport or
   * provider errors; callers do not retry.
   */
  run(prompt: string): Promise<ProviderResponse>
  /** True when the provider has what it needs to make calls */
  isAvailable(): Promise<boolean>
}

/**
 * Factory for creating provider instances by name.
 */
export interface ProviderFactory {
  create(name: string, config?: ProviderConfig): Provider
  list(): string[]
}

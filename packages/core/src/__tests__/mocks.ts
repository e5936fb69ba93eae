import type { Provider, ProviderResponse } from '../providers/types'

/**
 * Mock provider that returns predefined responses in order, cycling when
 * it runs out
 */
export class MockProvider implements Provider {
  readonly name: string
  readonly prompts: string[] = []
  private responses: string[]
  private responseIndex = 0

  constructor(name: string, responses: string[] = ['Mock response']) {
    this.name = name
    this.responses = responses
  }

  async run(prompt: string): Promise<ProviderResponse> {
    this.prompts.push(prompt)
    const content = this.responses[this.responseIndex % this.responses.length] ?? 'Mock response'
    this.responseIndex++
    return {
      content,
      metadata: { model: 'mock-model' },
    }
  }

  async isAvailable(): Promise<boolean> {
    return true
  }

  /**
   * Get the number of times run() was called
   */
  getCallCount(): number {
    return this.responseIndex
  }
}

/**
 * Mock provider that returns a distinct response on every call
 */
export class UniqueResponseProvider implements Provider {
  readonly name = 'unique'
  readonly prompts: string[] = []
  private judgeResponse: string

  constructor(judgeResponse = 'SUMMARY: A close debate.\nWINNER: Philosopher\nJUSTIFICATION: Clearer framing.') {
    this.judgeResponse = judgeResponse
  }

  async run(prompt: string): Promise<ProviderResponse> {
    this.prompts.push(prompt)
    if (prompt.startsWith('You are a neutral Judge')) {
      return { content: this.judgeResponse }
    }
    return { content: `Argument ${this.prompts.length}` }
  }

  async isAvailable(): Promise<boolean> {
    return true
  }

  getCallCount(): number {
    return this.prompts.length
  }
}

/**
 * Mock provider that rejects after `failAfter` successful calls
 */
export class FailingProvider implements Provider {
  readonly name = 'failing'
  private calls = 0
  private failAfter: number

  constructor(failAfter = 0) {
    this.failAfter = failAfter
  }

  async run(_prompt: string): Promise<ProviderResponse> {
    this.calls++
    if (this.calls > this.failAfter) {
      throw new Error('upstream unavailable')
    }
    return { content: `Argument ${this.calls}` }
  }

  async isAvailable(): Promise<boolean> {
    return true
  }
}

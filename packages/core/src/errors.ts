/**
 * Error types shared across the engine, config and CLI layers.
 */

export type AgoraErrorCode = 'CONFIGURATION' | 'GENERATION_FAILURE' | 'MAX_TURNS_EXCEEDED'

export class AgoraError extends Error {
  readonly code: AgoraErrorCode

  constructor(code: AgoraErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'AgoraError'
    this.code = code
  }
}

/**
 * Thrown at startup when configuration is invalid or a credential is missing.
 * No debate turn runs after this.
 */
export class ConfigurationError extends AgoraError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION', message, options)
    this.name = 'ConfigurationError'
  }
}

/**
 * Thrown when the provider rejects during a turn or during adjudication.
 * The original rejection is kept as `cause`.
 */
export class GenerationFailure extends AgoraError {
  readonly node: 'agent' | 'judge'
  readonly round: number

  constructor(node: 'agent' | 'judge', round: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super('GENERATION_FAILURE', `Generation failed in ${node} node at round ${round}: ${reason}`, { cause })
    this.name = 'GenerationFailure'
    this.node = node
    this.round = round
  }
}

export class MaxTurnsExceededError extends AgoraError {
  readonly limit: number

  constructor(limit: number) {
    super('MAX_TURNS_EXCEEDED', `Debate exceeded maximum turns (${limit} node invocations)`)
    this.name = 'MaxTurnsExceededError'
    this.limit = limit
  }
}

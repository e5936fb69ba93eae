/**
 * @agora/core
 *
 * Scientist vs Philosopher debate engine - Core Library
 *
 * @example
 * ```typescript
 * import { DebateEngine, providerFactory } from '@agora/core'
 *
 * const engine = new DebateEngine()
 *
 * const final = await engine.run({
 *   topic: 'Is mathematics discovered or invented?',
 *   provider: providerFactory.create('openai', { apiKey: process.env.OPENAI_API_KEY }),
 * })
 *
 * console.log(final.summary)
 * console.log(`Winner: ${final.winner}`)
 * ```
 */

// Config - Configuration management
export {
  type AgoraConfig,
  API_KEY_ENV,
  assertCredentials,
  type ConfigLayer,
  type ConfigLoaderOptions,
  DEFAULT_CONFIG,
  getDefaultConfig,
  loadConfig,
  loadConfigFromEnv,
  loadConfigFromFile,
  type ProviderName,
  type ProviderSettings,
  resolveConfig,
  resolveProviderName,
} from './config'
// Engine - Turn-taking state machine and adjudication
export {
  createInitialState,
  DEBATE_GRAPH,
  DEBATE_ROUNDS,
  DebateEngine,
  type DebateEngineConfig,
  type DebateEvent,
  type DebateNode,
  type DebateOptions,
  type DebatePhase,
  type DebateState,
  EMPTY_HISTORY,
  formatHistory,
  type GraphEdge,
  Judge,
  JUDGE_PROMPT,
  opponentOf,
  PERSONA_PROMPTS,
  type Persona,
  parseVerdict,
  REPETITION_FILLER,
  type Route,
  type Router,
  renderMermaid,
  route,
  saveDiagram,
  speakerAt,
  TurnEngine,
  type TurnResult,
  type Utterance,
  type Verdict,
  VERDICT_FALLBACK,
} from './engine'
// Errors
export { AgoraError, type AgoraErrorCode, ConfigurationError, GenerationFailure, MaxTurnsExceededError } from './errors'
// Providers - Vercel AI SDK backed generation
export {
  AISDKProvider,
  type AISDKProviderType,
  DEFAULT_MODELS,
  DEFAULT_TEMPERATURE,
  type Provider,
  type ProviderConfig,
  type ProviderFactory,
  type ProviderResponse,
  providerFactory,
} from './providers'
// Session - Per-run text log
export {
  createNoopLogger,
  NoopSessionLogger,
  SessionLogger,
  type SessionLoggerInstance,
  type SessionLoggerOptions,
  type SessionLogLevel,
} from './session'
// Utils - Logger and utilities
export { type ConsoleLogger, createLogger, isDebugEnabled } from './utils/logger'

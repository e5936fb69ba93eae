/**
 * Configuration Types
 */

import type { AISDKProviderType } from '../providers/ai-sdk'

export type ProviderName = AISDKProviderType

export interface ProviderSettings {
  apiKey?: string
  model?: string
  baseUrl?: string
}

export interface AgoraConfig {
  /** Provider that generates every turn and the verdict */
  provider: ProviderName
  settings: {
    /** Overrides the provider's default model */
    model?: string
    temperature: number
    /** Ceiling on node invocations per run */
    maxIterations: number
  }
  output: {
    /** Run log, truncated at the start of every run */
    logFile: string
    /** Mermaid rendering of the debate graph */
    diagramFile: string
  }
  providers: Partial<Record<ProviderName, ProviderSettings>>
}

/**
 * One source of configuration (file, environment, CLI flags) before merging.
 * Only keys that source actually sets are present.
 */
export interface ConfigLayer {
  provider?: string
  settings?: Partial<AgoraConfig['settings']>
  output?: Partial<AgoraConfig['output']>
  providers?: Record<string, ProviderSettings>
}

export interface ConfigLoaderOptions {
  /** YAML file to read */
  path?: string
  env?: Record<string, string | undefined>
  /** Applied last, e.g. from CLI flags */
  overrides?: ConfigLayer
}

/**
 * Environment variable holding each provider's API key
 */
export const API_KEY_ENV: Record<ProviderName, string> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  google: 'GOOGLE_API_KEY',
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: AgoraConfig = {
  provider: 'openai',
  settings: {
    temperature: 0.7,
    maxIterations: 15,
  },
  output: {
    logFile: 'debate_log.txt',
    diagramFile: 'debate_dag.mmd',
  },
  providers: {},
}

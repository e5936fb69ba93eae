/**
 * Configuration Loader
 *
 * Loads configuration from an optional YAML file, environment variables and
 * CLI overrides, in that order, then validates the merged result.
 */

import { readFile } from 'node:fs/promises'
import { parse } from 'yaml'
import { z } from 'zod'
import { ConfigurationError } from '../errors'
import type { AgoraConfig, ConfigLayer, ConfigLoaderOptions, ProviderName, ProviderSettings } from './types'
import { API_KEY_ENV, DEFAULT_CONFIG } from './types'

const PROVIDER_ALIASES: Record<string, ProviderName> = {
  openai: 'openai',
  anthropic: 'anthropic',
  claude: 'anthropic',
  google: 'google',
  gemini: 'google',
}

const providerSettingsSchema = z.object({
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
})

const configSchema = z.object({
  provider: z.enum(['openai', 'anthropic', 'google']),
  settings: z.object({
    model: z.string().min(1).optional(),
    temperature: z.number().min(0).max(2),
    maxIterations: z.number().int().positive(),
  }),
  output: z.object({
    logFile: z.string().min(1),
    diagramFile: z.string().min(1),
  }),
  providers: z.object({
    openai: providerSettingsSchema.optional(),
    anthropic: providerSettingsSchema.optional(),
    google: providerSettingsSchema.optional(),
  }),
})

const fileSchema = z.object({
  provider: z.string().optional(),
  settings: z
    .object({
      model: z.string().optional(),
      temperature: z.number().optional(),
      max_iterations: z.number().optional(),
      maxIterations: z.number().optional(),
    })
    .optional(),
  output: z
    .object({
      log_file: z.string().optional(),
      logFile: z.string().optional(),
      diagram_file: z.string().optional(),
      diagramFile: z.string().optional(),
    })
    .optional(),
  providers: z
    .record(
      z.string(),
      z.object({
        api_key: z.string().optional(),
        apiKey: z.string().optional(),
        model: z.string().optional(),
        base_url: z.string().optional(),
        baseUrl: z.string().optional(),
      }),
    )
    .optional(),
})

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
}

/**
 * Map a provider name or alias (`claude`, `gemini`) to its canonical name.
 * Unknown names pass through so validation can report them.
 */
export function resolveProviderName(name: string): string {
  return PROVIDER_ALIASES[name.toLowerCase()] ?? name
}

/**
 * Load configuration from a YAML file. Keys may be snake_case or camelCase.
 */
export async function loadConfigFromFile(path: string): Promise<ConfigLayer> {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (error) {
    throw new ConfigurationError(`Configuration file not found: ${path}`, { cause: error })
  }

  const parsed = fileSchema.safeParse(parse(content) ?? {})
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration file ${path}: ${formatIssues(parsed.error)}`)
  }

  return normalizeConfig(parsed.data)
}

/**
 * Load provider selection, keys and settings from environment variables
 */
export function loadConfigFromEnv(env: Record<string, string | undefined> = process.env): ConfigLayer {
  const layer: ConfigLayer = {}
  const providers: Record<string, ProviderSettings> = {}

  if (env.AGORA_PROVIDER) layer.provider = env.AGORA_PROVIDER

  const settings: NonNullable<ConfigLayer['settings']> = {}
  if (env.AGORA_MODEL) settings.model = env.AGORA_MODEL
  if (env.AGORA_TEMPERATURE) settings.temperature = Number(env.AGORA_TEMPERATURE)
  if (env.AGORA_MAX_ITERATIONS) settings.maxIterations = Number(env.AGORA_MAX_ITERATIONS)
  if (Object.keys(settings).length > 0) layer.settings = settings

  const output: NonNullable<ConfigLayer['output']> = {}
  if (env.AGORA_LOG_FILE) output.logFile = env.AGORA_LOG_FILE
  if (env.AGORA_DIAGRAM_FILE) output.diagramFile = env.AGORA_DIAGRAM_FILE
  if (Object.keys(output).length > 0) layer.output = output

  // OpenAI
  if (env.OPENAI_API_KEY) {
    providers.openai = withOptional({ apiKey: env.OPENAI_API_KEY }, env.OPENAI_MODEL, env.OPENAI_BASE_URL)
  }

  // Anthropic
  if (env.ANTHROPIC_API_KEY) {
    providers.anthropic = withOptional({ apiKey: env.ANTHROPIC_API_KEY }, env.ANTHROPIC_MODEL, env.ANTHROPIC_BASE_URL)
  }

  // Google
  const googleKey = env.GOOGLE_API_KEY || env.GEMINI_API_KEY
  if (googleKey) {
    providers.google = withOptional({ apiKey: googleKey }, env.GEMINI_MODEL, undefined)
  }

  if (Object.keys(providers).length > 0) layer.providers = providers

  return layer
}

function withOptional(settings: ProviderSettings, model?: string, baseUrl?: string): ProviderSettings {
  if (model) settings.model = model
  if (baseUrl) settings.baseUrl = baseUrl
  return settings
}

/**
 * Load configuration with defaults, file, environment and override merging
 */
export async function loadConfig(options: ConfigLoaderOptions = {}): Promise<AgoraConfig> {
  let layer: ConfigLayer = {}

  // Load from file if path provided
  if (options.path) {
    layer = mergeLayers(layer, await loadConfigFromFile(options.path))
  }

  layer = mergeLayers(layer, loadConfigFromEnv(options.env))

  if (options.overrides) {
    layer = mergeLayers(layer, options.overrides)
  }

  return resolveConfig(layer)
}

/**
 * Apply a merged layer on top of the defaults and validate the result
 */
export function resolveConfig(layer: ConfigLayer): AgoraConfig {
  const providers: Record<string, ProviderSettings> = { ...DEFAULT_CONFIG.providers }
  for (const [name, settings] of Object.entries(layer.providers ?? {})) {
    const key = resolveProviderName(name)
    providers[key] = { ...providers[key], ...settings }
  }

  const candidate = {
    provider: resolveProviderName(layer.provider ?? DEFAULT_CONFIG.provider),
    settings: { ...DEFAULT_CONFIG.settings, ...layer.settings },
    output: { ...DEFAULT_CONFIG.output, ...layer.output },
    providers,
  }

  const parsed = configSchema.safeParse(candidate)
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`)
  }
  return parsed.data
}

/**
 * Throw when the selected provider has no API key. Called before any turn.
 */
export function assertCredentials(config: AgoraConfig): void {
  if (!config.providers[config.provider]?.apiKey) {
    throw new ConfigurationError(`${API_KEY_ENV[config.provider]} environment variable not set.`)
  }
}

/**
 * Get default configuration
 */
export function getDefaultConfig(): AgoraConfig {
  return structuredClone(DEFAULT_CONFIG)
}

/**
 * Normalize the parsed YAML file to a config layer
 */
function normalizeConfig(raw: z.infer<typeof fileSchema>): ConfigLayer {
  const layer: ConfigLayer = {}

  if (raw.provider) layer.provider = raw.provider

  if (raw.settings) {
    const settings: NonNullable<ConfigLayer['settings']> = {}
    const maxIterations = raw.settings.max_iterations ?? raw.settings.maxIterations
    if (raw.settings.model !== undefined) settings.model = raw.settings.model
    if (raw.settings.temperature !== undefined) settings.temperature = raw.settings.temperature
    if (maxIterations !== undefined) settings.maxIterations = maxIterations
    layer.settings = settings
  }

  if (raw.output) {
    const output: NonNullable<ConfigLayer['output']> = {}
    const logFile = raw.output.log_file ?? raw.output.logFile
    const diagramFile = raw.output.diagram_file ?? raw.output.diagramFile
    if (logFile !== undefined) output.logFile = logFile
    if (diagramFile !== undefined) output.diagramFile = diagramFile
    layer.output = output
  }

  if (raw.providers) {
    const providers: Record<string, ProviderSettings> = {}
    for (const [name, entry] of Object.entries(raw.providers)) {
      const apiKey = entry.api_key ?? entry.apiKey
      providers[name] = withOptional(apiKey ? { apiKey } : {}, entry.model, entry.base_url ?? entry.baseUrl)
    }
    layer.providers = providers
  }

  return layer
}

/**
 * Merge two layers; keys set in `override` win
 */
function mergeLayers(base: ConfigLayer, override: ConfigLayer): ConfigLayer {
  const providers: Record<string, ProviderSettings> = { ...base.providers }
  for (const [name, settings] of Object.entries(override.providers ?? {})) {
    providers[name] = { ...providers[name], ...settings }
  }

  return {
    provider: override.provider ?? base.provider,
    settings: { ...base.settings, ...override.settings },
    output: { ...base.output, ...override.output },
    providers,
  }
}

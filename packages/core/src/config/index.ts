/**
 * Config Module
 *
 * Configuration loading and management.
 */

export {
  assertCredentials,
  getDefaultConfig,
  loadConfig,
  loadConfigFromEnv,
  loadConfigFromFile,
  resolveConfig,
  resolveProviderName,
} from './loader'
export type { AgoraConfig, ConfigLayer, ConfigLoaderOptions, ProviderName, ProviderSettings } from './types'
export { API_KEY_ENV, DEFAULT_CONFIG } from './types'

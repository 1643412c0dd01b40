/**
 * Configuration Module
 */

export type {
  RegistryConfig,
  ConfigSource,
  ConfigSourceType,
  LoadConfigOptions,
  LoadedConfig,
} from './types.js';

export { CONFIG_FILENAME, DEFAULT_CONFIG } from './types.js';

export { loadConfig } from './loader.js';

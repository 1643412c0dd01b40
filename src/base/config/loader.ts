/**
 * Configuration Loader - Load registry settings from file, environment and CLI
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigError, errorToString } from '../utils/errors.js';
import { DuplicatePolicySchema, validateRegistryConfig } from '../utils/config-validator.js';
import { logger } from '../utils/logger.js';
import {
  CONFIG_FILENAME,
  DEFAULT_CONFIG,
  type ConfigSource,
  type LoadConfigOptions,
  type LoadedConfig,
  type RegistryConfig,
} from './types.js';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read and validate a plugdoc.json file
 *
 * @returns The validated settings, or null when the file is absent and optional
 */
async function loadConfigFile(
  filePath: string,
  required: boolean
): Promise<Partial<RegistryConfig> | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (!required && isNotFound(error)) {
      return null;
    }
    throw new ConfigError(`Cannot read config file: ${errorToString(error)}`, filePath, {
      cause: error,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in config file: ${errorToString(error)}`, filePath, {
      cause: error,
    });
  }

  const validation = validateRegistryConfig(data, filePath);
  if (!validation.valid) {
    throw new ConfigError(`Invalid config file: ${validation.errors.join(', ')}`, filePath);
  }

  const settings: Partial<RegistryConfig> = { ...validation.data };
  if (settings.root !== undefined) {
    // Roots in a config file are relative to that file
    settings.root = path.resolve(path.dirname(filePath), settings.root);
  }
  return settings;
}

function loadEnvOverrides(env: NodeJS.ProcessEnv, cwd: string): Partial<RegistryConfig> {
  const overrides: Partial<RegistryConfig> = {};

  if (env.PLUGDOC_ROOT) {
    overrides.root = path.resolve(cwd, env.PLUGDOC_ROOT);
  }

  if (env.PLUGDOC_DUPLICATE_POLICY) {
    const policy = DuplicatePolicySchema.safeParse(env.PLUGDOC_DUPLICATE_POLICY);
    if (!policy.success) {
      throw new ConfigError(
        `PLUGDOC_DUPLICATE_POLICY must be "error" or "last-wins", got "${env.PLUGDOC_DUPLICATE_POLICY}"`
      );
    }
    overrides.duplicatePolicy = policy.data;
  }

  return overrides;
}

/**
 * Load the effective configuration
 */
export async function loadConfig(options: LoadConfigOptions): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const sources: ConfigSource[] = [{ type: 'defaults' }];
  let config: RegistryConfig = {
    ...DEFAULT_CONFIG,
    root: path.resolve(options.cwd, DEFAULT_CONFIG.root),
  };

  const explicitPath = options.configPath ?? env.PLUGDOC_CONFIG;
  const configPath = path.resolve(options.cwd, explicitPath ?? CONFIG_FILENAME);
  const fileSettings = await loadConfigFile(configPath, explicitPath !== undefined);
  if (fileSettings) {
    config = { ...config, ...fileSettings };
    sources.push({ type: 'file', path: configPath });
    logger.debug('Config', 'Loaded config file', { file: configPath });
  }

  const envSettings = loadEnvOverrides(env, options.cwd);
  if (Object.keys(envSettings).length > 0) {
    config = { ...config, ...envSettings };
    sources.push({ type: 'env' });
  }

  const overrides = options.overrides ?? {};
  if (Object.keys(overrides).length > 0) {
    config = {
      ...config,
      ...overrides,
      root: overrides.root !== undefined ? path.resolve(options.cwd, overrides.root) : config.root,
    };
    sources.push({ type: 'cli' });
  }

  return { config, sources };
}

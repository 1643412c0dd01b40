/**
 * Configuration Types
 *
 * Precedence (low to high):
 * 1. Defaults
 * 2. plugdoc.json (working directory, PLUGDOC_CONFIG or --config)
 * 3. Environment: PLUGDOC_ROOT, PLUGDOC_DUPLICATE_POLICY
 * 4. CLI arguments
 */

import type { DuplicatePolicy } from '../../registry/types.js';
import { DEFAULT_IGNORE } from '../discovery/file-walker.js';

export const CONFIG_FILENAME = 'plugdoc.json';

export interface RegistryConfig {
  /** Directory whose children are toolkits (absolute once loaded) */
  root: string;

  /** What happens when two agents or skills of one toolkit share a name */
  duplicatePolicy: DuplicatePolicy;

  /** Glob patterns skipped during the walk */
  ignore: string[];

  /** Files read in parallel during a build */
  readConcurrency: number;
}

export const DEFAULT_CONFIG: RegistryConfig = {
  root: 'plugins',
  duplicatePolicy: 'error',
  ignore: DEFAULT_IGNORE,
  readConcurrency: 16,
};

export type ConfigSourceType = 'defaults' | 'file' | 'env' | 'cli';

export interface ConfigSource {
  type: ConfigSourceType;
  /** Path of the config file, for type 'file' */
  path?: string;
}

export interface LoadConfigOptions {
  /** Directory relative paths are resolved against */
  cwd: string;

  /** Explicit config file; missing or invalid is an error */
  configPath?: string;

  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;

  /** Highest-priority overrides, usually from the command line */
  overrides?: Partial<RegistryConfig>;
}

export interface LoadedConfig {
  config: RegistryConfig;
  /** Sources that contributed, lowest priority first */
  sources: ConfigSource[];
}

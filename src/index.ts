/**
 * plugdoc - Plugin Document Registry
 *
 * Discovers agent, skill and command documents under a plugin tree,
 * parses their front matter and indexes them by toolkit.
 */

export * from './frontmatter/index.js';
export * from './classifier/index.js';
export * from './registry/index.js';
export * from './base/discovery/index.js';
export * from './base/config/index.js';
export { PlugdocError, ConfigError, RegistryRootError } from './base/utils/errors.js';
export { logger, LogLevel } from './base/utils/logger.js';

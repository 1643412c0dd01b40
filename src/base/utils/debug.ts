/**
 * Debug configuration module
 * Controls debug output for the plugdoc components
 *
 * Debug Levels:
 * - PLUGDOC_DEBUG=0 or unset: No debug output (default)
 * - PLUGDOC_DEBUG=1: Standard debug output (documents loaded, lookups)
 * - PLUGDOC_DEBUG=2: Verbose debug output (every file visited, parsed keys)
 */

export type DebugLevel = 0 | 1 | 2;

export type DebugComponent = 'parser' | 'classifier' | 'discovery' | 'registry' | 'cli';

export interface DebugConfig {
  level: DebugLevel;
  enabled: boolean; // level >= 1
  verbose: boolean; // level >= 2
  components: Record<DebugComponent, DebugLevel>;
}

let cachedConfig: DebugConfig | null = null;

function parseDebugLevel(value: string | undefined): DebugLevel {
  if (!value) return 0;
  const level = parseInt(value, 10);
  if (level === 2) return 2;
  if (level === 1) return 1;
  return 0;
}

/**
 * Get debug configuration based on environment variables
 *
 * - PLUGDOC_DEBUG=1|2: global level
 * - PLUGDOC_DEBUG_<COMPONENT>=1|2: component-specific level
 */
export function getDebugConfig(): DebugConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const globalLevel = parseDebugLevel(process.env.PLUGDOC_DEBUG);

  cachedConfig = {
    level: globalLevel,
    enabled: globalLevel >= 1,
    verbose: globalLevel >= 2,
    components: {
      parser: parseDebugLevel(process.env.PLUGDOC_DEBUG_PARSER) || globalLevel,
      classifier: parseDebugLevel(process.env.PLUGDOC_DEBUG_CLASSIFIER) || globalLevel,
      discovery: parseDebugLevel(process.env.PLUGDOC_DEBUG_DISCOVERY) || globalLevel,
      registry: parseDebugLevel(process.env.PLUGDOC_DEBUG_REGISTRY) || globalLevel,
      cli: parseDebugLevel(process.env.PLUGDOC_DEBUG_CLI) || globalLevel,
    },
  };

  return cachedConfig;
}

/**
 * Check if debug is enabled for a specific component (level >= 1)
 */
export function isDebugEnabled(component: DebugComponent): boolean {
  return getDebugConfig().components[component] >= 1;
}

/**
 * Check if verbose debug is enabled for a specific component (level >= 2)
 */
export function isVerboseDebugEnabled(component: DebugComponent): boolean {
  return getDebugConfig().components[component] >= 2;
}

/**
 * Reset cached config (useful for testing)
 */
export function resetDebugConfig(): void {
  cachedConfig = null;
}

/**
 * Error hierarchy for plugdoc.
 *
 * PlugdocError (base)
 * ├── ConfigError
 * └── RegistryRootError
 *
 * Per-document failures and lookup misses are not thrown: they are
 * returned as data (see DocumentError and NotFoundError).
 */

export class PlugdocError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PlugdocError';
  }
}

export class ConfigError extends PlugdocError {
  constructor(
    message: string,
    readonly configPath?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * The scanned root itself could not be read. Raised once per build,
 * never for an individual document.
 */
export class RegistryRootError extends PlugdocError {
  constructor(
    message: string,
    readonly rootPath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RegistryRootError';
  }
}

export function errorToString(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

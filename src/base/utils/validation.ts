/**
 * Shared Validation Utilities
 */

/**
 * Validate document name (agents, skills, commands)
 *
 * Names can only contain letters, numbers, dash, underscore and colon.
 * The colon separates namespaced commands (e.g., git:commit for commands/git/commit.md).
 */
export function isValidDocumentName(name: string): boolean {
  return /^[a-zA-Z0-9_:-]+$/.test(name);
}

/**
 * Validate front-matter key (e.g., name, allowed-tools, x.custom)
 */
export function isValidFrontMatterKey(key: string): boolean {
  return /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/.test(key);
}

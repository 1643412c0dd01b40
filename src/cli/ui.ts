/**
 * CLI UI Components - terminal output helpers
 */

import chalk from 'chalk';
import ora from 'ora';

// ============================================================================
// Colors & Styles
// ============================================================================

export const colors = {
  primary: chalk.cyan,
  secondary: chalk.gray,
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.blue,
  muted: chalk.dim,
  highlight: chalk.bold.white,
};

// ============================================================================
// Output
// ============================================================================

/**
 * Where the CLI writes; tests pass a collector instead of the console
 */
export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

export const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function formatError(message: string): string {
  return colors.error('✗ Error: ') + message;
}

export function formatWarning(message: string): string {
  return colors.warning('! ') + message;
}

export function formatSuccess(message: string): string {
  return colors.success('✓ ') + message;
}

// ============================================================================
// Spinners
// ============================================================================

export interface Spinner {
  start(): Spinner;
  stop(): Spinner;
}

const silentSpinner: Spinner = {
  start() {
    return this;
  },
  stop() {
    return this;
  },
};

/**
 * Spinner on stderr for interactive terminals, no-op otherwise
 */
export function createSpinner(text: string, enabled: boolean): Spinner {
  if (!enabled) {
    return silentSpinner;
  }
  return ora({
    text: colors.secondary(text),
    spinner: 'dots',
    color: 'cyan',
  });
}

// ============================================================================
// Tables
// ============================================================================

export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] || '').length)));

  const headerRow = headers.map((h, i) => h.padEnd(widths[i])).join(colors.muted(' │ '));
  const separator = widths.map((w) => '─'.repeat(w)).join(colors.muted('─┼─'));
  const body = rows.map((row) =>
    row.map((cell, i) => (cell || '').padEnd(widths[i])).join(colors.muted(' │ ')).trimEnd()
  );

  return [colors.highlight(headerRow.trimEnd()), colors.muted(separator), ...body];
}

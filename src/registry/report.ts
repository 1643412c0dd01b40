/**
 * Build report
 * Summarizes a registry build per toolkit, with its errors and warnings
 */

import type { BuildResult } from './builder.js';
import type { BuildWarning, DocumentError, ToolkitStats } from './types.js';

export interface BuildReport {
  root: string;
  toolkits: ToolkitStats[];
  totals: Omit<ToolkitStats, 'toolkit'> & { errors: number; warnings: number };
  errors: DocumentError[];
  warnings: BuildWarning[];
}

const WIDTH = 58;
const MAX_LISTED_ERRORS = 3;

export function createBuildReport(result: BuildResult, extraWarnings: BuildWarning[] = []): BuildReport {
  const toolkits = result.registry.stats();
  const warnings = [...result.warnings, ...extraWarnings];

  return {
    root: result.root,
    toolkits,
    totals: {
      agents: toolkits.reduce((sum, t) => sum + t.agents, 0),
      skills: toolkits.reduce((sum, t) => sum + t.skills, 0),
      commands: toolkits.reduce((sum, t) => sum + t.commands, 0),
      supplementary: toolkits.reduce((sum, t) => sum + t.supplementary, 0),
      errors: result.errors.length,
      warnings: warnings.length,
    },
    errors: result.errors,
    warnings,
  };
}

function row(text: string): string {
  return `│ ${text}`.padEnd(WIDTH) + '│';
}

/**
 * Render a report as boxed text lines
 */
export function formatBuildReport(report: BuildReport): string[] {
  const lines = [
    '┌' + '─'.repeat(WIDTH - 1) + '┐',
    row('Plugin Registry Summary'),
    '├' + '─'.repeat(WIDTH - 1) + '┤',
  ];

  if (report.toolkits.length === 0) {
    lines.push(row('No toolkits found.'));
  }

  for (const stats of report.toolkits) {
    const failures = report.errors.filter((error) => error.file.startsWith(`${stats.toolkit}/`));
    const status = failures.length > 0 ? '⚠' : '✓';
    lines.push(
      row(`${status} ${stats.toolkit}: ${stats.agents} agents, ${stats.skills} skills, ${stats.commands} commands`)
    );

    for (const error of failures.slice(0, MAX_LISTED_ERRORS)) {
      const fileName = error.file.split('/').pop() ?? error.file;
      lines.push(row(`    ✗ ${fileName}: ${error.kind}`));
    }
    if (failures.length > MAX_LISTED_ERRORS) {
      lines.push(row(`    ... and ${failures.length - MAX_LISTED_ERRORS} more errors`));
    }
  }

  const { totals } = report;
  lines.push('└' + '─'.repeat(WIDTH - 1) + '┘');
  lines.push(
    `Total: ${report.toolkits.length} toolkits, ${totals.agents + totals.skills + totals.commands} documents, ` +
      `${totals.errors} errors, ${totals.warnings} warnings`
  );

  return lines;
}

/**
 * CLI runner - load config, build the registry, dispatch one command
 *
 * Returns the process exit code instead of exiting, so it can be driven
 * from tests with a collecting output.
 */

import { loadConfig, type RegistryConfig } from '../base/config/index.js';
import { PlugdocError } from '../base/utils/errors.js';
import { logger } from '../base/utils/logger.js';
import { isDebugEnabled } from '../base/utils/debug.js';
import { serializeFrontMatter } from '../frontmatter/serializer.js';
import { toPlainObject } from '../frontmatter/types.js';
import {
  buildRegistry,
  createBuildReport,
  findUnresolvedSkillReferences,
  formatBuildReport,
  toWarning,
  type BuildResult,
  type PluginDocument,
} from '../registry/index.js';
import { USAGE, parseArgs, type CliCommand, type CliOptions } from './args.js';
import {
  colors,
  consoleOutput,
  createSpinner,
  formatError,
  formatSuccess,
  formatTable,
  formatWarning,
  type CliOutput,
} from './ui.js';

export interface CliContext {
  cwd: string;
  env: NodeJS.ProcessEnv;
  output: CliOutput;
  /** Show a spinner while scanning (interactive terminals only) */
  interactive: boolean;
}

function defaultContext(): CliContext {
  return {
    cwd: process.cwd(),
    env: process.env,
    output: consoleOutput,
    interactive: Boolean(process.stderr.isTTY),
  };
}

function documentSummary(document: PluginDocument): Record<string, unknown> {
  const summary: Record<string, unknown> = {
    toolkit: document.toolkit,
    role: document.role,
    path: document.relativePath,
  };
  if (document.role !== 'supplementary') {
    summary.name = document.name;
    summary.description = document.description;
  }
  if (document.role === 'command' && document.argumentHint) {
    summary.argumentHint = document.argumentHint;
  }
  if (document.role === 'skill') {
    summary.references = document.references;
  }
  return summary;
}

function printJson(output: CliOutput, value: unknown): void {
  output.out(JSON.stringify(value, null, 2));
}

function runList(result: BuildResult, options: CliOptions, output: CliOutput): number {
  const stats = result.registry.stats();
  if (options.json) {
    printJson(output, stats);
    return 0;
  }
  if (stats.length === 0) {
    output.out(colors.muted(`No toolkits found in ${result.root}`));
    return 0;
  }
  const rows = stats.map((s) => [s.toolkit, String(s.agents), String(s.skills), String(s.commands)]);
  for (const line of formatTable(['Toolkit', 'Agents', 'Skills', 'Commands'], rows)) {
    output.out(line);
  }
  return 0;
}

function runDocs(
  result: BuildResult,
  command: Extract<CliCommand, { command: 'docs' }>,
  options: CliOptions,
  output: CliOutput
): number {
  const { registry } = result;
  if (!registry.hasToolkit(command.toolkit)) {
    output.err(formatError(`Toolkit "${command.toolkit}" does not exist`));
    return 1;
  }

  const documents: PluginDocument[] = registry.listDocuments(command.toolkit, command.role);
  if (options.json) {
    printJson(output, documents.map(documentSummary));
    return 0;
  }

  for (const document of documents) {
    if (document.role === 'supplementary') {
      output.out(document.relativePath);
    } else {
      output.out(`${colors.primary(document.name)}  ${colors.muted(document.description)}`);
    }
  }
  return 0;
}

function runShow(
  result: BuildResult,
  command: Extract<CliCommand, { command: 'show' }>,
  options: CliOptions,
  output: CliOutput
): number {
  const found = result.registry.lookup(command.toolkit, command.role, command.name);
  if (!found.ok) {
    output.err(formatError(found.error.message));
    return 1;
  }

  const { document } = found;
  if (options.json) {
    printJson(output, {
      ...documentSummary(document),
      frontMatter: toPlainObject(document.frontMatter),
      body: document.body,
    });
    return 0;
  }

  output.out(colors.highlight(`${document.toolkit} / ${document.role} / ${document.name}`));
  output.out(colors.muted(document.relativePath));
  output.out(serializeFrontMatter(document.frontMatter, document.body));
  return 0;
}

function runCheck(result: BuildResult, options: CliOptions, output: CliOutput): number {
  const unresolved = findUnresolvedSkillReferences(result.registry).map(toWarning);
  const report = createBuildReport(result, unresolved);

  if (options.json) {
    printJson(output, report);
  } else {
    for (const line of formatBuildReport(report)) {
      output.out(line);
    }
    for (const error of report.errors) {
      output.out(formatError(`${error.file}: ${error.message}`));
    }
    for (const warning of report.warnings) {
      output.out(formatWarning(`${warning.file}: ${warning.message}`));
    }
    if (report.errors.length === 0) {
      output.out(formatSuccess('All documents loaded'));
    }
  }

  return report.errors.length > 0 ? 1 : 0;
}

function configOverrides(options: CliOptions): Partial<RegistryConfig> {
  return options.root !== undefined ? { root: options.root } : {};
}

/**
 * Run the CLI with the given arguments (without node and script path)
 */
export async function runCli(argv: string[], context: CliContext = defaultContext()): Promise<number> {
  const { output } = context;
  const parsed = parseArgs(argv);

  if (!parsed.ok) {
    output.err(formatError(parsed.error));
    output.err(USAGE);
    return 1;
  }

  const { command, options } = parsed;
  if (command.command === 'help') {
    output.out(USAGE);
    return 0;
  }

  try {
    const { config } = await loadConfig({
      cwd: context.cwd,
      configPath: options.config,
      env: context.env,
      overrides: configOverrides(options),
    });

    if (isDebugEnabled('cli')) {
      logger.debug('CLI', `Running ${command.command}`, { root: config.root });
    }

    const spinner = createSpinner(`Scanning ${config.root}`, context.interactive && !options.json).start();
    let result: BuildResult;
    try {
      result = await buildRegistry(config.root, {
        ignore: config.ignore,
        duplicatePolicy: config.duplicatePolicy,
        readConcurrency: config.readConcurrency,
      });
    } finally {
      spinner.stop();
    }

    switch (command.command) {
      case 'list':
        return runList(result, options, output);
      case 'docs':
        return runDocs(result, command, options, output);
      case 'show':
        return runShow(result, command, options, output);
      case 'check':
        return runCheck(result, options, output);
    }
  } catch (error) {
    if (error instanceof PlugdocError) {
      output.err(formatError(error.message));
      return 1;
    }
    throw error;
  }
}

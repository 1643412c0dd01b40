/**
 * CLI argument parsing
 *
 *   plugdoc list
 *   plugdoc docs <toolkit> <role>
 *   plugdoc show <toolkit> <role> <name>
 *   plugdoc check
 *
 * Options: --root <dir>, --config <file>, --json, --help
 */

import { PRIMARY_ROLES, type DocumentRole, type PrimaryRole } from '../registry/types.js';

export type CliCommand =
  | { command: 'list' }
  | { command: 'docs'; toolkit: string; role: DocumentRole }
  | { command: 'show'; toolkit: string; role: PrimaryRole; name: string }
  | { command: 'check' }
  | { command: 'help' };

export interface CliOptions {
  root?: string;
  config?: string;
  json: boolean;
}

export type ParseArgsResult =
  | { ok: true; command: CliCommand; options: CliOptions }
  | { ok: false; error: string };

export const USAGE = `Usage: plugdoc <command> [options]

Commands:
  list                               List toolkits with document counts
  docs <toolkit> <role>              List agents, skills, commands or supplementary files
  show <toolkit> <role> <name>       Print one agent, skill or command
  check                              Report parse errors, duplicates and unresolved skill references
  help                               Show this help

Options:
  --root <dir>       Plugin root (default: ./plugins or plugdoc.json "root")
  --config <file>    Config file (default: ./plugdoc.json)
  --json             Print JSON instead of text
  -h, --help         Show this help`;

const ROLE_ALIASES: Record<string, DocumentRole> = {
  agent: 'agent',
  agents: 'agent',
  skill: 'skill',
  skills: 'skill',
  command: 'command',
  commands: 'command',
  supplementary: 'supplementary',
};

export function parseRole(value: string): DocumentRole | null {
  return Object.hasOwn(ROLE_ALIASES, value) ? ROLE_ALIASES[value] : null;
}

export function parseArgs(argv: string[]): ParseArgsResult {
  const options: CliOptions = { json: false };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--json':
        options.json = true;
        break;
      case '-h':
      case '--help':
        return { ok: true, command: { command: 'help' }, options };
      case '--root':
      case '--config': {
        const value = argv[i + 1];
        if (value === undefined || value.startsWith('--')) {
          return { ok: false, error: `Option ${arg} requires a value` };
        }
        if (arg === '--root') options.root = value;
        else options.config = value;
        i++;
        break;
      }
      default:
        if (arg.startsWith('--')) {
          return { ok: false, error: `Unknown option: ${arg}` };
        }
        positional.push(arg);
    }
  }

  const [name = 'help', ...rest] = positional;

  switch (name) {
    case 'help':
      return { ok: true, command: { command: 'help' }, options };

    case 'list':
    case 'check':
      if (rest.length > 0) {
        return { ok: false, error: `"${name}" takes no arguments` };
      }
      return { ok: true, command: { command: name }, options };

    case 'docs': {
      if (rest.length !== 2) {
        return { ok: false, error: 'Usage: plugdoc docs <toolkit> <role>' };
      }
      const role = parseRole(rest[1]);
      if (!role) {
        return { ok: false, error: `Unknown role "${rest[1]}"` };
      }
      return { ok: true, command: { command: 'docs', toolkit: rest[0], role }, options };
    }

    case 'show': {
      if (rest.length !== 3) {
        return { ok: false, error: 'Usage: plugdoc show <toolkit> <role> <name>' };
      }
      const parsed = parseRole(rest[1]);
      const role = PRIMARY_ROLES.find((primary) => primary === parsed);
      if (!role) {
        return { ok: false, error: `Role must be agent, skill or command, got "${rest[1]}"` };
      }
      return {
        ok: true,
        command: { command: 'show', toolkit: rest[0], role, name: rest[2] },
        options,
      };
    }

    default:
      return { ok: false, error: `Unknown command: ${name}` };
  }
}

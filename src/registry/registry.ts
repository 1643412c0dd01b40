/**
 * ToolkitRegistry - read-only index of one scanned plugin tree
 *
 * Maps toolkit name → documents by role. Built once by buildRegistry();
 * there are no update or delete operations, and each registry is an
 * independent object so several roots can be loaded side by side.
 */

import type {
  DocumentOfRole,
  DocumentRole,
  LookupResult,
  PluginDocument,
  PrimaryRole,
  ToolkitStats,
} from './types.js';

/**
 * Documents of one toolkit, keyed per role:
 * agents and skills by declared name, commands by filename stem,
 * supplementary files by relative path
 */
export type ToolkitDocuments = {
  [R in DocumentRole]: Map<string, DocumentOfRole[R]>;
};

export function createToolkitDocuments(): ToolkitDocuments {
  return {
    agent: new Map(),
    skill: new Map(),
    command: new Map(),
    supplementary: new Map(),
  };
}

export class ToolkitRegistry {
  private readonly toolkits: ReadonlyMap<string, ToolkitDocuments>;

  /**
   * @param toolkits - Toolkit entries in discovery order
   */
  constructor(toolkits: Map<string, ToolkitDocuments>) {
    this.toolkits = new Map(toolkits);
  }

  /**
   * Toolkit names in discovery order. The returned iterable can be
   * iterated any number of times.
   */
  listToolkits(): Iterable<string> {
    const toolkits = this.toolkits;
    return {
      [Symbol.iterator]: () => toolkits.keys(),
    };
  }

  hasToolkit(toolkit: string): boolean {
    return this.toolkits.has(toolkit);
  }

  /**
   * Documents of one role in discovery order (empty for an unknown toolkit)
   */
  listDocuments<R extends DocumentRole>(toolkit: string, role: R): DocumentOfRole[R][] {
    const entry = this.toolkits.get(toolkit);
    if (!entry) return [];
    const documents: Map<string, DocumentOfRole[R]> = entry[role];
    return Array.from(documents.values());
  }

  /**
   * Files excluded from primary lookup (reference pages, READMEs, ...)
   */
  listSupplementary(toolkit: string): DocumentOfRole['supplementary'][] {
    return this.listDocuments(toolkit, 'supplementary');
  }

  /**
   * Find one agent, skill or command
   *
   * @param name - Declared name for agents and skills, filename stem for commands
   */
  lookup<R extends PrimaryRole>(toolkit: string, role: R, name: string): LookupResult<R> {
    const entry = this.toolkits.get(toolkit);
    if (!entry) {
      return {
        ok: false,
        error: {
          kind: 'NotFound',
          reason: 'toolkit',
          toolkit,
          role,
          name,
          message: `Toolkit "${toolkit}" does not exist`,
        },
      };
    }

    const documents: Map<string, DocumentOfRole[R]> = entry[role];
    const document = documents.get(name);
    if (!document) {
      return {
        ok: false,
        error: {
          kind: 'NotFound',
          reason: 'document',
          toolkit,
          role,
          name,
          message: `Toolkit "${toolkit}" has no ${role} named "${name}"`,
        },
      };
    }

    return { ok: true, document };
  }

  /**
   * Every document of every toolkit, supplementary files included
   */
  *documents(): Generator<PluginDocument> {
    for (const entry of this.toolkits.values()) {
      yield* entry.agent.values();
      yield* entry.skill.values();
      yield* entry.command.values();
      yield* entry.supplementary.values();
    }
  }

  stats(): ToolkitStats[] {
    return Array.from(this.toolkits, ([toolkit, entry]) => ({
      toolkit,
      agents: entry.agent.size,
      skills: entry.skill.size,
      commands: entry.command.size,
      supplementary: entry.supplementary.size,
    }));
  }

  /** Number of agents, skills and commands across all toolkits */
  get size(): number {
    let total = 0;
    for (const entry of this.toolkits.values()) {
      total += entry.agent.size + entry.skill.size + entry.command.size;
    }
    return total;
  }
}

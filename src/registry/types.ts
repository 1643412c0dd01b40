/**
 * Plugin Document Registry Types
 *
 * Documents are discovered under a toolkit tree:
 *   <root>/<toolkit>/agents/*.md
 *   <root>/<toolkit>/skills/<skill-name>/SKILL.md   (+ reference/*.md)
 *   <root>/<toolkit>/commands/*.md
 */

import type { FrontMatter } from '../frontmatter/types.js';

export type DocumentRole = 'agent' | 'skill' | 'command' | 'supplementary';

/** Roles served by lookup() */
export type PrimaryRole = Exclude<DocumentRole, 'supplementary'>;

export const PRIMARY_ROLES: readonly PrimaryRole[] = ['agent', 'skill', 'command'];

interface DocumentBase {
  /** Absolute path to the file */
  readonly path: string;

  /** POSIX path relative to the scanned root (e.g., go-toolkit/agents/go-expert.md) */
  readonly relativePath: string;

  /** First path segment under the scanned root */
  readonly toolkit: string;

  readonly frontMatter: FrontMatter;

  /** Text after the front-matter block, not interpreted */
  readonly body: string;
}

export interface AgentDocument extends DocumentBase {
  readonly role: 'agent';
  readonly name: string;
  readonly description: string;
  readonly tools?: readonly string[];
  readonly model?: string;
}

export interface SkillDocument extends DocumentBase {
  readonly role: 'skill';
  readonly name: string;
  readonly description: string;
  readonly allowedTools?: readonly string[];
  readonly model?: string;
  /** Relative paths of the skill's reference/*.md files */
  readonly references: readonly string[];
}

export interface CommandDocument extends DocumentBase {
  readonly role: 'command';
  /** Filename stem, prefixed with its sub-directories (git:commit) */
  readonly name: string;
  readonly description: string;
  readonly argumentHint?: string;
  readonly allowedTools?: readonly string[];
  readonly model?: string;
}

export interface SupplementaryDocument extends DocumentBase {
  readonly role: 'supplementary';
}

export type PluginDocument =
  | AgentDocument
  | SkillDocument
  | CommandDocument
  | SupplementaryDocument;

export interface DocumentOfRole {
  agent: AgentDocument;
  skill: SkillDocument;
  command: CommandDocument;
  supplementary: SupplementaryDocument;
}

// =============================================================================
// Errors and warnings (returned as data)
// =============================================================================

export type DocumentErrorKind =
  | 'MalformedFrontMatter'
  | 'MissingRequiredField'
  | 'InvalidField'
  | 'DuplicateName'
  | 'UnreadableFile';

export interface DocumentError {
  kind: DocumentErrorKind;
  /** Relative path of the offending file */
  file: string;
  message: string;
  /** Front-matter key involved, when there is one */
  field?: string;
  /** 1-based line of a malformed block */
  line?: number;
}

export type BuildWarningKind = 'DuplicateName' | 'UnresolvedSkillReference';

export interface BuildWarning {
  kind: BuildWarningKind;
  file: string;
  message: string;
}

export interface NotFoundError {
  kind: 'NotFound';
  /** 'toolkit' when the toolkit is unknown, 'document' when only the name misses */
  reason: 'toolkit' | 'document';
  toolkit: string;
  role: PrimaryRole;
  name: string;
  message: string;
}

export type LookupResult<R extends PrimaryRole = PrimaryRole> =
  | { ok: true; document: DocumentOfRole[R] }
  | { ok: false; error: NotFoundError };

export type DuplicatePolicy = 'error' | 'last-wins';

export interface ToolkitStats {
  toolkit: string;
  agents: number;
  skills: number;
  commands: number;
  supplementary: number;
}

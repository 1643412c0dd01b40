/**
 * Document Classifier
 *
 * Assigns a role from the document's path and validates the front matter
 * that role requires. Role assignment never looks at file contents:
 *
 *   agents/<any>.md                 → agent
 *   skills/<skill-name>/SKILL.md    → skill
 *   skills/<skill-name>/reference/* → supplementary
 *   commands/<any>.md               → command
 *   anything else                   → supplementary
 */

import * as path from 'path';
import type { z } from 'zod';
import type { FrontMatter } from '../frontmatter/types.js';
import { toPlainObject } from '../frontmatter/types.js';
import {
  validateAgentFrontMatter,
  validateCommandFrontMatter,
  validateSkillFrontMatter,
  type ValidationResult,
} from '../base/utils/config-validator.js';
import { isValidDocumentName } from '../base/utils/validation.js';
import { logger } from '../base/utils/logger.js';
import { isDebugEnabled } from '../base/utils/debug.js';
import type { DocumentErrorKind, DocumentRole } from '../registry/types.js';

export const SKILL_FILE = 'SKILL.md';
export const REFERENCE_DIR = 'reference';

const ROLE_DIRECTORIES: Record<string, Exclude<DocumentRole, 'supplementary'>> = {
  agents: 'agent',
  skills: 'skill',
  commands: 'command',
};

export function toSegments(relativePath: string): string[] {
  return relativePath
    .replace(/\\/g, '/')
    .split('/')
    .filter((segment) => segment !== '' && segment !== '.');
}

function findRoleIndex(directories: string[]): number {
  return directories.findIndex((segment) => Object.hasOwn(ROLE_DIRECTORIES, segment));
}

/**
 * Determine a document's role from its path alone
 *
 * @param relativePath - Path relative to a toolkit root (a longer prefix such
 *   as plugins/<toolkit>/ is tolerated)
 */
export function classifyPath(relativePath: string): DocumentRole {
  const segments = toSegments(relativePath);
  const fileName = segments.pop();
  if (!fileName || !fileName.endsWith('.md')) {
    return 'supplementary';
  }

  const roleIndex = findRoleIndex(segments);
  if (roleIndex === -1) {
    return 'supplementary';
  }

  const below = segments.slice(roleIndex + 1);
  if (below.includes(REFERENCE_DIR)) {
    return 'supplementary';
  }

  const role = ROLE_DIRECTORIES[segments[roleIndex]];
  if (role === 'skill') {
    return fileName === SKILL_FILE && below.length > 0 ? 'skill' : 'supplementary';
  }
  return role;
}

/**
 * Command name from its path: commands/smart-commit.md → smart-commit,
 * commands/git/commit.md → git:commit
 */
export function commandNameFromPath(relativePath: string): string {
  const segments = toSegments(relativePath);
  const roleIndex = segments.indexOf('commands');
  const nested = segments.slice(roleIndex + 1);
  const fileName = nested.pop() ?? '';
  return [...nested, path.basename(fileName, '.md')].join(':');
}

// =============================================================================
// Required-field validation
// =============================================================================

export interface ClassificationError {
  kind: Extract<DocumentErrorKind, 'MissingRequiredField' | 'InvalidField'>;
  message: string;
  field?: string;
}

export type Classification =
  | {
      role: 'agent';
      name: string;
      description: string;
      tools?: string[];
      model?: string;
    }
  | {
      role: 'skill';
      name: string;
      description: string;
      allowedTools?: string[];
      model?: string;
    }
  | {
      role: 'command';
      name: string;
      description: string;
      argumentHint?: string;
      allowedTools?: string[];
      model?: string;
    }
  | { role: 'supplementary' };

export type ClassifyResult =
  | { ok: true; classification: Classification }
  | { ok: false; error: ClassificationError };

function isMissing(issue: z.ZodIssue): boolean {
  if (issue.code === 'invalid_type') {
    return issue.received === 'undefined';
  }
  return issue.code === 'too_small';
}

function toClassificationError(
  result: Extract<ValidationResult<unknown>, { valid: false }>,
  role: DocumentRole
): ClassificationError {
  const [first] = result.issues;
  const field = first && first.path.length > 0 ? String(first.path[0]) : undefined;
  const missing = first !== undefined && isMissing(first);

  return {
    kind: missing ? 'MissingRequiredField' : 'InvalidField',
    field,
    message: missing
      ? `${role} is missing required field "${field ?? '?'}"`
      : `${role} has an invalid field: ${result.errors.join(', ')}`,
  };
}

/**
 * Assign a role and validate the fields that role requires
 *
 * @param relativePath - Path relative to the toolkit root
 * @param frontMatter - Parsed front matter of the document
 */
export function classifyDocument(relativePath: string, frontMatter: FrontMatter): ClassifyResult {
  const role = classifyPath(relativePath);
  const data = toPlainObject(frontMatter);

  if (isDebugEnabled('classifier')) {
    logger.debug('Classifier', `Classified as ${role}`, { file: relativePath });
  }

  switch (role) {
    case 'agent': {
      const result = validateAgentFrontMatter(data, relativePath);
      if (!result.valid) return { ok: false, error: toClassificationError(result, role) };
      const { name, description, tools, model } = result.data;
      return { ok: true, classification: { role, name, description, tools, model } };
    }

    case 'skill': {
      const result = validateSkillFrontMatter(data, relativePath);
      if (!result.valid) return { ok: false, error: toClassificationError(result, role) };
      const { name, description, model } = result.data;
      return {
        ok: true,
        classification: { role, name, description, allowedTools: result.data['allowed-tools'], model },
      };
    }

    case 'command': {
      const result = validateCommandFrontMatter(data, relativePath);
      if (!result.valid) return { ok: false, error: toClassificationError(result, role) };
      const name = commandNameFromPath(relativePath);
      if (!isValidDocumentName(name)) {
        return {
          ok: false,
          error: {
            kind: 'InvalidField',
            message: `command file name "${name}" may only contain letters, numbers, "-", "_" and ":"`,
          },
        };
      }
      return {
        ok: true,
        classification: {
          role,
          name,
          description: result.data.description,
          argumentHint: result.data['argument-hint'],
          allowedTools: result.data['allowed-tools'],
          model: result.data.model,
        },
      };
    }

    case 'supplementary':
      return { ok: true, classification: { role } };
  }
}

/**
 * Front-Matter Parser
 *
 * Splits a plugin document into its `key: value` header and its prose body.
 *
 *   ---
 *   name: playbook-architect
 *   description: Designs Ansible playbooks
 *   tools: Read, Write, Edit
 *   ---
 *   # Body...
 *
 * The block must open on the very first line and close on the next line
 * made of exactly three hyphens. Every non-blank line in between must be
 * `key: value`. `tools` and `allowed-tools` are split on commas, every other
 * key stays a single string.
 */

import { isValidFrontMatterKey } from '../base/utils/validation.js';
import { logger } from '../base/utils/logger.js';
import { isVerboseDebugEnabled } from '../base/utils/debug.js';
import {
  LIST_KEYS,
  list,
  scalar,
  type FrontMatterParseResult,
  type FrontMatterValue,
  type MalformedFrontMatter,
} from './types.js';

export const DELIMITER = '---';

const LINE_PATTERN = /^([^:\s]+):(?:\s+(.*))?$/;

function malformed(message: string, line?: number): { ok: false; error: MalformedFrontMatter } {
  return { ok: false, error: { kind: 'MalformedFrontMatter', message, line } };
}

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return value.slice(1, -1);
    }
  }
  return value;
}

/**
 * Split a list value: `Read, Write` or `[Read, Write]`
 */
export function splitListValue(raw: string): string[] {
  const unwrapped = raw.startsWith('[') && raw.endsWith(']') ? raw.slice(1, -1) : raw;
  return unwrapped
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function parseValue(key: string, raw: string): FrontMatterValue {
  const trimmed = raw.trim();
  return LIST_KEYS.has(key) ? list(splitListValue(trimmed)) : scalar(unquote(trimmed));
}

/**
 * Parse a document's front matter
 *
 * @param text - Full file contents
 * @returns The mapping and the remaining body, or a MalformedFrontMatter error
 */
export function parseFrontMatter(text: string): FrontMatterParseResult {
  const normalized = text.replace(/^\uFEFF/, '').replace(/\r\n/g, '\n');
  const lines = normalized.split('\n');

  if (lines[0] !== DELIMITER) {
    return malformed('Missing opening "---" delimiter on the first line', 1);
  }

  const closingIndex = lines.indexOf(DELIMITER, 1);
  if (closingIndex === -1) {
    return malformed('Front matter is never closed by a "---" line');
  }

  const frontMatter = new Map<string, FrontMatterValue>();

  for (let i = 1; i < closingIndex; i++) {
    const line = lines[i];
    if (line.trim() === '') continue;

    const match = LINE_PATTERN.exec(line);
    if (!match || !isValidFrontMatterKey(match[1])) {
      return malformed(`Expected "key: value" but found "${line}"`, i + 1);
    }

    const key = match[1];
    if (frontMatter.has(key)) {
      return malformed(`Duplicate key "${key}"`, i + 1);
    }
    frontMatter.set(key, parseValue(key, match[2] ?? ''));
  }

  if (isVerboseDebugEnabled('parser')) {
    logger.debug('Parser', 'Parsed front matter', { keys: Array.from(frontMatter.keys()) });
  }

  return {
    ok: true,
    frontMatter,
    body: lines.slice(closingIndex + 1).join('\n'),
  };
}

/**
 * Check whether a text starts with a front-matter block at all
 */
export function hasFrontMatter(text: string): boolean {
  const firstLine = text.replace(/^\uFEFF/, '').split('\n', 1)[0];
  return firstLine.replace(/\r$/, '') === DELIMITER;
}

/**
 * Front-Matter Serializer
 *
 * Writes a mapping produced by parseFrontMatter back to `key: value` lines,
 * so that parsing the output yields an equal mapping.
 */

import { DELIMITER } from './parser.js';
import type { FrontMatter, FrontMatterValue } from './types.js';

function formatValue(value: FrontMatterValue): string {
  if (value.kind === 'list') {
    const joined = value.items.join(', ');
    // Keep a bracketed first/last item from being read as the flow form
    return joined.startsWith('[') && joined.endsWith(']') ? `[${joined}]` : joined;
  }

  const text = value.value;
  return text.startsWith('"') || text.startsWith("'") ? `"${text}"` : text;
}

export function serializeFrontMatterLines(frontMatter: FrontMatter): string[] {
  return Array.from(frontMatter, ([key, value]) => {
    const formatted = formatValue(value);
    return formatted ? `${key}: ${formatted}` : `${key}:`;
  });
}

/**
 * Serialize a front-matter block, optionally followed by a body
 */
export function serializeFrontMatter(frontMatter: FrontMatter, body = ''): string {
  return [DELIMITER, ...serializeFrontMatterLines(frontMatter), DELIMITER, body].join('\n');
}

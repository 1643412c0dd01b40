/**
 * Front Matter - Module exports
 */

export * from './types.js';
export { parseFrontMatter, hasFrontMatter, splitListValue, parseValue, DELIMITER } from './parser.js';
export { serializeFrontMatter, serializeFrontMatterLines } from './serializer.js';

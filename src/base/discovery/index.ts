/**
 * Document Discovery - Public API
 */

export type { FileSource, FileWalkOptions } from './types.js';

export {
  FileWalk,
  walkDocumentFiles,
  compareByPathSegments,
  errorPathBelow,
  DEFAULT_IGNORE,
} from './file-walker.js';

/**
 * Document Classifier - Module exports
 */

export {
  classifyPath,
  classifyDocument,
  commandNameFromPath,
  toSegments,
  SKILL_FILE,
  REFERENCE_DIR,
  type Classification,
  type ClassificationError,
  type ClassifyResult,
} from './classifier.js';

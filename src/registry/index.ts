/**
 * Plugin Document Registry - Module exports
 */

export * from './types.js';
export { ToolkitRegistry, createToolkitDocuments, type ToolkitDocuments } from './registry.js';
export { buildRegistry, loadDocument, type BuildOptions, type BuildResult } from './builder.js';
export {
  extractSkillReferences,
  findUnresolvedSkillReferences,
  toWarning,
  type SkillReference,
} from './references.js';
export { createBuildReport, formatBuildReport, type BuildReport } from './report.js';

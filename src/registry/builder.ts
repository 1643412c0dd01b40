/**
 * Registry Builder - scan a plugin tree into a ToolkitRegistry
 *
 * 1. Enumerate files (lazy depth-first walk, see FileWalk)
 * 2. Load each file: parse front matter, classify, validate
 * 3. Merge the per-file outcomes in one pass, in discovery order
 *
 * A file or directory that fails is recorded in `errors` and skipped; it
 * never stops the rest of the tree from loading. Only an unreadable root throws.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { parseFrontMatter } from '../frontmatter/parser.js';
import { classifyDocument, classifyPath, REFERENCE_DIR, toSegments, type Classification } from '../classifier/classifier.js';
import { compareByPathSegments, errorPathBelow, walkDocumentFiles } from '../base/discovery/file-walker.js';
import type { FileSource } from '../base/discovery/types.js';
import { DEFAULT_CONFIG } from '../base/config/types.js';
import { RegistryRootError, errorToString } from '../base/utils/errors.js';
import { logger } from '../base/utils/logger.js';
import { isDebugEnabled } from '../base/utils/debug.js';
import { ToolkitRegistry, createToolkitDocuments, type ToolkitDocuments } from './registry.js';
import type {
  BuildWarning,
  DocumentError,
  DuplicatePolicy,
  PluginDocument,
  SkillDocument,
} from './types.js';

export interface BuildOptions {
  /** Glob patterns skipped during the walk */
  ignore?: string[];

  /** Duplicate agent/skill names: 'error' keeps the first, 'last-wins' the last */
  duplicatePolicy?: DuplicatePolicy;

  /** Files read in parallel (default: 16) */
  readConcurrency?: number;

  /** Replace the filesystem walk, e.g. to build from a precomputed list */
  files?: FileSource;
}

export interface BuildResult {
  /** Absolute path of the scanned root */
  root: string;
  registry: ToolkitRegistry;
  errors: DocumentError[];
  warnings: BuildWarning[];
}

type FileOutcome =
  | { ok: true; document: PluginDocument }
  | { ok: false; toolkit: string; error: DocumentError };

const COMPONENT = 'Registry';

async function assertReadableDirectory(root: string): Promise<void> {
  const stats = await fs.stat(root).catch((error: unknown) => {
    throw new RegistryRootError(`Cannot read plugin root ${root}: ${errorToString(error)}`, root, {
      cause: error,
    });
  });
  if (!stats.isDirectory()) {
    throw new RegistryRootError(`Plugin root ${root} is not a directory`, root);
  }
  await fs.readdir(root).catch((error: unknown) => {
    throw new RegistryRootError(`Cannot read plugin root ${root}: ${errorToString(error)}`, root, {
      cause: error,
    });
  });
}

/**
 * A positive integer, or the default for anything else (0, NaN, 2.5, ...)
 */
function resolveConcurrency(value: number | undefined): number {
  if (value === undefined) {
    return DEFAULT_CONFIG.readConcurrency;
  }
  if (Number.isInteger(value) && value > 0) {
    return value;
  }
  logger.warn(COMPONENT, `Ignoring invalid readConcurrency ${value}`, {
    default: DEFAULT_CONFIG.readConcurrency,
  });
  return DEFAULT_CONFIG.readConcurrency;
}

function toDocument(
  base: Omit<PluginDocument, 'role'>,
  classification: Classification
): PluginDocument {
  switch (classification.role) {
    case 'skill':
      return { ...base, ...classification, references: [] };
    case 'agent':
    case 'command':
    case 'supplementary':
      return { ...base, ...classification };
  }
}

/**
 * Load one file into a document or a per-file error
 *
 * @param relativePath - POSIX path relative to root, starting with the toolkit
 */
export async function loadDocument(root: string, relativePath: string): Promise<FileOutcome> {
  const [toolkit, ...rest] = toSegments(relativePath);
  const pathInToolkit = rest.join('/');
  const absolutePath = path.join(root, relativePath);
  const fail = (error: Omit<DocumentError, 'file'>): FileOutcome => ({
    ok: false,
    toolkit,
    error: { ...error, file: relativePath },
  });

  let text: string;
  try {
    text = await fs.readFile(absolutePath, 'utf-8');
  } catch (error) {
    return fail({ kind: 'UnreadableFile', message: errorToString(error) });
  }

  const base = { path: absolutePath, relativePath, toolkit };
  const parsed = parseFrontMatter(text);

  // Reference pages and other loose files need no header
  if (classifyPath(pathInToolkit) === 'supplementary') {
    return {
      ok: true,
      document: parsed.ok
        ? { ...base, role: 'supplementary', frontMatter: parsed.frontMatter, body: parsed.body }
        : { ...base, role: 'supplementary', frontMatter: new Map(), body: text },
    };
  }

  if (!parsed.ok) {
    return fail({ kind: 'MalformedFrontMatter', message: parsed.error.message, line: parsed.error.line });
  }

  const classified = classifyDocument(pathInToolkit, parsed.frontMatter);
  if (!classified.ok) {
    return fail(classified.error);
  }

  return {
    ok: true,
    document: toDocument(
      { ...base, frontMatter: parsed.frontMatter, body: parsed.body },
      classified.classification
    ),
  };
}

/**
 * Read files with at most `concurrency` reads in flight, keeping input order
 */
async function loadAll(root: string, files: string[], concurrency: number): Promise<FileOutcome[]> {
  const outcomes: FileOutcome[] = [];
  for (let i = 0; i < files.length; i += concurrency) {
    const batch = files.slice(i, i + concurrency);
    outcomes.push(...(await Promise.all(batch.map((file) => loadDocument(root, file)))));
  }
  return outcomes;
}

function unreadableDirectory(relativePath: string, error: unknown): DocumentError {
  return {
    kind: 'UnreadableFile',
    file: relativePath,
    message: `Cannot read directory: ${errorToString(error)}`,
  };
}

/**
 * Enumerate the source. A directory that cannot be read becomes an
 * UnreadableFile error; everything enumerated before and after it is kept.
 */
async function collectFiles(
  source: FileSource,
  root: string,
  unreadable: DocumentError[]
): Promise<string[]> {
  const files: string[] = [];
  try {
    for await (const file of source) {
      if (toSegments(file).length < 2) {
        logger.debug(COMPONENT, 'Skipping file outside any toolkit', { file });
        continue;
      }
      files.push(file);
    }
  } catch (error) {
    const relativePath = errorPathBelow(root, error) ?? '.';
    logger.warn(COMPONENT, `Stopped scanning at ${relativePath}: ${errorToString(error)}`, {
      root,
    });
    unreadable.push(unreadableDirectory(relativePath, error));
  }
  return files;
}

/**
 * Place walk failures among the file outcomes by path, so that their
 * toolkits keep their discovery position
 */
function mergeWalkFailures(outcomes: FileOutcome[], unreadable: DocumentError[]): FileOutcome[] {
  const merged = [...outcomes];
  for (const error of unreadable) {
    const [toolkit] = toSegments(error.file);
    if (toolkit === undefined) continue;
    const failure: FileOutcome = { ok: false, toolkit, error };
    const index = merged.findIndex(
      (outcome) => compareByPathSegments(outcomeFile(outcome), error.file) > 0
    );
    merged.splice(index === -1 ? merged.length : index, 0, failure);
  }
  return merged;
}

function outcomeFile(outcome: FileOutcome): string {
  return outcome.ok ? outcome.document.relativePath : outcome.error.file;
}

/**
 * Attach each skill's reference/*.md files and freeze every document
 */
function finalize(entry: ToolkitDocuments): void {
  const supplementary = Array.from(entry.supplementary.values());

  for (const [name, skill] of entry.skill) {
    const prefix = `${path.posix.dirname(skill.relativePath)}/${REFERENCE_DIR}/`;
    const references = supplementary
      .map((doc) => doc.relativePath)
      .filter((relativePath) => relativePath.startsWith(prefix));
    const withReferences: SkillDocument = { ...skill, references: Object.freeze(references) };
    entry.skill.set(name, withReferences);
  }

  for (const documents of [entry.agent, entry.skill, entry.command, entry.supplementary]) {
    for (const document of documents.values()) {
      Object.freeze(document);
    }
  }
}

/**
 * Build a registry from every document below `rootPath`
 *
 * @param rootPath - Directory whose children are toolkits (e.g. ./plugins)
 * @throws RegistryRootError when the root itself cannot be read
 */
export async function buildRegistry(rootPath: string, options: BuildOptions = {}): Promise<BuildResult> {
  const root = path.resolve(rootPath);
  const duplicatePolicy = options.duplicatePolicy ?? DEFAULT_CONFIG.duplicatePolicy;
  const concurrency = resolveConcurrency(options.readConcurrency);

  await assertReadableDirectory(root);

  const unreadable: DocumentError[] = [];
  const source =
    options.files ??
    walkDocumentFiles(root, {
      ignore: options.ignore,
      onUnreadable: (relativePath, error) => unreadable.push(unreadableDirectory(relativePath, error)),
    });
  const files = await collectFiles(source, root, unreadable);
  const outcomes = mergeWalkFailures(await loadAll(root, files, concurrency), unreadable);

  // Single-threaded merge: discovery order decides duplicates
  const toolkits = new Map<string, ToolkitDocuments>();
  // Walk failures outside any toolkit have no place in the outcomes
  const errors: DocumentError[] = unreadable.filter((error) => toSegments(error.file).length === 0);
  const warnings: BuildWarning[] = [];

  const entryFor = (toolkit: string): ToolkitDocuments => {
    let entry = toolkits.get(toolkit);
    if (!entry) {
      entry = createToolkitDocuments();
      toolkits.set(toolkit, entry);
    }
    return entry;
  };

  for (const outcome of outcomes) {
    if (!outcome.ok) {
      entryFor(outcome.toolkit);
      errors.push(outcome.error);
      logger.warn(COMPONENT, outcome.error.message, {
        file: outcome.error.file,
        kind: outcome.error.kind,
        hint: 'Check the front matter and required fields',
      });
      continue;
    }

    const document = outcome.document;
    const entry = entryFor(document.toolkit);

    if (document.role === 'supplementary') {
      entry.supplementary.set(document.relativePath, document);
      continue;
    }

    const existing = entry[document.role].get(document.name);
    if (existing) {
      const message = `${document.role} "${document.name}" in toolkit "${document.toolkit}" is also defined by ${existing.relativePath}`;
      if (duplicatePolicy === 'error') {
        errors.push({ kind: 'DuplicateName', file: document.relativePath, field: 'name', message });
        logger.warn(COMPONENT, message, { file: document.relativePath, kind: 'DuplicateName' });
        continue;
      }
      warnings.push({ kind: 'DuplicateName', file: document.relativePath, message: `${message}; keeping the later one` });
      logger.warn(COMPONENT, `${message}; keeping the later one`, { file: document.relativePath });
    }

    switch (document.role) {
      case 'agent':
        entry.agent.set(document.name, document);
        break;
      case 'skill':
        entry.skill.set(document.name, document);
        break;
      case 'command':
        entry.command.set(document.name, document);
        break;
    }

    if (isDebugEnabled('registry')) {
      logger.debug(COMPONENT, `Loaded ${document.role} "${document.name}"`, {
        toolkit: document.toolkit,
        file: document.relativePath,
      });
    }
  }

  for (const entry of toolkits.values()) {
    finalize(entry);
  }

  return { root, registry: new ToolkitRegistry(toolkits), errors, warnings };
}

/**
 * File Walker - Depth-first enumeration of document files
 *
 * Paths come out relative to the root, POSIX-separated, sorted segment by
 * segment so that a directory's files are visited together and the order is
 * the same on every platform and every run.
 *
 * Each first-level directory is scanned on its own: an unreadable directory
 * is reported through `onUnreadable` and skipped, the other subtrees are
 * still walked.
 */

import fastGlob from 'fast-glob';
import * as path from 'path';
import type { FileSource, FileWalkOptions } from './types.js';
import { logger } from '../utils/logger.js';
import { isVerboseDebugEnabled } from '../utils/debug.js';

export const DEFAULT_IGNORE = ['**/node_modules/**', '**/.git/**'];

/**
 * Order two relative paths depth-first (pre-order, by code unit per segment)
 */
export function compareByPathSegments(a: string, b: string): number {
  const left = a.split('/');
  const right = b.split('/');
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    if (left[i] === right[i]) continue;
    return left[i] < right[i] ? -1 : 1;
  }
  return left.length - right.length;
}

/**
 * Relative POSIX path of the directory an fs error points at, if it lies below root
 */
export function errorPathBelow(root: string, error: unknown): string | undefined {
  if (!(error instanceof Error) || !('path' in error) || typeof error.path !== 'string') {
    return undefined;
  }
  const relative = path.relative(root, path.resolve(root, error.path));
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    return undefined;
  }
  return relative.split(path.sep).join('/');
}

export class FileWalk implements FileSource {
  readonly root: string;
  private readonly ignore: string[];
  private readonly extension: string;
  private readonly onUnreadable?: (relativePath: string, error: unknown) => void;

  constructor(root: string, options: FileWalkOptions = {}) {
    this.root = path.resolve(root);
    this.ignore = options.ignore ?? DEFAULT_IGNORE;
    this.extension = options.extension ?? '.md';
    this.onUnreadable = options.onUnreadable;
  }

  private globOptions(): fastGlob.Options {
    return {
      cwd: this.root,
      onlyFiles: true,
      ignore: this.ignore,
      followSymbolicLinks: false,
    };
  }

  /**
   * Files below one first-level directory. On a read error the subtree is
   * reported once, then walked again with errors suppressed.
   */
  private async scanDirectory(directory: string): Promise<string[]> {
    const pattern = `${fastGlob.escapePath(directory)}/**/*${this.extension}`;
    try {
      return await fastGlob(pattern, this.globOptions());
    } catch (error) {
      const unreadable = errorPathBelow(this.root, error) ?? directory;
      logger.debug('Discovery', 'Skipping unreadable directory', { directory: unreadable });
      this.onUnreadable?.(unreadable, error);
      return fastGlob(pattern, { ...this.globOptions(), suppressErrors: true });
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<string> {
    const topLevel = await fastGlob('*', {
      cwd: this.root,
      onlyFiles: false,
      markDirectories: true,
      deep: 1,
      ignore: this.ignore,
      followSymbolicLinks: false,
    });

    const files: string[] = [];
    for (const entry of topLevel.sort(compareByPathSegments)) {
      if (entry.endsWith('/')) {
        files.push(...(await this.scanDirectory(entry.slice(0, -1))));
      } else if (entry.endsWith(this.extension)) {
        files.push(entry);
      }
    }
    files.sort(compareByPathSegments);

    for (const file of files) {
      if (isVerboseDebugEnabled('discovery')) {
        logger.debug('Discovery', 'Visiting file', { file });
      }
      yield file;
    }
  }

  /**
   * Collect one full enumeration
   */
  async toArray(): Promise<string[]> {
    const files: string[] = [];
    for await (const file of this) {
      files.push(file);
    }
    return files;
  }
}

/**
 * Create a walk over every markdown file below `root`
 */
export function walkDocumentFiles(root: string, options: FileWalkOptions = {}): FileWalk {
  return new FileWalk(root, options);
}

/**
 * Discovery Types
 *
 * The registry never touches the filesystem traversal primitive directly:
 * it consumes a FileSource, a restartable sequence of relative file paths.
 */

/**
 * A lazy, finite, restartable sequence of file paths relative to `root`.
 * Each iteration re-enumerates the tree.
 */
export interface FileSource extends AsyncIterable<string> {
  /** Absolute path of the directory being enumerated */
  readonly root: string;
}

export interface FileWalkOptions {
  /** Glob patterns to skip, relative to the root */
  ignore?: string[];

  /** File extension including dot (default: '.md') */
  extension?: string;

  /**
   * Called for a directory below the root that cannot be read. The walk
   * skips that subtree and goes on with the rest.
   *
   * @param relativePath - POSIX path of the directory, relative to the root
   */
  onUnreadable?: (relativePath: string, error: unknown) => void;
}

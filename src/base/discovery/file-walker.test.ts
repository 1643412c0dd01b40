/**
 * File Walker Tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import { compareByPathSegments, errorPathBelow, walkDocumentFiles } from './file-walker.js';
import { createTestTree, writeFiles } from '../../../tests/helpers/plugin-tree.js';

describe('compareByPathSegments', () => {
  it('should keep a directory before its siblings that sort after it', () => {
    const paths = ['a-b/x.md', 'a/z.md', 'a/b/y.md', 'a.md'];
    expect([...paths].sort(compareByPathSegments)).toEqual(['a/b/y.md', 'a/z.md', 'a-b/x.md', 'a.md']);
  });

  it('should compare by code unit', () => {
    expect(compareByPathSegments('B.md', 'a.md')).toBeLessThan(0);
  });
});

describe('errorPathBelow', () => {
  it('should return the POSIX path of a directory below the root', () => {
    const error = Object.assign(new Error('EACCES'), { path: path.join('/srv/plugins', 'go', 'skills') });
    expect(errorPathBelow('/srv/plugins', error)).toBe('go/skills');
  });

  it('should ignore errors without a path or outside the root', () => {
    expect(errorPathBelow('/srv/plugins', new Error('boom'))).toBeUndefined();
    expect(errorPathBelow('/srv/plugins', Object.assign(new Error('EACCES'), { path: '/srv' }))).toBeUndefined();
    expect(errorPathBelow('/srv/plugins', Object.assign(new Error('EACCES'), { path: '/srv/plugins' }))).toBeUndefined();
  });
});

// chmod does not keep root out of a directory
const itWhenPermissionsApply = process.getuid?.() === 0 ? it.skip : it;

describe('FileWalk', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await createTestTree('plugdoc-walk-'));
    await writeFiles(dir, {
      'go/agents/go-expert.md': '',
      'go/skills/goroutine-patterns/SKILL.md': '',
      'go/skills/goroutine-patterns/reference/channels.md': '',
      'go/skills/goroutine-patterns/notes.txt': '',
      'go/node_modules/pkg/README.md': '',
      'ansible/commands/lint.md': '',
    });
  });

  afterEach(async () => {
    await cleanup();
  });

  it('should list markdown files depth-first and skip ignored directories', async () => {
    const files = await walkDocumentFiles(dir).toArray();

    expect(files).toEqual([
      'ansible/commands/lint.md',
      'go/agents/go-expert.md',
      'go/skills/goroutine-patterns/SKILL.md',
      'go/skills/goroutine-patterns/reference/channels.md',
    ]);
  });

  it('should be restartable', async () => {
    const walk = walkDocumentFiles(dir);
    expect(await walk.toArray()).toEqual(await walk.toArray());
  });

  itWhenPermissionsApply('should report an unreadable directory and walk the rest', async () => {
    const locked = path.join(dir, 'go/skills');
    await fs.chmod(locked, 0o000);
    const unreadable: string[] = [];

    try {
      const files = await walkDocumentFiles(dir, {
        onUnreadable: (relativePath) => unreadable.push(relativePath),
      }).toArray();

      expect(files).toEqual(['ansible/commands/lint.md', 'go/agents/go-expert.md']);
      expect(unreadable).toEqual(['go/skills']);
    } finally {
      await fs.chmod(locked, 0o755);
    }
  });

  it('should apply custom ignore patterns', async () => {
    const files = await walkDocumentFiles(dir, { ignore: ['**/reference/**', '**/node_modules/**'] }).toArray();

    expect(files).toEqual([
      'ansible/commands/lint.md',
      'go/agents/go-expert.md',
      'go/skills/goroutine-patterns/SKILL.md',
    ]);
  });
});

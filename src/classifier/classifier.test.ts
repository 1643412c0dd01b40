/**
 * Document Classifier Tests
 */

import { describe, it, expect } from '@jest/globals';
import { classifyDocument, classifyPath, commandNameFromPath } from './classifier.js';
import { list, scalar, type FrontMatter, type FrontMatterValue } from '../frontmatter/types.js';

function frontMatter(entries: Record<string, FrontMatterValue>): FrontMatter {
  return new Map(Object.entries(entries));
}

describe('classifyPath', () => {
  it('should classify SKILL.md under skills/ as a skill', () => {
    expect(classifyPath('plugins/go-toolkit/skills/goroutine-patterns/SKILL.md')).toBe('skill');
  });

  it('should classify reference pages of a skill as supplementary', () => {
    expect(classifyPath('plugins/go-toolkit/skills/goroutine-patterns/reference/channels.md')).toBe(
      'supplementary'
    );
  });

  it('should only accept files named exactly SKILL.md as skills', () => {
    expect(classifyPath('skills/goroutine-patterns/examples.md')).toBe('supplementary');
    expect(classifyPath('skills/goroutine-patterns/skill.md')).toBe('supplementary');
    expect(classifyPath('skills/SKILL.md')).toBe('supplementary');
    expect(classifyPath('skills/testing/unit/SKILL.md')).toBe('skill');
  });

  it('should classify agents and commands by their directory', () => {
    expect(classifyPath('agents/playbook-architect.md')).toBe('agent');
    expect(classifyPath('commands/smart-commit.md')).toBe('command');
    expect(classifyPath('commands/git/commit.md')).toBe('command');
  });

  it('should accept Windows separators', () => {
    expect(classifyPath('agents\\cost-optimizer.md')).toBe('agent');
  });

  it('should classify files outside the role directories as supplementary', () => {
    expect(classifyPath('README.md')).toBe('supplementary');
    expect(classifyPath('docs/overview.md')).toBe('supplementary');
    expect(classifyPath('agents/notes.txt')).toBe('supplementary');
  });
});

describe('commandNameFromPath', () => {
  it('should use the filename stem', () => {
    expect(commandNameFromPath('commands/smart-commit.md')).toBe('smart-commit');
  });

  it('should prefix nested commands with their directory', () => {
    expect(commandNameFromPath('commands/git/commit.md')).toBe('git:commit');
  });
});

describe('classifyDocument', () => {
  it('should return typed agent fields', () => {
    const result = classifyDocument(
      'agents/go-expert.md',
      frontMatter({
        name: scalar('go-expert'),
        description: scalar('Reviews Go services'),
        tools: list(['Read', 'Grep']),
        model: scalar('sonnet'),
      })
    );

    expect(result).toEqual({
      ok: true,
      classification: {
        role: 'agent',
        name: 'go-expert',
        description: 'Reviews Go services',
        tools: ['Read', 'Grep'],
        model: 'sonnet',
      },
    });
  });

  it('should report a missing agent description', () => {
    const result = classifyDocument('agents/go-expert.md', frontMatter({ name: scalar('go-expert') }));

    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'MissingRequiredField',
        field: 'description',
        message: 'agent is missing required field "description"',
      },
    });
  });

  it('should report a missing skill name', () => {
    const result = classifyDocument(
      'skills/goroutine-patterns/SKILL.md',
      frontMatter({ description: scalar('Goroutine lifecycles') })
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('MissingRequiredField');
      expect(result.error.field).toBe('name');
    }
  });

  it('should treat an empty required value as missing', () => {
    const result = classifyDocument(
      'skills/goroutine-patterns/SKILL.md',
      frontMatter({ name: scalar('goroutine-patterns'), description: scalar('') })
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toEqual({
        kind: 'MissingRequiredField',
        field: 'description',
        message: 'skill is missing required field "description"',
      });
    }
  });

  it('should reject names with spaces', () => {
    const result = classifyDocument(
      'agents/bad.md',
      frontMatter({ name: scalar('bad name'), description: scalar('Has a space') })
    );

    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'InvalidField',
        field: 'name',
        message: 'agent has an invalid field: name: may only contain letters, numbers, "-", "_" and ":"',
      },
    });
  });

  it('should name commands by file and ignore a name key', () => {
    const result = classifyDocument(
      'commands/smart-commit.md',
      frontMatter({
        name: scalar('ignored'),
        description: scalar('Write a commit message'),
        'argument-hint': scalar('[scope]'),
        'allowed-tools': list(['Bash(git:*)']),
      })
    );

    expect(result).toEqual({
      ok: true,
      classification: {
        role: 'command',
        name: 'smart-commit',
        description: 'Write a commit message',
        argumentHint: '[scope]',
        allowedTools: ['Bash(git:*)'],
        model: undefined,
      },
    });
  });

  it('should require a description on commands', () => {
    const result = classifyDocument('commands/smart-commit.md', frontMatter({ 'argument-hint': scalar('[scope]') }));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('MissingRequiredField');
      expect(result.error.field).toBe('description');
    }
  });

  it('should not validate supplementary files', () => {
    expect(classifyDocument('skills/goroutine-patterns/reference/channels.md', new Map())).toEqual({
      ok: true,
      classification: { role: 'supplementary' },
    });
  });
});

/**
 * Skill reference check
 *
 * Agent prose is free text, so references to skills are only recognized in
 * two explicit shapes:
 *   - a relative path: `skills/goroutine-patterns` (or ./skills/.../SKILL.md),
 *     never part of a URL or a longer path
 *   - a back-ticked name followed by "skill": `goroutine-patterns` skill
 *
 * A reference resolves when the same toolkit has a skill with that declared
 * name or that directory name. Results are advisory warnings.
 */

import * as path from 'path';
import type { ToolkitRegistry } from './registry.js';
import type { AgentDocument, BuildWarning } from './types.js';

// skills/ must start a path: line start, whitespace, a backtick, `(`, ./ or ../
const PATH_REFERENCE = /(?:^|[\s`(]|\.\.?\/)skills\/([A-Za-z0-9_-]+)/gm;
const NAMED_REFERENCE = /`([A-Za-z0-9_:-]+)`\s+skill\b/gi;

export interface SkillReference {
  agent: string;
  toolkit: string;
  file: string;
  skill: string;
}

/**
 * Skill names mentioned by an agent, in order of first mention
 */
export function extractSkillReferences(body: string): string[] {
  const names = new Set<string>();
  for (const pattern of [PATH_REFERENCE, NAMED_REFERENCE]) {
    for (const match of body.matchAll(pattern)) {
      names.add(match[1]);
    }
  }
  return Array.from(names);
}

function knownSkills(registry: ToolkitRegistry, toolkit: string): Set<string> {
  const known = new Set<string>();
  for (const skill of registry.listDocuments(toolkit, 'skill')) {
    known.add(skill.name);
    known.add(path.posix.basename(path.posix.dirname(skill.relativePath)));
  }
  return known;
}

/**
 * Skill references in agent prose that match no skill of the agent's toolkit
 */
export function findUnresolvedSkillReferences(registry: ToolkitRegistry): SkillReference[] {
  const unresolved: SkillReference[] = [];

  for (const toolkit of registry.listToolkits()) {
    const known = knownSkills(registry, toolkit);
    const agents: AgentDocument[] = registry.listDocuments(toolkit, 'agent');

    for (const agent of agents) {
      for (const skill of extractSkillReferences(agent.body)) {
        if (!known.has(skill)) {
          unresolved.push({ agent: agent.name, toolkit, file: agent.relativePath, skill });
        }
      }
    }
  }

  return unresolved;
}

export function toWarning(reference: SkillReference): BuildWarning {
  return {
    kind: 'UnresolvedSkillReference',
    file: reference.file,
    message: `Agent "${reference.agent}" mentions skill "${reference.skill}", which toolkit "${reference.toolkit}" does not define`,
  };
}

/**
 * Configuration Validator
 *
 * Provides Zod schemas for validating:
 * - Agent, skill and command front matter (after parsing to plain data)
 * - The plugdoc.json registry configuration
 */

import { z } from 'zod';
import { logger } from './logger.js';
import { isValidDocumentName } from './validation.js';

const requiredText = z
  .string({ required_error: 'is required', invalid_type_error: 'must be a single value' })
  .trim()
  .min(1, 'is required');

const documentName = requiredText.refine(isValidDocumentName, {
  message: 'may only contain letters, numbers, "-", "_" and ":"',
});

const optionalText = z.string({ invalid_type_error: 'must be a single value' }).optional();

const toolList = z.array(z.string(), { invalid_type_error: 'must be a list' }).optional();

/**
 * Agent front matter: agents/*.md
 */
export const AgentFrontMatterSchema = z
  .object({
    name: documentName,
    description: requiredText,
    tools: toolList,
    model: optionalText,
  })
  .passthrough();

export type AgentFrontMatter = z.infer<typeof AgentFrontMatterSchema>;

/**
 * Skill front matter: skills/<name>/SKILL.md
 */
export const SkillFrontMatterSchema = z
  .object({
    name: documentName,
    description: requiredText,
    'allowed-tools': toolList,
    model: optionalText,
  })
  .passthrough();

export type SkillFrontMatter = z.infer<typeof SkillFrontMatterSchema>;

/**
 * Command front matter: commands/*.md (named by filename, not by a name key)
 */
export const CommandFrontMatterSchema = z
  .object({
    description: requiredText,
    'argument-hint': optionalText,
    'allowed-tools': toolList,
    model: optionalText,
  })
  .passthrough();

export type CommandFrontMatter = z.infer<typeof CommandFrontMatterSchema>;

export const DuplicatePolicySchema = z.enum(['error', 'last-wins']);

/**
 * plugdoc.json schema
 */
export const RegistryConfigSchema = z.object({
  root: z.string().min(1, 'root must not be empty').optional(),
  duplicatePolicy: DuplicatePolicySchema.optional(),
  ignore: z.array(z.string()).optional(),
  readConcurrency: z.number().int().positive().optional(),
});

export type RegistryConfigFile = z.infer<typeof RegistryConfigSchema>;

/**
 * Validation result
 */
export type ValidationResult<T> =
  | { valid: true; data: T }
  | { valid: false; errors: string[]; issues: z.ZodIssue[] };

export function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Validate data against a Zod schema
 *
 * @param context - Context for log messages (e.g., file path)
 */
export function validateConfig<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  context: string
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { valid: true, data: result.data };
  }

  const errors = result.error.issues.map(formatIssue);
  logger.debug('Validator', `Invalid data in ${context}`, { errors });

  return { valid: false, errors, issues: result.error.issues };
}

export function validateAgentFrontMatter(
  data: unknown,
  filePath: string
): ValidationResult<AgentFrontMatter> {
  return validateConfig(AgentFrontMatterSchema, data, filePath);
}

export function validateSkillFrontMatter(
  data: unknown,
  filePath: string
): ValidationResult<SkillFrontMatter> {
  return validateConfig(SkillFrontMatterSchema, data, filePath);
}

export function validateCommandFrontMatter(
  data: unknown,
  filePath: string
): ValidationResult<CommandFrontMatter> {
  return validateConfig(CommandFrontMatterSchema, data, filePath);
}

export function validateRegistryConfig(
  data: unknown,
  filePath: string
): ValidationResult<RegistryConfigFile> {
  return validateConfig(RegistryConfigSchema, data, filePath);
}

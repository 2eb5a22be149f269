/**
 * Frontmatter schemas for commands, agents and skills.
 *
 * The schemas check value types only. Semantic checks (model names,
 * permission modes, tool syntax) live in the lint rules so that a bad value
 * is reported instead of dropping the whole definition.
 */

import { z } from 'zod';

const stringOrList = z.union([z.string(), z.array(z.string())]);

/**
 * `argument-hint: [input]` is a YAML flow sequence; fold it back to the
 * bracketed text the author wrote.
 */
const argumentHint = z
  .union([z.string(), z.array(z.union([z.string(), z.number()]))])
  .transform((value) =>
    Array.isArray(value) ? value.map((entry) => `[${String(entry)}]`).join(' ') : value,
  );

const description = z.union([z.string(), z.number()]).transform((value) => String(value));

export const commandFrontmatterSchema = z
  .object({
    description: description.optional(),
    'argument-hint': argumentHint.optional(),
    'allowed-tools': stringOrList.optional(),
    model: z.string().optional(),
    agent: z.string().optional(),
    'disable-model-invocation': z.boolean().optional(),
  })
  .passthrough();

export const agentFrontmatterSchema = z
  .object({
    name: z.string().optional(),
    description: description.optional(),
    tools: stringOrList.optional(),
    disallowedTools: stringOrList.optional(),
    model: z.string().optional(),
    permissionMode: z.string().optional(),
    color: z.string().optional(),
    hooks: z.record(z.string(), z.unknown()).optional(),
  })
  .passthrough();

export const skillFrontmatterSchema = z
  .object({
    name: z.string().optional(),
    description: description.optional(),
    'argument-hint': argumentHint.optional(),
    'allowed-tools': stringOrList.optional(),
    model: z.string().optional(),
    agent: z.string().optional(),
    aliases: stringOrList.optional(),
    license: z.string().optional(),
    context: z.string().optional(),
    hooks: z.record(z.string(), z.unknown()).optional(),
    'user-invocable': z.boolean().optional(),
    'disable-model-invocation': z.boolean().optional(),
  })
  .passthrough();

export type CommandFrontmatter = z.infer<typeof commandFrontmatterSchema>;
export type AgentFrontmatter = z.infer<typeof agentFrontmatterSchema>;
export type SkillFrontmatter = z.infer<typeof skillFrontmatterSchema>;

/** Keys each kind recognises; anything else is reported by lint */
export const KNOWN_KEYS = {
  command: ['description', 'argument-hint', 'allowed-tools', 'model', 'agent', 'disable-model-invocation'],
  agent: ['name', 'description', 'tools', 'disallowedTools', 'model', 'permissionMode', 'color', 'hooks'],
  skill: [
    'name',
    'description',
    'argument-hint',
    'allowed-tools',
    'model',
    'agent',
    'aliases',
    'license',
    'context',
    'hooks',
    'user-invocable',
    'disable-model-invocation',
  ],
} as const;

export interface SchemaIssue {
  key: string;
  message: string;
}

/**
 * Convert zod issues into per-key messages.
 */
export function describeIssues(error: z.ZodError): SchemaIssue[] {
  return error.issues.map((issue) => ({
    key: issue.path.length > 0 ? issue.path.map(String).join('.') : '(root)',
    message: issue.message,
  }));
}

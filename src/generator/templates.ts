/**
 * Template Generator
 *
 * Starter documents for new commands, agents and skills. Every pattern
 * produces a file that lints without errors.
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import type { DefinitionKind, FrontmatterData } from '../shared/types.js';
import { SlashkitError, TemplateExistsError } from '../shared/errors.js';
import { stringifyFrontmatter } from '../utils/frontmatter.js';

export interface TemplatePattern {
  kind: DefinitionKind;
  summary: string;
  frontmatter: (name: string) => FrontmatterData;
  body: (name: string) => string;
}

export const TEMPLATE_PATTERNS = {
  simple: {
    kind: 'command',
    summary: 'command without arguments',
    frontmatter: (name) => ({ description: `Brief description of what ${name} does` }),
    body: (name) => `# ${name}

Write your command instructions here.
This is a simple command with no arguments.
`,
  },
  args: {
    kind: 'command',
    summary: 'command taking free-form $ARGUMENTS',
    frontmatter: (name) => ({
      description: `Process input with the ${name} command`,
      'argument-hint': '[input-text]',
      'allowed-tools': 'Read, Write',
    }),
    body: (name) => `# ${name}

Processing input: $ARGUMENTS

## Task

Execute the following task based on the provided input.
`,
  },
  positional: {
    kind: 'command',
    summary: 'command taking $1, $2, $3',
    frontmatter: (name) => ({
      description: `${name} with specific parameters`,
      'argument-hint': '[param1] [param2] [optional-param3]',
      'allowed-tools': 'Read, Write',
    }),
    body: (name) => `# ${name}

Parameters:
- First parameter: $1
- Second parameter: $2
- Third parameter: $3

## Task

Execute using the provided parameters.
`,
  },
  bash: {
    kind: 'command',
    summary: 'command that gathers shell context',
    frontmatter: (name) => ({
      description: `${name} with shell command execution`,
      'allowed-tools': 'Bash(git:*), Bash(pwd)',
    }),
    body: (name) => `# ${name}

## Context

- Current directory: !\`pwd\`
- Git status: !\`git status --short\`
- Git branch: !\`git branch --show-current\`

## Task

Execute the command based on the above context.
`,
  },
  files: {
    kind: 'command',
    summary: 'command that references project files',
    frontmatter: (name) => ({
      description: `${name} that references project files`,
      'allowed-tools': 'Read, Write, Glob',
    }),
    body: (name) => `# ${name}

## Analysis

Analyze the implementation in @src/
Check the configuration in @package.json

## Task

Process the referenced files and execute the task.
`,
  },
  agent: {
    kind: 'agent',
    summary: 'sub-agent definition',
    frontmatter: (name) => ({
      name,
      description: `Use this agent when ${name} work is needed`,
      tools: 'Read, Grep, Glob',
      model: 'sonnet',
    }),
    body: (name) => `You are ${name}, a focused sub-agent.

## Responsibilities

- Describe what this agent does
- Describe what it must never do

## Output

Report findings with file:line references.
`,
  },
  skill: {
    kind: 'skill',
    summary: 'skill guide (skills/<name>/SKILL.md)',
    frontmatter: (name) => ({
      name,
      description: `Guidance for ${name}. Use when the task involves ${name}.`,
    }),
    body: (name) => `# ${name}

## When to use

Describe the situations this skill covers.

## Instructions

1. First step
2. Second step
`,
  },
} satisfies Record<string, TemplatePattern>;

export type TemplatePatternName = keyof typeof TEMPLATE_PATTERNS;

const TEMPLATE_NAME_PATTERN = /^[a-z0-9][a-z0-9-]{0,63}$/;

export function isTemplatePattern(value: string): value is TemplatePatternName {
  return Object.prototype.hasOwnProperty.call(TEMPLATE_PATTERNS, value);
}

export const TEMPLATE_PATTERN_NAMES: TemplatePatternName[] = Object.keys(TEMPLATE_PATTERNS).filter(isTemplatePattern);

function assertPattern(pattern: string): TemplatePatternName {
  if (!isTemplatePattern(pattern)) {
    throw new SlashkitError(`Unknown pattern "${pattern}". Available patterns: ${TEMPLATE_PATTERN_NAMES.join(', ')}`);
  }
  return pattern;
}

function assertName(name: string): void {
  if (!TEMPLATE_NAME_PATTERN.test(name)) {
    throw new SlashkitError(`Invalid name "${name}": use lowercase letters, digits and hyphens`);
  }
}

/**
 * Render the document for a pattern.
 */
export function generateTemplate(pattern: string, name = 'command'): string {
  const template: TemplatePattern = TEMPLATE_PATTERNS[assertPattern(pattern)];
  assertName(name);
  return stringifyFrontmatter(template.frontmatter(name), `\n${template.body(name)}`);
}

/**
 * Where a pattern's file goes below `dir`.
 */
export function templatePath(pattern: string, name: string, dir: string): string {
  const template: TemplatePattern = TEMPLATE_PATTERNS[assertPattern(pattern)];
  if (template.kind === 'skill') {
    return join(resolve(dir), name, 'SKILL.md');
  }
  return join(resolve(dir), `${name}.md`);
}

/**
 * Write a generated template. Existing files are only replaced with `force`.
 */
export function writeTemplate(
  pattern: string,
  name: string,
  options: { dir?: string; force?: boolean } = {},
): string {
  const content = generateTemplate(pattern, name);
  const path = templatePath(pattern, name, options.dir ?? process.cwd());

  if (existsSync(path) && !options.force) {
    throw new TemplateExistsError(path);
  }

  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
  return path;
}

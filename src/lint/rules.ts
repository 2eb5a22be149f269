/**
 * Lint rule catalogue and per-definition checks.
 */

import { basename, join } from 'path';
import type { Definition, Severity } from '../shared/types.js';
import { KNOWN_KEYS } from '../corpus/schema.js';
import { schemaIssuesFor } from '../corpus/discovery.js';
import {
  PERMISSION_MODES,
  isBuiltinCommand,
  isKnownTool,
  isValidModel,
} from '../corpus/builtins.js';
import { findPlaceholders, lineOfPlaceholder, parseArgumentHint, positionalGaps } from '../template/arguments.js';
import { extractShellDirectives, isToolAllowed } from '../template/directives.js';

export const RULES = {
  'read-error': { severity: 'error', description: 'File could not be read' },
  'frontmatter-missing': { severity: 'error', description: 'No frontmatter block' },
  'frontmatter-invalid-yaml': { severity: 'warning', description: 'Frontmatter is not valid YAML' },
  'frontmatter-type': { severity: 'error', description: 'Frontmatter value has the wrong type' },
  'description-missing': { severity: 'error', description: 'Missing required "description" field' },
  'unknown-key': { severity: 'warning', description: 'Frontmatter key is not recognised' },
  'argument-hint-missing': { severity: 'warning', description: 'Placeholders used without an argument-hint' },
  'argument-hint-mismatch': { severity: 'warning', description: 'argument-hint declares fewer parameters than used' },
  'positional-gap': { severity: 'warning', description: 'Positional placeholders skip an index' },
  'invalid-name': { severity: 'error', description: 'Name is not lowercase letters, digits and hyphens' },
  'name-mismatch': { severity: 'warning', description: 'Declared name differs from the file or directory name' },
  'invalid-model': { severity: 'warning', description: 'Unrecognised model' },
  'invalid-permission-mode': { severity: 'error', description: 'Unknown permissionMode' },
  'invalid-tool': { severity: 'warning', description: 'Malformed tool entry' },
  'unknown-tool': { severity: 'info', description: 'Tool is not provided by the host' },
  'shell-not-allowed': { severity: 'warning', description: 'Shell directive not covered by allowed-tools' },
  'shadows-builtin': { severity: 'warning', description: 'Name shadows a built-in slash command' },
  'duplicate-name': { severity: 'warning', description: 'Definition is shadowed by another root' },
  'empty-body': { severity: 'warning', description: 'Body is empty' },
} as const satisfies Record<string, { severity: Severity; description: string }>;

export type RuleId = keyof typeof RULES;

export function isRuleId(value: string): value is RuleId {
  return Object.prototype.hasOwnProperty.call(RULES, value);
}

/** A finding before severity resolution */
export interface Finding {
  rule: RuleId;
  message: string;
  line?: number;
}

export interface RuleContext {
  knownTools: readonly string[];
  builtinCommands: readonly string[];
}

const NAME_PATTERN = /^[a-z0-9][a-z0-9-]{0,63}$/;
const TOOL_PATTERN = /^[A-Za-z][\w-]*(\(.+\))?$/;

function checkFrontmatter(definition: Definition, findings: Finding[]): void {
  const { frontmatter } = definition;

  if (!frontmatter.present) {
    findings.push({ rule: 'frontmatter-missing', message: 'No frontmatter found', line: 1 });
    return;
  }

  if (frontmatter.yamlError) {
    findings.push({
      rule: 'frontmatter-invalid-yaml',
      message: `Frontmatter is not valid YAML (${frontmatter.yamlError}); parsed as flat key/value lines`,
      line: 1,
    });
  }

  for (const issue of schemaIssuesFor(definition)) {
    findings.push({ rule: 'frontmatter-type', message: `"${issue.key}": ${issue.message}` });
  }

  const known: readonly string[] = KNOWN_KEYS[definition.kind];
  for (const key of Object.keys(frontmatter.data)) {
    if (!known.includes(key)) {
      findings.push({ rule: 'unknown-key', message: `Unknown ${definition.kind} frontmatter key "${key}"` });
    }
  }
}

function checkDescription(definition: Definition, findings: Finding[]): void {
  if (definition.frontmatter.present && !definition.metadata.description) {
    findings.push({ rule: 'description-missing', message: 'Missing required "description" field' });
  }
}

function checkPlaceholders(definition: Definition, findings: Finding[]): void {
  if (definition.kind === 'agent') return;

  const usage = findPlaceholders(definition.body);
  if (usage.placeholders.length === 0) return;

  const lineOf = (placeholder: string) => {
    const line = lineOfPlaceholder(definition.body, placeholder);
    return line === undefined ? undefined : line + definition.frontmatter.bodyLine - 1;
  };

  const hint = definition.metadata.argumentHint;
  if (!hint) {
    findings.push({
      rule: 'argument-hint-missing',
      message: `Uses ${usage.placeholders.join(', ')} but has no "argument-hint"`,
      line: lineOf(usage.placeholders[0]),
    });
  } else if (usage.maxPositional > 0) {
    const declared = parseArgumentHint(hint).length;
    if (usage.maxPositional > declared) {
      findings.push({
        rule: 'argument-hint-mismatch',
        message: `Uses $${usage.maxPositional} but "argument-hint" declares ${declared} parameter${declared === 1 ? '' : 's'}`,
        line: lineOf(`$${usage.maxPositional}`),
      });
    }
  }

  const gaps = positionalGaps(usage.positional);
  if (gaps.length > 0) {
    findings.push({
      rule: 'positional-gap',
      message: `Uses $${usage.maxPositional} without ${gaps.join(', ')}`,
      line: lineOf(`$${usage.maxPositional}`),
    });
  }
}

function expectedName(definition: Definition): string {
  if (definition.kind === 'skill') {
    return basename(join(definition.path, '..'));
  }
  return basename(definition.path, '.md');
}

function checkName(definition: Definition, context: RuleContext, findings: Finding[]): void {
  if (definition.kind !== 'command' && !NAME_PATTERN.test(definition.name)) {
    findings.push({
      rule: 'invalid-name',
      message: `Name "${definition.name}" must be lowercase letters, digits and hyphens (max 64 characters)`,
    });
  }

  const isAlias = definition.kind === 'skill' && definition.metadata.aliasOf !== undefined;
  if (definition.kind !== 'command' && !isAlias) {
    const expected = expectedName(definition);
    if (definition.name !== expected) {
      findings.push({
        rule: 'name-mismatch',
        message: `Name "${definition.name}" differs from "${expected}"`,
      });
    }
  }

  if (definition.kind !== 'agent' && isBuiltinCommand(definition.name, context.builtinCommands)) {
    findings.push({
      rule: 'shadows-builtin',
      message: `"/${definition.name}" shadows a built-in slash command`,
    });
  }
}

function checkModel(definition: Definition, findings: Finding[]): void {
  const { model } = definition.metadata;
  if (model && !isValidModel(model)) {
    findings.push({
      rule: 'invalid-model',
      message: `Model "${model}" is neither an alias (sonnet, opus, haiku, inherit) nor a claude-* model id`,
    });
  }

  if (definition.kind === 'agent') {
    const { permissionMode } = definition.metadata;
    if (permissionMode && !PERMISSION_MODES.has(permissionMode)) {
      findings.push({
        rule: 'invalid-permission-mode',
        message: `permissionMode "${permissionMode}" must be one of ${[...PERMISSION_MODES].join(', ')}`,
      });
    }
  }
}

function toolLists(definition: Definition): Array<{ key: string; tools: string[] }> {
  if (definition.kind === 'agent') {
    return [
      { key: 'tools', tools: definition.metadata.tools ?? [] },
      { key: 'disallowedTools', tools: definition.metadata.disallowedTools ?? [] },
    ];
  }
  return [{ key: 'allowed-tools', tools: definition.metadata.allowedTools ?? [] }];
}

function checkTools(definition: Definition, context: RuleContext, findings: Finding[]): void {
  for (const { key, tools } of toolLists(definition)) {
    for (const tool of tools) {
      if (tool === '*') continue;
      if (!TOOL_PATTERN.test(tool)) {
        findings.push({ rule: 'invalid-tool', message: `"${key}" entry "${tool}" is not Name or Name(pattern)` });
        continue;
      }
      const name = tool.replace(/\(.*$/, '');
      if (!isKnownTool(name, context.knownTools)) {
        findings.push({ rule: 'unknown-tool', message: `"${key}" entry "${name}" is not a host tool` });
      }
    }
  }
}

function checkShellDirectives(definition: Definition, findings: Finding[]): void {
  if (definition.kind === 'agent') return;

  const allowedTools = definition.metadata.allowedTools;
  for (const directive of extractShellDirectives(definition.body)) {
    if (allowedTools && isToolAllowed(allowedTools, 'Bash', directive.command)) continue;
    findings.push({
      rule: 'shell-not-allowed',
      message: `Shell directive ${directive.raw} is not covered by "allowed-tools"`,
      line: directive.line + definition.frontmatter.bodyLine - 1,
    });
  }
}

function checkBody(definition: Definition, findings: Finding[]): void {
  if (!definition.body.trim()) {
    findings.push({ rule: 'empty-body', message: 'Body is empty' });
  }
}

/**
 * Run every per-definition rule.
 */
export function runRules(definition: Definition, context: RuleContext): Finding[] {
  const findings: Finding[] = [];
  checkFrontmatter(definition, findings);
  checkDescription(definition, findings);
  checkPlaceholders(definition, findings);
  checkName(definition, context, findings);
  checkModel(definition, findings);
  checkTools(definition, context, findings);
  checkShellDirectives(definition, findings);
  checkBody(definition, findings);
  return findings;
}

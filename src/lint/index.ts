/**
 * Corpus Linter
 *
 * Checks commands, agents and skills for the conventions the host relies
 * on: a description, argument hints that match the placeholders, valid
 * names, models, tools and permission modes.
 */

import { existsSync } from 'fs';
import { basename, dirname, resolve, sep } from 'path';
import type {
  Corpus,
  CorpusRoot,
  Definition,
  DefinitionKind,
  Diagnostic,
  RuleSetting,
  Severity,
} from '../shared/types.js';
import { errorMessage } from '../shared/errors.js';
import { loadAgent, loadCommand, loadSkill, SKILL_FILE } from '../corpus/discovery.js';
import { RULES, isRuleId, runRules, type Finding, type RuleId } from './rules.js';

export { RULES, type RuleId } from './rules.js';

export interface LintOptions {
  /** Per-rule severity overrides; 'off' disables a rule */
  rules?: Record<string, RuleSetting>;
  knownTools?: readonly string[];
  builtinCommands?: readonly string[];
}

export interface LintSummary {
  errors: number;
  warnings: number;
  infos: number;
}

function resolveSeverity(rule: RuleId, options: LintOptions): Severity | null {
  const override = options.rules?.[rule];
  if (override === 'off') return null;
  return override ?? RULES[rule].severity;
}

function toDiagnostics(findings: Finding[], path: string, options: LintOptions): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  for (const finding of findings) {
    const severity = resolveSeverity(finding.rule, options);
    if (!severity) continue;
    diagnostics.push({
      rule: finding.rule,
      severity,
      message: finding.message,
      path,
      ...(finding.line !== undefined ? { line: finding.line } : {}),
    });
  }
  return diagnostics;
}

/**
 * Lint a single definition.
 */
export function lintDefinition(definition: Definition, options: LintOptions = {}): Diagnostic[] {
  const findings = runRules(definition, {
    knownTools: options.knownTools ?? [],
    builtinCommands: options.builtinCommands ?? [],
  });
  return toDiagnostics(findings, definition.path, options);
}

function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  return a.path.localeCompare(b.path) || (a.line ?? 0) - (b.line ?? 0) || a.rule.localeCompare(b.rule);
}

/**
 * Lint every definition of a corpus, plus discovery errors and shadowed
 * definitions. Skill aliases share their canonical file and are not linted
 * separately.
 */
export function lintCorpus(corpus: Corpus, options: LintOptions = {}): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  for (const error of corpus.errors) {
    diagnostics.push(...toDiagnostics([{ rule: 'read-error', message: error.message }], error.path, options));
  }

  const definitions: Definition[] = [
    ...corpus.commands,
    ...corpus.agents,
    ...corpus.skills.filter((skill) => !skill.metadata.aliasOf),
  ];
  for (const definition of definitions) {
    diagnostics.push(...lintDefinition(definition, options));
  }

  for (const { definition, shadowedBy } of corpus.shadowed) {
    if (definition.kind === 'skill' && definition.metadata.aliasOf) continue;
    diagnostics.push(
      ...toDiagnostics(
        [
          {
            rule: 'duplicate-name',
            message: `${definition.kind} "${definition.name}" is shadowed by ${shadowedBy.path}`,
          },
        ],
        definition.path,
        options,
      ),
    );
  }

  return diagnostics.sort(compareDiagnostics);
}

/**
 * Guess a file's kind from where it lives:
 * SKILL.md is a skill, anything under an agents/ directory an agent,
 * everything else a command.
 */
export function inferKind(path: string): DefinitionKind {
  if (basename(path) === SKILL_FILE) return 'skill';
  const segments = resolve(path).split(sep);
  const agentsIndex = segments.lastIndexOf('agents');
  const commandsIndex = segments.lastIndexOf('commands');
  if (agentsIndex !== -1 && agentsIndex > commandsIndex) return 'agent';
  return 'command';
}

/**
 * The root a loose file belongs to: the parent of its commands/ or agents/
 * directory, or of skills/ for SKILL.md.
 */
function rootFor(path: string, kind: DefinitionKind): CorpusRoot {
  const absolute = resolve(path);
  const marker = kind === 'skill' ? 'skills' : kind === 'agent' ? 'agents' : 'commands';
  const segments = absolute.split(sep);
  const index = segments.lastIndexOf(marker);
  const rootPath = index > 0 ? segments.slice(0, index).join(sep) || sep : dirname(absolute);
  return { path: rootPath, scope: 'corpus' };
}

/**
 * Lint a file outside of discovery (e.g. a path given on the command line).
 */
export function lintFile(path: string, options: LintOptions & { kind?: DefinitionKind } = {}): Diagnostic[] {
  const absolute = resolve(path);
  if (!existsSync(absolute)) {
    return toDiagnostics([{ rule: 'read-error', message: 'File does not exist' }], absolute, options);
  }

  const kind = options.kind ?? inferKind(absolute);
  const root = rootFor(absolute, kind);

  try {
    switch (kind) {
      case 'command':
        return lintDefinition(loadCommand(absolute, root), options);
      case 'agent':
        return lintDefinition(loadAgent(absolute, root), options);
      case 'skill': {
        const [skill] = loadSkill(absolute, root);
        return lintDefinition(skill, options);
      }
    }
  } catch (err) {
    return toDiagnostics([{ rule: 'read-error', message: errorMessage(err) }], absolute, options);
  }
}

/**
 * Count diagnostics by severity
 */
export function summarize(diagnostics: readonly Diagnostic[]): LintSummary {
  const summary: LintSummary = { errors: 0, warnings: 0, infos: 0 };
  for (const diagnostic of diagnostics) {
    if (diagnostic.severity === 'error') summary.errors++;
    else if (diagnostic.severity === 'warning') summary.warnings++;
    else summary.infos++;
  }
  return summary;
}

/**
 * Rule overrides from config with unknown rule ids removed
 */
export function knownRuleOverrides(rules: Record<string, RuleSetting>): {
  rules: Record<string, RuleSetting>;
  unknown: string[];
} {
  const known: Record<string, RuleSetting> = {};
  const unknown: string[] = [];
  for (const [rule, setting] of Object.entries(rules)) {
    if (isRuleId(rule)) known[rule] = setting;
    else unknown.push(rule);
  }
  return { rules: known, unknown };
}

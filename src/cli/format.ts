/**
 * Terminal formatting for CLI output
 */

import chalk from 'chalk';
import type { DefinitionScope, Diagnostic, Severity } from '../shared/types.js';
import type { LintSummary } from '../lint/index.js';
import { displayPath } from '../utils/paths.js';

const SEVERITY_COLORS: Record<Severity, (text: string) => string> = {
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.blue,
};

export function formatSeverity(severity: Severity): string {
  return SEVERITY_COLORS[severity](severity.padEnd(7));
}

/**
 * One diagnostic per line: path:line  severity  message (rule)
 */
export function formatDiagnostic(diagnostic: Diagnostic, cwd: string): string {
  const location = `${displayPath(diagnostic.path, cwd)}${diagnostic.line !== undefined ? `:${diagnostic.line}` : ''}`;
  return `${location}  ${formatSeverity(diagnostic.severity)}  ${diagnostic.message} ${chalk.gray(`(${diagnostic.rule})`)}`;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function formatSummary(summary: LintSummary): string {
  if (summary.errors === 0 && summary.warnings === 0 && summary.infos === 0) {
    return chalk.green('✓ No problems found');
  }
  const parts = [plural(summary.errors, 'error'), plural(summary.warnings, 'warning')];
  if (summary.infos > 0) parts.push(plural(summary.infos, 'info'));
  const color = summary.errors > 0 ? chalk.red : chalk.yellow;
  return color(`✗ ${parts.join(', ')}`);
}

export function formatScope(scope: DefinitionScope): string {
  return chalk.gray(`[${scope}]`);
}

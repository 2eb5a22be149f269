import * as p from '@clack/prompts';
import chalk from 'chalk';
import { join, resolve } from 'path';
import type { DefinitionKind } from '../../shared/types.js';
import { SlashkitError } from '../../shared/errors.js';
import {
  TEMPLATE_PATTERNS,
  TEMPLATE_PATTERN_NAMES,
  generateTemplate,
  isTemplatePattern,
  writeTemplate,
  type TemplatePatternName,
} from '../../generator/templates.js';
import { lintFile } from '../../lint/index.js';
import { displayPath, getProjectClaudeDir } from '../../utils/paths.js';
import type { CliContext } from '../context.js';
import { formatDiagnostic } from '../format.js';

export interface NewCommandOptions {
  dir?: string;
  force?: boolean;
  stdout?: boolean;
}

const KIND_DIRS: Record<DefinitionKind, string> = {
  command: 'commands',
  agent: 'agents',
  skill: 'skills',
};

/**
 * Where new files go when --dir is not given: the matching directory of
 * the first configured corpus root, else of the project's .claude.
 */
export function defaultTemplateDir(context: CliContext, kind: DefinitionKind): string {
  const corpusRoot = context.roots.find((root) => root.scope === 'corpus');
  return join(corpusRoot?.path ?? getProjectClaudeDir(context.cwd), KIND_DIRS[kind]);
}

async function promptForMissing(
  pattern: string | undefined,
  name: string | undefined,
): Promise<{ pattern: string; name: string } | null> {
  p.intro(chalk.bold('slashkit new'));

  let chosenPattern = pattern;
  if (chosenPattern === undefined) {
    const selected = await p.select({
      message: 'Which pattern should the new file use?',
      options: TEMPLATE_PATTERN_NAMES.map((value) => ({
        value,
        label: value,
        hint: TEMPLATE_PATTERNS[value].summary,
      })),
    });
    if (p.isCancel(selected)) {
      p.outro('Cancelled.');
      return null;
    }
    chosenPattern = String(selected);
  }

  let chosenName = name;
  if (chosenName === undefined) {
    const entered = await p.text({
      message: 'Name (lowercase letters, digits and hyphens)',
      placeholder: 'my-command',
      validate: (value) => (/^[a-z0-9][a-z0-9-]{0,63}$/.test(value) ? undefined : 'Use lowercase letters, digits and hyphens'),
    });
    if (p.isCancel(entered)) {
      p.outro('Cancelled.');
      return null;
    }
    chosenName = entered;
  }

  p.outro(`Creating ${chosenPattern} "${chosenName}"`);
  return { pattern: chosenPattern, name: chosenName };
}

/**
 * Create a command, agent or skill from a template. Missing arguments are
 * prompted for on a TTY. Returns the process exit code.
 */
export async function newCommand(
  context: CliContext,
  patternArg: string | undefined,
  nameArg: string | undefined,
  options: NewCommandOptions,
): Promise<number> {
  let pattern = patternArg;
  let name = nameArg;

  if (pattern === undefined || name === undefined) {
    if (!process.stdin.isTTY) {
      throw new SlashkitError(
        `A pattern and a name are required. Available patterns: ${TEMPLATE_PATTERN_NAMES.join(', ')}`,
      );
    }
    const answers = await promptForMissing(pattern, name);
    if (!answers) return 1;
    ({ pattern, name } = answers);
  }

  if (!isTemplatePattern(pattern)) {
    throw new SlashkitError(`Unknown pattern "${pattern}". Available patterns: ${TEMPLATE_PATTERN_NAMES.join(', ')}`);
  }
  const patternName: TemplatePatternName = pattern;
  const { kind } = TEMPLATE_PATTERNS[patternName];

  if (options.stdout) {
    console.log(generateTemplate(patternName, name));
    return 0;
  }

  const dir = options.dir ? resolve(context.cwd, options.dir) : defaultTemplateDir(context, kind);
  const path = writeTemplate(patternName, name, { dir, force: options.force });
  console.log(chalk.green(`Created ${displayPath(path, context.cwd)}`));

  const diagnostics = lintFile(path, { ...context.lintOptions, kind });
  for (const diagnostic of diagnostics) {
    console.log(formatDiagnostic(diagnostic, context.cwd));
  }
  return 0;
}

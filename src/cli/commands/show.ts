import chalk from 'chalk';
import type { Definition, DefinitionKind } from '../../shared/types.js';
import { NotFoundError } from '../../shared/errors.js';
import { findDefinition } from '../../corpus/discovery.js';
import { findPlaceholders } from '../../template/arguments.js';
import { extractFileReferences, extractShellDirectives } from '../../template/directives.js';
import { displayPath } from '../../utils/paths.js';
import type { CliContext } from '../context.js';

export interface ShowCommandOptions {
  kind?: DefinitionKind;
}

function field(label: string, value: string | undefined): void {
  if (value === undefined || value === '') return;
  console.log(`${chalk.bold(`${label}:`.padEnd(15))}${value}`);
}

function toolsOf(definition: Definition): string | undefined {
  const tools = definition.kind === 'agent' ? definition.metadata.tools : definition.metadata.allowedTools;
  return tools?.join(', ');
}

export function showCommand(context: CliContext, name: string, options: ShowCommandOptions): void {
  const definition = findDefinition(context.corpus, name, options.kind);
  if (!definition) {
    throw new NotFoundError(options.kind ?? 'definition', name);
  }

  const title = definition.kind === 'agent' ? definition.name : `/${definition.name}`;
  console.log(`${chalk.cyan.bold(title)} ${chalk.gray(`(${definition.kind}, ${definition.scope})`)}`);
  field('Path', displayPath(definition.path, context.cwd));
  field('Description', definition.metadata.description);
  if (definition.kind === 'command') {
    field('Namespace', definition.namespace);
  }
  if (definition.kind !== 'agent') {
    field('Argument hint', definition.metadata.argumentHint);
    field('Agent', definition.metadata.agent);
  }
  if (definition.kind === 'skill') {
    field('Alias of', definition.metadata.aliasOf ? `/${definition.metadata.aliasOf}` : undefined);
    field('Aliases', definition.metadata.aliases.map((alias) => `/${alias}`).join(', '));
  }
  if (definition.kind === 'agent') {
    field('Permission', definition.metadata.permissionMode);
  }
  field(definition.kind === 'agent' ? 'Tools' : 'Allowed tools', toolsOf(definition));
  field('Model', definition.metadata.model);

  const usage = findPlaceholders(definition.body);
  field('Placeholders', usage.placeholders.join(', '));

  const shell = extractShellDirectives(definition.body);
  if (shell.length > 0) {
    console.log(chalk.bold('Shell directives:'));
    for (const directive of shell) {
      console.log(`  ${directive.raw} ${chalk.gray(`(line ${directive.line + definition.frontmatter.bodyLine - 1})`)}`);
    }
  }

  const files = extractFileReferences(definition.body);
  if (files.length > 0) {
    console.log(chalk.bold('File references:'));
    for (const reference of files) {
      console.log(`  @${reference.path} ${chalk.gray(`(line ${reference.line + definition.frontmatter.bodyLine - 1})`)}`);
    }
  }

  const hidden = context.corpus.shadowed.filter((entry) => entry.shadowedBy === definition);
  for (const { definition: shadowed } of hidden) {
    console.log(chalk.yellow(`Shadows ${displayPath(shadowed.path, context.cwd)} (${shadowed.scope})`));
  }
}

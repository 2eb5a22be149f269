import chalk from 'chalk';
import type { DefinitionKind } from '../../shared/types.js';
import { listDefinitions, type ListedDefinition } from '../../corpus/discovery.js';
import type { CliContext } from '../context.js';
import { formatScope } from '../format.js';

export interface ListCommandOptions {
  kind?: DefinitionKind;
  aliases?: boolean;
  json?: boolean;
}

const HEADINGS: Record<DefinitionKind, string> = {
  command: 'Commands',
  skill: 'Skills',
  agent: 'Agents',
};

function invocation(entry: ListedDefinition): string {
  return entry.kind === 'agent' ? entry.name : `/${entry.name}`;
}

export function listCommand(context: CliContext, options: ListCommandOptions): void {
  const entries = listDefinitions(context.corpus, {
    kind: options.kind,
    includeAliases: options.aliases,
  });

  if (options.json) {
    console.log(JSON.stringify(entries, null, 2));
    return;
  }

  if (entries.length === 0) {
    console.log(chalk.gray('No definitions found.'));
    return;
  }

  const width = Math.max(...entries.map((entry) => invocation(entry).length));
  let current: DefinitionKind | undefined;

  for (const entry of entries) {
    if (entry.kind !== current) {
      current = entry.kind;
      const count = entries.filter((candidate) => candidate.kind === current).length;
      console.log(chalk.bold(`\n${HEADINGS[current]} (${count})`));
    }
    const name = invocation(entry).padEnd(width);
    const description = entry.aliasOf ? chalk.gray(`alias of /${entry.aliasOf}`) : entry.description;
    console.log(`  ${chalk.cyan(name)}  ${description} ${formatScope(entry.scope)}`);
  }
}

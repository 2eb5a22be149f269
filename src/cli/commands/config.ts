import chalk from 'chalk';
import { existsSync } from 'fs';
import { getConfigPaths } from '../../config/loader.js';
import type { CliContext } from '../context.js';

export interface ConfigCommandOptions {
  paths?: boolean;
  json?: boolean;
}

/**
 * Show the merged configuration and the corpus roots it resolves to
 */
export function configCommand(context: CliContext, options: ConfigCommandOptions): void {
  const paths = getConfigPaths(context.cwd);

  if (options.json) {
    console.log(JSON.stringify({ paths, config: context.config, roots: context.roots }, null, 2));
    return;
  }

  if (options.paths) {
    const status = (path: string) => (existsSync(path) ? chalk.green('exists') : chalk.gray('not found'));
    console.log(chalk.blue('Configuration file paths:'));
    console.log(`  User:    ${paths.user} ${status(paths.user)}`);
    console.log(`  Project: ${paths.project} ${status(paths.project)}`);
    return;
  }

  console.log(chalk.blue('Current configuration:\n'));
  console.log(JSON.stringify(context.config, null, 2));
  console.log(chalk.blue('\nCorpus roots:'));
  for (const root of context.roots) {
    const marker = existsSync(root.path) ? '' : chalk.gray(' (missing)');
    console.log(`  ${root.path} ${chalk.gray(`[${root.scope}]`)}${marker}`);
  }
}

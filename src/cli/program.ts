/**
 * slashkit CLI program
 *
 * Commands:
 * - list:   list commands, skills and agents
 * - show:   show one definition's metadata, placeholders and directives
 * - lint:   check the corpus or individual files
 * - render: preview a command with arguments
 * - new:    create a definition from a template
 * - serve:  expose the corpus as MCP prompts over stdio
 * - config: show configuration and corpus roots
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { SlashkitError } from '../shared/errors.js';
import { TEMPLATE_PATTERN_NAMES } from '../generator/templates.js';
import { getRuntimePackageVersion } from '../lib/version.js';
import { loadContext, parseKind, type GlobalOptions } from './context.js';
import { listCommand } from './commands/list.js';
import { showCommand } from './commands/show.js';
import { lintCommand } from './commands/lint.js';
import { renderCommand } from './commands/render.js';
import { newCommand } from './commands/new.js';
import { serveCommand } from './commands/serve.js';
import { configCommand } from './commands/config.js';

type KindOption = { kind?: string };

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function globalsOf(command: Command): GlobalOptions {
  const { root, cwd } = command.optsWithGlobals<GlobalOptions>();
  return { root, cwd };
}

/**
 * Run an action, turning SlashkitErrors into a red message and exit code 1.
 * A returned number becomes the exit code.
 */
async function runAction(action: () => number | void | Promise<number | void>): Promise<void> {
  try {
    const code = await action();
    if (typeof code === 'number' && code !== 0) {
      process.exitCode = code;
    }
  } catch (err) {
    if (err instanceof SlashkitError) {
      console.error(chalk.red(`Error: ${err.message}`));
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('slashkit')
    .description('Author, lint, preview and serve slash commands, sub-agents and skills')
    .version(getRuntimePackageVersion())
    .option('-r, --root <dir>', 'extra corpus root (repeatable)', collect, [])
    .option('-C, --cwd <dir>', 'working directory used for project roots and config');

  program
    .command('list')
    .description('List commands, skills and agents')
    .option('-k, --kind <kind>', 'only one kind: command, skill or agent')
    .option('-a, --aliases', 'include deprecated skill aliases')
    .option('--json', 'print JSON')
    .action((options: KindOption & { aliases?: boolean; json?: boolean }, command: Command) =>
      runAction(() =>
        listCommand(loadContext(globalsOf(command)), {
          kind: parseKind(options.kind),
          aliases: options.aliases,
          json: options.json,
        }),
      ),
    );

  program
    .command('show')
    .description('Show metadata, placeholders and directives of a definition')
    .argument('<name>', 'command, skill or agent name (a leading / is optional)')
    .option('-k, --kind <kind>', 'look up only this kind')
    .action((name: string, options: KindOption, command: Command) =>
      runAction(() => showCommand(loadContext(globalsOf(command)), name, { kind: parseKind(options.kind) })),
    );

  program
    .command('lint')
    .description('Lint the corpus, or the given files')
    .argument('[files...]', 'markdown files to lint instead of the whole corpus')
    .option('--strict', 'exit non-zero on warnings too')
    .option('--json', 'print JSON')
    .addHelpText('after', `
Examples:
  $ slashkit lint                          Lint every discovered definition
  $ slashkit lint commands/debug.md        Lint one file
  $ slashkit lint --root . --strict        Fail on warnings as well`)
    .action((files: string[], options: { strict?: boolean; json?: boolean }, command: Command) =>
      runAction(() => lintCommand(loadContext(globalsOf(command)), files, options)),
    );

  program
    .command('render')
    .description('Preview a command with arguments substituted')
    .argument('<name>', 'command or skill name')
    .argument('[args...]', 'arguments ($1, $2, ... and $ARGUMENTS)')
    .option('-k, --kind <kind>', 'look up only this kind')
    .option('--exec', 'run !`command` shell directives')
    .option('--files', 'inline @file references')
    .option('--invocation', 'print the full message the host would receive')
    .action(
      (
        name: string,
        args: string[],
        options: KindOption & { exec?: boolean; files?: boolean; invocation?: boolean },
        command: Command,
      ) =>
        runAction(() =>
          renderCommand(loadContext(globalsOf(command)), name, args, {
            kind: parseKind(options.kind),
            exec: options.exec,
            files: options.files,
            invocation: options.invocation,
          }),
        ),
    );

  program
    .command('new')
    .description('Create a command, agent or skill from a template')
    .argument('[pattern]', `template pattern: ${TEMPLATE_PATTERN_NAMES.join(', ')}`)
    .argument('[name]', 'name of the new definition')
    .option('-d, --dir <dir>', 'target directory')
    .option('-f, --force', 'overwrite an existing file')
    .option('--stdout', 'print instead of writing a file')
    .action(
      (
        pattern: string | undefined,
        name: string | undefined,
        options: { dir?: string; force?: boolean; stdout?: boolean },
        command: Command,
      ) => runAction(() => newCommand(loadContext(globalsOf(command)), pattern, name, options)),
    );

  program
    .command('serve')
    .description('Serve commands and skills as MCP prompts over stdio')
    .action((_options: object, command: Command) =>
      runAction(() => serveCommand(loadContext(globalsOf(command)))),
    );

  program
    .command('config')
    .description('Show configuration and corpus roots')
    .option('-p, --paths', 'show configuration file paths')
    .option('--json', 'print JSON')
    .action((options: { paths?: boolean; json?: boolean }, command: Command) =>
      runAction(() => configCommand(loadContext(globalsOf(command)), options)),
    );

  return program;
}

import chalk from 'chalk';
import type { DefinitionKind } from '../../shared/types.js';
import { NotFoundError } from '../../shared/errors.js';
import { findDefinition } from '../../corpus/discovery.js';
import { formatInvocation, renderDefinition, type RenderOptions } from '../../template/render.js';
import type { CliContext } from '../context.js';

export interface RenderCommandOptions {
  kind?: DefinitionKind;
  /** Run shell directives */
  exec?: boolean;
  /** Inline file references */
  files?: boolean;
  /** Print the full invocation message instead of the bare body */
  invocation?: boolean;
}

/**
 * Preview a command, skill or agent with arguments. The rendered text goes
 * to stdout; warnings go to stderr.
 */
export function renderCommand(
  context: CliContext,
  name: string,
  args: string[],
  options: RenderCommandOptions,
): void {
  const definition = findDefinition(context.corpus, name, options.kind);
  if (!definition) {
    throw new NotFoundError(options.kind ?? 'definition', name);
  }

  const renderOptions: RenderOptions = {
    cwd: context.cwd,
    runShell: options.exec,
    resolveFiles: options.files,
    shellTimeoutMs: context.config.shellTimeoutMs,
  };
  const result = renderDefinition(definition, args, renderOptions);

  for (const placeholder of new Set(result.unresolved)) {
    console.warn(chalk.yellow(`⚠ ${placeholder} has no value and was left as-is`));
  }
  for (const entry of result.shell) {
    if ('ok' in entry && !entry.ok) {
      console.warn(chalk.yellow(`⚠ ${entry.raw} failed: ${entry.output}`));
    }
  }
  for (const entry of result.files) {
    if ('ok' in entry && !entry.ok) {
      console.warn(chalk.yellow(`⚠ @${entry.path}: ${entry.error ?? 'unreadable'}`));
    }
  }

  console.log(options.invocation ? formatInvocation(definition, args, { ...renderOptions, rendered: result }) : result.text.trim());
}

/**
 * Shared setup for CLI commands: configuration, roots and the discovered
 * corpus for the working directory.
 */

import chalk from 'chalk';
import { resolve } from 'path';
import type { Corpus, CorpusRoot, DefinitionKind, SlashkitConfig } from '../shared/types.js';
import { SlashkitError } from '../shared/errors.js';
import { loadConfig, resolveRoots } from '../config/loader.js';
import { discoverCorpus } from '../corpus/discovery.js';
import { knownRuleOverrides, type LintOptions } from '../lint/index.js';
import { debugLog } from '../utils/debug.js';

export type GlobalOptions = {
  root?: string[];
  cwd?: string;
};

export interface CliContext {
  cwd: string;
  config: SlashkitConfig;
  roots: CorpusRoot[];
  corpus: Corpus;
  lintOptions: LintOptions;
}

export function loadContext(globals: GlobalOptions): CliContext {
  const cwd = resolve(globals.cwd ?? process.cwd());
  const config = loadConfig(cwd);
  const roots = resolveRoots(config, cwd, globals.root ?? []);
  debugLog('cli', 'roots', roots);

  const { rules, unknown } = knownRuleOverrides(config.rules);
  for (const rule of unknown) {
    console.warn(chalk.yellow(`Ignoring unknown lint rule "${rule}" in configuration`));
  }

  return {
    cwd,
    config,
    roots,
    corpus: discoverCorpus({ roots }),
    lintOptions: {
      rules,
      knownTools: config.knownTools,
      builtinCommands: config.builtinCommands,
    },
  };
}

const KINDS: readonly DefinitionKind[] = ['command', 'agent', 'skill'];

/**
 * Validate a --kind value
 */
export function parseKind(value: string | undefined): DefinitionKind | undefined {
  if (value === undefined) return undefined;
  const kind = KINDS.find((candidate) => candidate === value);
  if (!kind) {
    throw new SlashkitError(`Unknown kind "${value}". Expected one of: ${KINDS.join(', ')}`);
  }
  return kind;
}

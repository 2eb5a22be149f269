import { resolve } from 'path';
import type { Diagnostic } from '../../shared/types.js';
import { lintCorpus, lintFile, summarize } from '../../lint/index.js';
import type { CliContext } from '../context.js';
import { formatDiagnostic, formatSummary } from '../format.js';

export interface LintCommandOptions {
  strict?: boolean;
  json?: boolean;
}

/**
 * Lint the given files, or the whole corpus when none are given.
 * Returns the process exit code.
 */
export function lintCommand(context: CliContext, files: string[], options: LintCommandOptions): number {
  const diagnostics: Diagnostic[] =
    files.length > 0
      ? files.flatMap((file) => lintFile(resolve(context.cwd, file), context.lintOptions))
      : lintCorpus(context.corpus, context.lintOptions);
  const summary = summarize(diagnostics);

  if (options.json) {
    console.log(JSON.stringify({ diagnostics, summary }, null, 2));
  } else {
    for (const diagnostic of diagnostics) {
      console.log(formatDiagnostic(diagnostic, context.cwd));
    }
    if (diagnostics.length > 0) console.log('');
    console.log(formatSummary(summary));
  }

  if (summary.errors > 0) return 1;
  if (options.strict && summary.warnings > 0) return 1;
  return 0;
}

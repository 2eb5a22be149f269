/**
 * Command Rendering
 *
 * Turns a definition plus caller arguments into prompt text. Directives
 * and file references come from the template only: text inserted for a
 * placeholder is never run or read, and a directive runs exactly as written.
 */

import type { Definition } from '../shared/types.js';
import { errorMessage } from '../shared/errors.js';
import { findPlaceholders, rawArgumentString, substituteArguments, type ArgumentInput } from './arguments.js';
import {
  extractFileReferences,
  inlineFileReferences,
  locateShellDirectives,
  runShellDirective,
  type FileReference,
  type FileReferenceResult,
  type ShellDirective,
  type ShellDirectiveResult,
  type ShellRunner,
} from './directives.js';

export interface RenderOptions {
  cwd?: string;
  /** Run !`command` directives */
  runShell?: boolean;
  /** Inline @file references */
  resolveFiles?: boolean;
  shellTimeoutMs?: number;
  /** Replaces the child-process runner */
  shellRunner?: ShellRunner;
}

export interface RenderResult {
  text: string;
  unresolved: string[];
  shell: Array<ShellDirective | ShellDirectiveResult>;
  files: Array<FileReference | FileReferenceResult>;
}

export type RenderOutcome =
  | { success: true; result: RenderResult }
  | { success: false; error: string };

/**
 * Render a definition body with the given arguments.
 */
export function renderDefinition(
  definition: Definition,
  args: ArgumentInput,
  options: RenderOptions = {},
): RenderResult {
  const cwd = options.cwd ?? process.cwd();
  const body = definition.body;
  const directives = locateShellDirectives(body);

  const pieces: string[] = [];
  const unresolved: string[] = [];
  const shell: RenderResult['shell'] = [];
  let offset = 0;

  const substitute = (segment: string) => {
    const result = substituteArguments(segment, args);
    pieces.push(result.text);
    unresolved.push(...result.unresolved);
  };

  for (const { start, end, ...directive } of directives) {
    substitute(body.slice(offset, start));
    if (options.runShell) {
      const result = runShellDirective(directive, {
        cwd,
        timeoutMs: options.shellTimeoutMs ?? 10_000,
        runShell: options.shellRunner,
      });
      pieces.push(result.output);
      shell.push(result);
    } else {
      pieces.push(directive.raw);
      shell.push(directive);
    }
    offset = end;
  }
  substitute(body.slice(offset));

  let text = pieces.join('');
  let files: RenderResult['files'] = extractFileReferences(body);

  if (options.resolveFiles) {
    const resolved = inlineFileReferences(text, files, { cwd });
    text = resolved.text;
    files = resolved.results;
  }

  return { text, unresolved, shell, files };
}

/**
 * Result-style wrapper around renderDefinition for callers that report
 * failures instead of throwing.
 */
export function tryRenderDefinition(
  definition: Definition,
  args: ArgumentInput,
  options: RenderOptions = {},
): RenderOutcome {
  try {
    return { success: true, result: renderDefinition(definition, args, options) };
  } catch (err) {
    return {
      success: false,
      error: `Failed to render "/${definition.name}": ${errorMessage(err)}`,
    };
  }
}

export interface InvocationOptions extends RenderOptions {
  /** A result already rendered for these arguments; the body is not rendered again */
  rendered?: RenderResult;
}

/**
 * Format the message the host receives when the command is invoked:
 * a metadata header, then the rendered body. Arguments that the body has
 * no placeholder for are appended as a "User Request" section.
 */
export function formatInvocation(
  definition: Definition,
  args: ArgumentInput,
  options: InvocationOptions = {},
): string {
  const raw = rawArgumentString(args);
  const sections: string[] = [];

  sections.push(`<command-name>/${definition.name}</command-name>\n`);

  if (definition.metadata.description) {
    sections.push(`**Description**: ${definition.metadata.description}\n`);
  }

  if (raw) {
    sections.push(`**Arguments**: ${raw}\n`);
  }

  if (definition.metadata.model) {
    sections.push(`**Model**: ${definition.metadata.model}\n`);
  }

  if (definition.kind !== 'agent' && definition.metadata.agent) {
    sections.push(`**Agent**: ${definition.metadata.agent}\n`);
  }

  sections.push(`**Scope**: ${definition.scope}\n`);

  if (definition.kind === 'skill' && definition.metadata.aliasOf) {
    sections.push(
      `⚠️ **Deprecated Alias**: \`/${definition.name}\` is deprecated and will be removed in a future release. Use \`/${definition.metadata.aliasOf}\` instead.\n`,
    );
  }

  sections.push('---\n');

  const rendered = options.rendered ?? renderDefinition(definition, args, options);
  sections.push(rendered.text.trim());

  if (raw && findPlaceholders(definition.body).placeholders.length === 0) {
    sections.push('\n\n---\n');
    sections.push('## User Request\n');
    sections.push(raw);
  }

  return sections.join('\n');
}

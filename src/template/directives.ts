/**
 * Shell directives and file references in command bodies.
 *
 * - !`git status`   runs a shell command; its output replaces the directive
 * - @src/index.ts   pulls a file (or directory listing) into the prompt
 *
 * Resolution is opt-in: the host normally does this itself, and slashkit
 * only does it when previewing a command with --exec / --files.
 */

import { execSync } from 'child_process';
import { existsSync, readdirSync, readFileSync, statSync } from 'fs';
import { resolve } from 'path';
import { errorMessage } from '../shared/errors.js';
import { debugLog } from '../utils/debug.js';

const SHELL_DIRECTIVE_REGEX = /!`([^`\n]+)`/g;
const FILE_REFERENCE_REGEX = /(^|[\s(])@([\w~][\w\-./~]*)/gm;

export interface ShellDirective {
  /** The full directive text, e.g. !`git status` */
  raw: string;
  command: string;
  line: number;
}

export interface ShellDirectiveResult extends ShellDirective {
  output: string;
  ok: boolean;
}

export interface FileReference {
  path: string;
  line: number;
}

export interface FileReferenceResult extends FileReference {
  absolutePath: string;
  ok: boolean;
  error?: string;
}

export type ShellRunner = (command: string, options: { cwd: string; timeoutMs: number }) => string;

function lineAt(text: string, index: number): number {
  return text.slice(0, index).split('\n').length;
}

/** A directive with its offsets in the text it was found in */
export interface LocatedShellDirective extends ShellDirective {
  start: number;
  end: number;
}

/**
 * Find every !`command` directive along with where it sits in `body`.
 */
export function locateShellDirectives(body: string): LocatedShellDirective[] {
  const directives: LocatedShellDirective[] = [];
  for (const match of body.matchAll(SHELL_DIRECTIVE_REGEX)) {
    const start = match.index ?? 0;
    directives.push({
      raw: match[0],
      command: match[1].trim(),
      line: lineAt(body, start),
      start,
      end: start + match[0].length,
    });
  }
  return directives;
}

/**
 * Find every !`command` directive.
 */
export function extractShellDirectives(body: string): ShellDirective[] {
  return locateShellDirectives(body).map(({ raw, command, line }) => ({ raw, command, line }));
}

/**
 * Find distinct @path references. Trailing sentence punctuation is not part
 * of the path and e-mail addresses are not references.
 */
export function extractFileReferences(body: string): FileReference[] {
  const references: FileReference[] = [];
  const seen = new Set<string>();

  for (const match of body.matchAll(FILE_REFERENCE_REGEX)) {
    const path = match[2].replace(/[.,;:]+$/, '');
    if (!path || seen.has(path)) continue;
    seen.add(path);
    const index = (match.index ?? 0) + match[1].length;
    references.push({ path, line: lineAt(body, index) });
  }

  return references;
}

function matchesCommandPattern(pattern: string, command: string): boolean {
  // `git:*` and `git *` match the word `git` and anything after it
  const wordPrefix = pattern.match(/^(.+?)(?::|\s+)\*$/);
  if (wordPrefix) {
    const prefix = wordPrefix[1].trim();
    return command === prefix || command.startsWith(`${prefix} `);
  }
  if (pattern.endsWith('*')) {
    return command.startsWith(pattern.slice(0, -1));
  }
  return command === pattern;
}

/**
 * Does an allowed-tools list permit `tool`, optionally for a specific
 * argument (the shell command for Bash)?
 *
 * - `Bash` allows every command
 * - `Bash(git:*)` / `Bash(git *)` allow commands starting with `git`
 * - `Bash(npm test)` allows exactly `npm test`
 */
export function isToolAllowed(allowedTools: readonly string[], tool: string, argument?: string): boolean {
  for (const entry of allowedTools) {
    const match = entry.trim().match(/^([^(\s]+)\s*(?:\((.*)\))?$/);
    if (!match || match[1] !== tool) continue;

    const pattern = match[2]?.trim();
    if (!pattern || pattern === '*') return true;
    if (argument === undefined) continue;

    if (matchesCommandPattern(pattern, argument.trim())) return true;
  }
  return false;
}

export const defaultShellRunner: ShellRunner = (command, { cwd, timeoutMs }) =>
  execSync(command, {
    cwd,
    timeout: timeoutMs,
    encoding: 'utf-8',
    stdio: ['ignore', 'pipe', 'pipe'],
  });

export interface ShellOptions {
  cwd: string;
  timeoutMs: number;
  runShell?: ShellRunner;
}

/**
 * Run one directive. A failing command yields `(command failed: <message>)`.
 */
export function runShellDirective(directive: ShellDirective, options: ShellOptions): ShellDirectiveResult {
  const runShell = options.runShell ?? defaultShellRunner;
  const { raw, command, line } = directive;
  try {
    const output = runShell(command, { cwd: options.cwd, timeoutMs: options.timeoutMs });
    return { raw, command, line, output: output.trim(), ok: true };
  } catch (err) {
    debugLog('directives', `command failed: ${command}`, errorMessage(err));
    return { raw, command, line, output: `(command failed: ${errorMessage(err)})`, ok: false };
  }
}

/**
 * Run each shell directive and splice its trimmed output into the body.
 */
export function resolveShellDirectives(
  body: string,
  options: ShellOptions,
): { text: string; results: ShellDirectiveResult[] } {
  const results = extractShellDirectives(body).map((directive) => runShellDirective(directive, options));

  let index = 0;
  const text = body.replace(SHELL_DIRECTIVE_REGEX, () => results[index++].output);
  return { text, results };
}

function readReference(absolutePath: string): string {
  if (statSync(absolutePath).isDirectory()) {
    return readdirSync(absolutePath, { withFileTypes: true })
      .map((entry) => (entry.isDirectory() ? `${entry.name}/` : entry.name))
      .sort()
      .join('\n');
  }
  return readFileSync(absolutePath, 'utf-8');
}

/**
 * Append one <file> block per readable reference to `text`.
 */
export function inlineFileReferences(
  text: string,
  references: readonly FileReference[],
  options: { cwd: string },
): { text: string; results: FileReferenceResult[] } {
  const results: FileReferenceResult[] = [];
  const blocks: string[] = [];

  for (const reference of references) {
    const absolutePath = resolve(options.cwd, reference.path);
    if (!existsSync(absolutePath)) {
      results.push({ ...reference, absolutePath, ok: false, error: 'not found' });
      continue;
    }
    try {
      const content = readReference(absolutePath);
      blocks.push(`<file path="${reference.path}">\n${content.trimEnd()}\n</file>`);
      results.push({ ...reference, absolutePath, ok: true });
    } catch (err) {
      results.push({ ...reference, absolutePath, ok: false, error: errorMessage(err) });
    }
  }

  if (blocks.length === 0) {
    return { text, results };
  }
  return { text: `${text.trimEnd()}\n\n${blocks.join('\n\n')}\n`, results };
}

/**
 * Append one <file> block per readable @reference in `body`.
 */
export function resolveFileReferences(
  body: string,
  options: { cwd: string },
): { text: string; results: FileReferenceResult[] } {
  return inlineFileReferences(body, extractFileReferences(body), options);
}

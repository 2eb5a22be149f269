/**
 * Shared frontmatter parsing utilities
 *
 * Parses YAML frontmatter from markdown files. Real-world command files often
 * carry values that are not valid YAML (`argument-hint: [a] [b]`,
 * `description: Fix: things`), so an unparseable block falls back to flat
 * `key: value` lines instead of failing.
 */

import * as yaml from 'js-yaml';
import type { FrontmatterData, ParsedFrontmatter } from '../shared/types.js';

const FRONTMATTER_REGEX = /^---[ \t]*\r?\n(?:([\s\S]*?)\r?\n)?---[ \t]*(?:\r?\n|$)([\s\S]*)$/;

/**
 * Remove surrounding single or double quotes from a trimmed value.
 */
export function stripOptionalQuotes(value: string): string {
  const trimmed = value.trim();
  if (
    trimmed.length >= 2 &&
    ((trimmed.startsWith('"') && trimmed.endsWith('"')) ||
      (trimmed.startsWith("'") && trimmed.endsWith("'")))
  ) {
    return trimmed.slice(1, -1).trim();
  }
  return trimmed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Flat `key: value` parsing, split at the first colon.
 */
function parseFlatFrontmatter(block: string): FrontmatterData {
  const data: FrontmatterData = {};

  for (const line of block.split(/\r?\n/)) {
    if (!line.trim() || line.trimStart().startsWith('#')) continue;
    const colonIndex = line.indexOf(':');
    if (colonIndex === -1) continue;

    const key = line.slice(0, colonIndex).trim();
    if (!key) continue;
    data[key] = stripOptionalQuotes(line.slice(colonIndex + 1));
  }

  return data;
}

function countLines(text: string): number {
  if (!text) return 0;
  return text.split(/\r?\n/).length;
}

/**
 * Parse frontmatter from markdown content.
 */
export function parseFrontmatter(content: string): ParsedFrontmatter {
  const match = content.match(FRONTMATTER_REGEX);

  if (!match) {
    return { present: false, data: {}, body: content, bodyLine: 1 };
  }

  const block = match[1] ?? '';
  const body = match[2] ?? '';
  // opening delimiter + block lines + closing delimiter
  const bodyLine = countLines(block) + 3;

  if (!block.trim()) {
    return { present: true, data: {}, body, bodyLine };
  }

  try {
    const loaded: unknown = yaml.load(block, { schema: yaml.JSON_SCHEMA });
    if (isRecord(loaded)) {
      return { present: true, data: loaded, body, bodyLine };
    }
    return {
      present: true,
      data: parseFlatFrontmatter(block),
      body,
      bodyLine,
      yamlError: 'frontmatter is not a key/value mapping',
    };
  } catch (err) {
    const message = err instanceof yaml.YAMLException ? err.reason || err.message : String(err);
    return {
      present: true,
      data: parseFlatFrontmatter(block),
      body,
      bodyLine,
      yamlError: message,
    };
  }
}

/**
 * Split a comma separated list at top-level commas only, so
 * `Bash(git add:*, git commit:*), Read` stays two entries.
 */
export function splitTopLevel(value: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';

  for (const char of value) {
    if (char === '(') depth++;
    if (char === ')' && depth > 0) depth--;
    if (char === ',' && depth === 0) {
      parts.push(current);
      current = '';
      continue;
    }
    current += char;
  }
  parts.push(current);

  return parts.map((part) => stripOptionalQuotes(part)).filter((part) => part.length > 0);
}

/**
 * Normalize a string-or-list frontmatter value into a list of strings.
 */
export function toStringList(value: string | string[] | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  if (Array.isArray(value)) {
    return value.flatMap((entry) => splitTopLevel(entry));
  }
  return splitTopLevel(value);
}

/**
 * Parse the `aliases` frontmatter field into an array of strings.
 * Supports YAML lists, the inline form `aliases: [foo, bar]` kept as text by
 * the flat fallback, and a single value.
 */
export function parseFrontmatterAliases(rawAliases: unknown): string[] {
  if (Array.isArray(rawAliases)) {
    return rawAliases
      .filter((alias): alias is string => typeof alias === 'string')
      .map((alias) => stripOptionalQuotes(alias))
      .filter((alias) => alias.length > 0);
  }

  if (typeof rawAliases !== 'string') return [];

  const trimmed = rawAliases.trim();
  if (!trimmed) return [];

  if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
    const inner = trimmed.slice(1, -1).trim();
    if (!inner) return [];

    return inner
      .split(',')
      .map((alias) => stripOptionalQuotes(alias))
      .filter((alias) => alias.length > 0);
  }

  const singleAlias = stripOptionalQuotes(trimmed);
  return singleAlias ? [singleAlias] : [];
}

/**
 * Render a frontmatter block followed by the body.
 */
export function stringifyFrontmatter(data: FrontmatterData, body: string): string {
  const entries = Object.entries(data).filter(([, value]) => value !== undefined);
  if (entries.length === 0) {
    return body;
  }

  const block = yaml
    .dump(Object.fromEntries(entries), { lineWidth: -1, schema: yaml.JSON_SCHEMA })
    .trimEnd();
  const separator = body.startsWith('\n') ? '' : '\n';

  return `---\n${block}\n---\n${separator}${body}`;
}

/**
 * Argument placeholder substitution
 *
 * `$ARGUMENTS` receives the whole argument string and `$1`, `$2`, ... the
 * positional arguments. Substitution is a single pass over the template:
 * inserted values are never scanned again, and a placeholder without a value
 * stays in the output as literal text.
 */

const PLACEHOLDER_REGEX = /\$(ARGUMENTS|\d+)/g;

/**
 * Caller arguments: a raw string (split like a shell would), a list, or
 * values keyed by 1-based position when some positions are not supplied.
 */
export type ArgumentInput = string | readonly string[] | ReadonlyMap<number, string>;

export interface SubstitutionResult {
  text: string;
  /** Placeholders left in the output, in order of appearance */
  unresolved: string[];
}

export interface PlaceholderUsage {
  /** Distinct placeholders in order of first appearance */
  placeholders: string[];
  usesArguments: boolean;
  /** Sorted distinct positional indices (1-based) */
  positional: number[];
  maxPositional: number;
}

/**
 * Split a raw argument string into words. Single and double quotes group
 * words and are removed; a backslash escapes the next character.
 */
export function splitArguments(raw: string): string[] {
  const args: string[] = [];
  let current = '';
  let inWord = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < raw.length; i++) {
    const char = raw[i];

    if (quote) {
      if (char === quote) {
        quote = null;
      } else if (char === '\\' && quote === '"' && i + 1 < raw.length) {
        current += raw[++i];
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
      inWord = true;
      continue;
    }

    if (char === '\\' && i + 1 < raw.length) {
      current += raw[++i];
      inWord = true;
      continue;
    }

    if (/\s/.test(char)) {
      if (inWord) {
        args.push(current);
        current = '';
        inWord = false;
      }
      continue;
    }

    current += char;
    inWord = true;
  }

  if (inWord) {
    args.push(current);
  }

  return args;
}

interface NormalizedArguments {
  raw: string;
  supplied: boolean;
  valueAt: (index: number) => string | undefined;
}

function isPositionMap(input: readonly string[] | ReadonlyMap<number, string>): input is ReadonlyMap<number, string> {
  return input instanceof Map;
}

function normalizeArguments(input: ArgumentInput): NormalizedArguments {
  if (typeof input === 'string') {
    const positional = splitArguments(input);
    return { raw: input.trim(), supplied: positional.length > 0, valueAt: (index) => positional[index - 1] };
  }
  if (isPositionMap(input)) {
    const values = [...input.entries()].sort(([a], [b]) => a - b).map(([, value]) => value);
    return { raw: values.join(' '), supplied: values.length > 0, valueAt: (index) => input.get(index) };
  }
  const positional = [...input];
  return { raw: positional.join(' '), supplied: positional.length > 0, valueAt: (index) => positional[index - 1] };
}

/**
 * The argument string as the host shows it
 */
export function rawArgumentString(input: ArgumentInput): string {
  return normalizeArguments(input).raw;
}

/**
 * Replace `$ARGUMENTS` and `$N` placeholders in a template.
 */
export function substituteArguments(template: string, input: ArgumentInput): SubstitutionResult {
  const { raw, supplied, valueAt } = normalizeArguments(input);
  const unresolved: string[] = [];

  const text = template.replace(PLACEHOLDER_REGEX, (placeholder: string, token: string) => {
    if (token === 'ARGUMENTS') {
      if (supplied) return raw;
      unresolved.push(placeholder);
      return placeholder;
    }

    const value = valueAt(Number.parseInt(token, 10));
    if (value !== undefined) {
      return value;
    }
    unresolved.push(placeholder);
    return placeholder;
  });

  return { text, unresolved };
}

/**
 * Collect the placeholders a template uses.
 */
export function findPlaceholders(template: string): PlaceholderUsage {
  const placeholders: string[] = [];
  const positional = new Set<number>();
  let usesArguments = false;

  for (const match of template.matchAll(PLACEHOLDER_REGEX)) {
    const [placeholder, token] = match;
    if (!placeholders.includes(placeholder)) {
      placeholders.push(placeholder);
    }
    if (token === 'ARGUMENTS') {
      usesArguments = true;
      continue;
    }
    const index = Number.parseInt(token, 10);
    if (index >= 1) positional.add(index);
  }

  const sorted = [...positional].sort((a, b) => a - b);
  return {
    placeholders,
    usesArguments,
    positional: sorted,
    maxPositional: sorted.length > 0 ? sorted[sorted.length - 1] : 0,
  };
}

/**
 * Positions missing below the highest one, collapsed into ranges:
 * `[2, 5]` yields `$1`, `$3..$4`.
 */
export function positionalGaps(positional: readonly number[]): string[] {
  const gaps: string[] = [];
  let previous = 0;
  for (const index of positional) {
    if (index > previous + 1) {
      const first = previous + 1;
      const last = index - 1;
      gaps.push(first === last ? `$${first}` : `$${first}..$${last}`);
    }
    previous = index;
  }
  return gaps;
}

/**
 * 1-based line number of the first occurrence of `placeholder` in `text`
 */
export function lineOfPlaceholder(text: string, placeholder: string): number | undefined {
  const pattern = new RegExp(`\\${placeholder}(?!\\d)`);
  const match = pattern.exec(text);
  if (!match) return undefined;
  return text.slice(0, match.index).split('\n').length;
}

/**
 * Parameter names declared by an `argument-hint`.
 * `[pr-number] [priority]` yields two names; without brackets the hint is
 * split on whitespace.
 */
export function parseArgumentHint(hint: string | undefined): string[] {
  if (!hint) return [];
  const trimmed = hint.trim();
  if (!trimmed) return [];

  const bracketed = [...trimmed.matchAll(/\[([^\]]*)\]/g)].map((match) => match[1].trim());
  if (bracketed.length > 0) {
    return bracketed;
  }

  return trimmed.split(/\s+/);
}

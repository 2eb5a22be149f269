/**
 * Corpus Discovery
 *
 * Discovers slash commands, sub-agents and skills from a list of roots.
 * Each root may contain:
 *   commands/**\/*.md        slash commands (sub-directories are namespaces)
 *   agents/**\/*.md          sub-agent definitions
 *   skills/<name>/SKILL.md   skills
 *
 * Roots are searched in priority order; the first definition of a name wins
 * and later ones are recorded as shadowed.
 */

import { existsSync, readdirSync, readFileSync, type Dirent } from 'fs';
import { basename, join, relative, sep } from 'path';
import type { z } from 'zod';
import type {
  AgentDefinition,
  CommandDefinition,
  Corpus,
  CorpusRoot,
  Definition,
  DefinitionKind,
  DiscoveryError,
  ParsedFrontmatter,
  SkillDefinition,
} from '../shared/types.js';
import { errorMessage } from '../shared/errors.js';
import { parseFrontmatter, parseFrontmatterAliases, toStringList } from '../utils/frontmatter.js';
import { debugLog } from '../utils/debug.js';
import {
  agentFrontmatterSchema,
  commandFrontmatterSchema,
  describeIssues,
  skillFrontmatterSchema,
  type SchemaIssue,
} from './schema.js';

export const SKILL_FILE = 'SKILL.md';

/** Markdown files that document a directory rather than define anything */
const DOCUMENTATION_FILES = new Set(['readme.md', 'agents.md', 'claude.md']);

export interface DiscoverOptions {
  roots: CorpusRoot[];
}

/**
 * Parse frontmatter data against a schema, dropping the keys that fail so
 * the rest of the definition survives. The issues are returned for lint.
 */
export function normalizeFrontmatter<T extends z.ZodTypeAny>(
  schema: T,
  data: Record<string, unknown>,
): { value: z.output<T>; issues: SchemaIssue[] } {
  const first = schema.safeParse(data);
  if (first.success) {
    return { value: first.data, issues: [] };
  }

  const issues = describeIssues(first.error);
  const badKeys = new Set(first.error.issues.map((issue) => String(issue.path[0] ?? '')));
  const cleaned = Object.fromEntries(Object.entries(data).filter(([key]) => !badKeys.has(key)));
  const second = schema.safeParse(cleaned);
  if (second.success) {
    return { value: second.data, issues };
  }
  return { value: schema.parse({}), issues };
}

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function readMarkdown(path: string): { content: string; frontmatter: ParsedFrontmatter } {
  const content = readFileSync(path, 'utf-8');
  return { content, frontmatter: parseFrontmatter(content) };
}

function listMarkdownFiles(dir: string): string[] {
  const files: string[] = [];
  const walk = (current: string) => {
    let entries: Dirent[];
    try {
      entries = readdirSync(current, { withFileTypes: true });
    } catch (err) {
      debugLog('discovery', `cannot read ${current}`, errorMessage(err));
      return;
    }
    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
      const path = join(current, entry.name);
      if (entry.isDirectory()) {
        walk(path);
      } else if (
        (entry.isFile() || entry.isSymbolicLink()) &&
        entry.name.endsWith('.md') &&
        !DOCUMENTATION_FILES.has(entry.name.toLowerCase())
      ) {
        // links are read through; a dangling one surfaces as a read error
        files.push(path);
      }
    }
  };
  walk(dir);
  return files;
}

/**
 * Parse a single command file.
 */
export function loadCommand(path: string, root: CorpusRoot, commandsDir = join(root.path, 'commands')): CommandDefinition {
  const { frontmatter } = readMarkdown(path);
  const { value: fm } = normalizeFrontmatter(commandFrontmatterSchema, frontmatter.data);

  const relativeDir = relative(commandsDir, join(path, '..'));
  const namespace = relativeDir && !relativeDir.startsWith('..') ? relativeDir.split(sep).join(':') : undefined;

  return {
    kind: 'command',
    name: basename(path, '.md'),
    namespace,
    path,
    scope: root.scope,
    root: root.path,
    frontmatter,
    body: frontmatter.body,
    metadata: {
      description: nonEmpty(fm.description) ?? '',
      argumentHint: nonEmpty(fm['argument-hint']),
      allowedTools: toStringList(fm['allowed-tools']),
      model: nonEmpty(fm.model),
      agent: nonEmpty(fm.agent),
      disableModelInvocation: fm['disable-model-invocation'],
    },
  };
}

/**
 * Parse a single agent file.
 */
export function loadAgent(path: string, root: CorpusRoot): AgentDefinition {
  const { frontmatter } = readMarkdown(path);
  const { value: fm } = normalizeFrontmatter(agentFrontmatterSchema, frontmatter.data);

  return {
    kind: 'agent',
    name: nonEmpty(fm.name) ?? basename(path, '.md'),
    path,
    scope: root.scope,
    root: root.path,
    frontmatter,
    body: frontmatter.body,
    metadata: {
      description: nonEmpty(fm.description) ?? '',
      tools: toStringList(fm.tools),
      disallowedTools: toStringList(fm.disallowedTools),
      model: nonEmpty(fm.model),
      permissionMode: nonEmpty(fm.permissionMode),
      color: nonEmpty(fm.color),
      hooks: fm.hooks,
    },
  };
}

/**
 * Parse a SKILL.md file. Returns the canonical skill followed by one entry
 * per alias.
 */
export function loadSkill(path: string, root: CorpusRoot): SkillDefinition[] {
  const { frontmatter } = readMarkdown(path);
  const { value: fm } = normalizeFrontmatter(skillFrontmatterSchema, frontmatter.data);

  const dirName = basename(join(path, '..'));
  const canonicalName = nonEmpty(fm.name) ?? dirName;
  const aliases = Array.from(
    new Set(
      parseFrontmatterAliases(fm.aliases).filter((alias) => alias.toLowerCase() !== canonicalName.toLowerCase()),
    ),
  );

  const base = {
    kind: 'skill' as const,
    path,
    scope: root.scope,
    root: root.path,
    frontmatter,
    body: frontmatter.body,
  };
  const metadata = {
    description: nonEmpty(fm.description) ?? '',
    argumentHint: nonEmpty(fm['argument-hint']),
    allowedTools: toStringList(fm['allowed-tools']),
    model: nonEmpty(fm.model),
    agent: nonEmpty(fm.agent),
    license: nonEmpty(fm.license),
    userInvocable: fm['user-invocable'],
    disableModelInvocation: fm['disable-model-invocation'],
  };

  const skills: SkillDefinition[] = [{ ...base, name: canonicalName, metadata: { ...metadata, aliases } }];
  for (const alias of aliases) {
    skills.push({
      ...base,
      name: alias,
      metadata: {
        ...metadata,
        aliases: [],
        aliasOf: canonicalName,
        deprecationMessage: `Alias "/${alias}" is deprecated. Use "/${canonicalName}" instead.`,
      },
    });
  }
  return skills;
}

function discoverCommands(root: CorpusRoot, errors: DiscoveryError[]): CommandDefinition[] {
  const commandsDir = join(root.path, 'commands');
  if (!existsSync(commandsDir)) return [];

  const commands: CommandDefinition[] = [];
  for (const path of listMarkdownFiles(commandsDir)) {
    try {
      commands.push(loadCommand(path, root, commandsDir));
    } catch (err) {
      errors.push({ path, message: errorMessage(err) });
    }
  }
  return commands;
}

function discoverAgents(root: CorpusRoot, errors: DiscoveryError[]): AgentDefinition[] {
  const agentsDir = join(root.path, 'agents');
  if (!existsSync(agentsDir)) return [];

  const agents: AgentDefinition[] = [];
  for (const path of listMarkdownFiles(agentsDir)) {
    try {
      agents.push(loadAgent(path, root));
    } catch (err) {
      errors.push({ path, message: errorMessage(err) });
    }
  }
  return agents;
}

function discoverSkills(root: CorpusRoot, errors: DiscoveryError[]): SkillDefinition[] {
  const skillsDir = join(root.path, 'skills');
  if (!existsSync(skillsDir)) return [];

  let entries: Dirent[];
  try {
    entries = readdirSync(skillsDir, { withFileTypes: true });
  } catch (err) {
    errors.push({ path: skillsDir, message: errorMessage(err) });
    return [];
  }

  const skills: SkillDefinition[] = [];
  const aliases: SkillDefinition[] = [];
  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    if (!entry.isDirectory()) continue;

    const skillPath = join(skillsDir, entry.name, SKILL_FILE);
    if (!existsSync(skillPath)) continue;

    try {
      const [skill, ...skillAliases] = loadSkill(skillPath, root);
      skills.push(skill);
      aliases.push(...skillAliases);
    } catch (err) {
      errors.push({ path: skillPath, message: errorMessage(err) });
    }
  }
  // a skill's own name outranks another skill's alias in the same root
  return [...skills, ...aliases];
}

function dedupe<T extends Definition>(definitions: T[], shadowed: Corpus['shadowed']): T[] {
  const winners = new Map<string, T>();
  for (const definition of definitions) {
    const key = definition.name.toLowerCase();
    const existing = winners.get(key);
    if (existing) {
      shadowed.push({ definition, shadowedBy: existing });
      debugLog('discovery', `${definition.kind} "${definition.name}" at ${definition.path} is shadowed by ${existing.path}`);
      continue;
    }
    winners.set(key, definition);
  }
  return [...winners.values()];
}

/**
 * Discover all commands, agents and skills under the given roots.
 */
export function discoverCorpus(options: DiscoverOptions): Corpus {
  const errors: DiscoveryError[] = [];
  const shadowed: Corpus['shadowed'] = [];

  const commands: CommandDefinition[] = [];
  const agents: AgentDefinition[] = [];
  const skills: SkillDefinition[] = [];

  for (const root of options.roots) {
    if (!existsSync(root.path)) {
      debugLog('discovery', `skipping missing root ${root.path}`);
      continue;
    }
    commands.push(...discoverCommands(root, errors));
    agents.push(...discoverAgents(root, errors));
    skills.push(...discoverSkills(root, errors));
  }

  return {
    roots: options.roots,
    commands: dedupe(commands, shadowed),
    agents: dedupe(agents, shadowed),
    skills: dedupe(skills, shadowed),
    shadowed,
    errors,
  };
}

/**
 * All definitions of a corpus, optionally restricted to one kind
 */
export function allDefinitions(corpus: Corpus, kind?: DefinitionKind): Definition[] {
  const definitions: Definition[] = [];
  if (!kind || kind === 'command') definitions.push(...corpus.commands);
  if (!kind || kind === 'skill') definitions.push(...corpus.skills);
  if (!kind || kind === 'agent') definitions.push(...corpus.agents);
  return definitions;
}

/**
 * Find a definition by name. A leading `/` is ignored and matching is
 * case-insensitive. Without a kind, commands win over skills and skills
 * over agents.
 */
export function findDefinition(corpus: Corpus, name: string, kind?: DefinitionKind): Definition | null {
  const wanted = name.trim().replace(/^\//, '').toLowerCase();
  return allDefinitions(corpus, kind).find((definition) => definition.name.toLowerCase() === wanted) ?? null;
}

export interface ListedDefinition {
  kind: DefinitionKind;
  name: string;
  description: string;
  scope: Definition['scope'];
  path: string;
  aliasOf?: string;
}

/**
 * List definitions sorted by kind then name. Skill aliases are hidden
 * unless requested.
 */
export function listDefinitions(
  corpus: Corpus,
  options: { kind?: DefinitionKind; includeAliases?: boolean } = {},
): ListedDefinition[] {
  const { kind, includeAliases = false } = options;
  const order: Record<DefinitionKind, number> = { command: 0, skill: 1, agent: 2 };

  return allDefinitions(corpus, kind)
    .filter((definition) => includeAliases || definition.kind !== 'skill' || !definition.metadata.aliasOf)
    .map((definition): ListedDefinition => ({
      kind: definition.kind,
      name: definition.name,
      description: definition.metadata.description,
      scope: definition.scope,
      path: definition.path,
      aliasOf: definition.kind === 'skill' ? definition.metadata.aliasOf : undefined,
    }))
    .sort((a, b) => order[a.kind] - order[b.kind] || a.name.localeCompare(b.name));
}

/**
 * Issues the frontmatter schema reports for a definition
 */
export function schemaIssuesFor(definition: Definition): SchemaIssue[] {
  switch (definition.kind) {
    case 'command':
      return normalizeFrontmatter(commandFrontmatterSchema, definition.frontmatter.data).issues;
    case 'agent':
      return normalizeFrontmatter(agentFrontmatterSchema, definition.frontmatter.data).issues;
    case 'skill':
      return normalizeFrontmatter(skillFrontmatterSchema, definition.frontmatter.data).issues;
  }
}

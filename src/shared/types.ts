/**
 * Shared types for slashkit
 */

export type DefinitionKind = 'command' | 'agent' | 'skill';

/**
 * Where a definition was discovered.
 * - corpus: an explicitly configured root (e.g. this repository)
 * - project: <cwd>/.claude
 * - user: $CLAUDE_CONFIG_DIR or ~/.claude
 */
export type DefinitionScope = 'corpus' | 'project' | 'user';

export type Severity = 'error' | 'warning' | 'info';

export type RuleSetting = Severity | 'off';

/** A directory that may contain commands/, agents/ and skills/ */
export interface CorpusRoot {
  path: string;
  scope: DefinitionScope;
}

/** Raw frontmatter value as produced by the YAML parser */
export type FrontmatterData = Record<string, unknown>;

export interface ParsedFrontmatter {
  /** Whether the document starts with a frontmatter block */
  present: boolean;
  data: FrontmatterData;
  body: string;
  /** 1-based line number of the first body line */
  bodyLine: number;
  /** Set when the block was not valid YAML and the flat fallback was used */
  yamlError?: string;
}

export interface CommandMetadata {
  description: string;
  argumentHint?: string;
  allowedTools?: string[];
  model?: string;
  agent?: string;
  disableModelInvocation?: boolean;
}

export interface AgentMetadata {
  description: string;
  tools?: string[];
  disallowedTools?: string[];
  model?: string;
  permissionMode?: string;
  color?: string;
  hooks?: Record<string, unknown>;
}

export interface SkillMetadata {
  description: string;
  argumentHint?: string;
  allowedTools?: string[];
  model?: string;
  agent?: string;
  aliases: string[];
  license?: string;
  userInvocable?: boolean;
  disableModelInvocation?: boolean;
  /** Canonical skill name when this entry is an alias */
  aliasOf?: string;
  deprecationMessage?: string;
}

interface DefinitionBase {
  /** Invocable name */
  name: string;
  /** Absolute path of the markdown file */
  path: string;
  scope: DefinitionScope;
  /** Root directory the definition was found under */
  root: string;
  frontmatter: ParsedFrontmatter;
  /** Markdown body with the frontmatter removed */
  body: string;
}

export interface CommandDefinition extends DefinitionBase {
  kind: 'command';
  /** Sub-directory path under commands/, joined with ':' */
  namespace?: string;
  metadata: CommandMetadata;
}

export interface AgentDefinition extends DefinitionBase {
  kind: 'agent';
  metadata: AgentMetadata;
}

export interface SkillDefinition extends DefinitionBase {
  kind: 'skill';
  metadata: SkillMetadata;
}

export type Definition = CommandDefinition | AgentDefinition | SkillDefinition;

export interface DiscoveryError {
  path: string;
  message: string;
}

export interface Corpus {
  roots: CorpusRoot[];
  commands: CommandDefinition[];
  agents: AgentDefinition[];
  skills: SkillDefinition[];
  /** Definitions hidden by a same-named definition from a higher-priority root */
  shadowed: Array<{ definition: Definition; shadowedBy: Definition }>;
  errors: DiscoveryError[];
}

export interface Diagnostic {
  rule: string;
  severity: Severity;
  message: string;
  path: string;
  line?: number;
}

export interface SlashkitConfig {
  /** Extra corpus roots, searched before project and user roots */
  roots: string[];
  includeProject: boolean;
  includeUser: boolean;
  /** Per-rule severity overrides */
  rules: Record<string, RuleSetting>;
  /** Tool names accepted in allowed-tools/tools besides the host's own */
  knownTools: string[];
  /** Extra names treated as host built-in slash commands */
  builtinCommands: string[];
  shellTimeoutMs: number;
}

/**
 * slashkit
 * Discovery, linting, rendering and serving for slash commands, sub-agents
 * and skills.
 */

// Core types
export type {
  AgentDefinition,
  AgentMetadata,
  CommandDefinition,
  CommandMetadata,
  Corpus,
  CorpusRoot,
  Definition,
  DefinitionKind,
  DefinitionScope,
  Diagnostic,
  ParsedFrontmatter,
  RuleSetting,
  Severity,
  SkillDefinition,
  SkillMetadata,
  SlashkitConfig,
} from './shared/types.js';
export { SlashkitError, NotFoundError, TemplateExistsError, ConfigError } from './shared/errors.js';

// Frontmatter
export { parseFrontmatter, stringifyFrontmatter, parseFrontmatterAliases } from './utils/frontmatter.js';

// Discovery
export {
  discoverCorpus,
  findDefinition,
  listDefinitions,
  allDefinitions,
  loadCommand,
  loadAgent,
  loadSkill,
} from './corpus/discovery.js';

// Configuration
export { loadConfig, resolveRoots, getConfigPaths, DEFAULT_CONFIG } from './config/loader.js';

// Templates and rendering
export {
  substituteArguments,
  findPlaceholders,
  splitArguments,
  parseArgumentHint,
  rawArgumentString,
} from './template/arguments.js';
export type { ArgumentInput } from './template/arguments.js';
export {
  extractShellDirectives,
  extractFileReferences,
  resolveShellDirectives,
  resolveFileReferences,
  isToolAllowed,
} from './template/directives.js';
export { renderDefinition, tryRenderDefinition, formatInvocation } from './template/render.js';
export type { InvocationOptions, RenderOptions, RenderResult, RenderOutcome } from './template/render.js';

// Lint
export { lintCorpus, lintDefinition, lintFile, summarize, RULES } from './lint/index.js';
export type { LintOptions, LintSummary, RuleId } from './lint/index.js';

// Generator
export { generateTemplate, writeTemplate, TEMPLATE_PATTERN_NAMES } from './generator/templates.js';

// MCP
export { createPromptServer, startPromptServer } from './mcp/server.js';

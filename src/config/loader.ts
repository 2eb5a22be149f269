/**
 * Configuration Loader
 *
 * Handles loading and merging configuration from multiple sources:
 * - User config: <claude config dir>/slashkit.json
 * - Project config: <cwd>/.slashkit.json
 * - Environment variables (SLASHKIT_ROOTS, SLASHKIT_SHELL_TIMEOUT_MS)
 *
 * Later sources override earlier ones.
 */

import { existsSync, readFileSync } from 'fs';
import { delimiter, dirname, join, resolve } from 'path';
import { z } from 'zod';
import type { CorpusRoot, SlashkitConfig } from '../shared/types.js';
import { ConfigError, errorMessage } from '../shared/errors.js';
import { getClaudeConfigDir, getProjectClaudeDir } from '../utils/paths.js';
import { debugLog } from '../utils/debug.js';

export const CONFIG_FILE_NAME = 'slashkit.json';
export const PROJECT_CONFIG_FILE_NAME = '.slashkit.json';

export const DEFAULT_CONFIG: SlashkitConfig = {
  roots: [],
  includeProject: true,
  includeUser: true,
  rules: {},
  knownTools: [],
  builtinCommands: [],
  shellTimeoutMs: 10_000,
};

const ruleSettingSchema = z.enum(['error', 'warning', 'info', 'off']);

const configFileSchema = z
  .object({
    roots: z.array(z.string()),
    includeProject: z.boolean(),
    includeUser: z.boolean(),
    rules: z.record(z.string(), ruleSettingSchema),
    knownTools: z.array(z.string()),
    builtinCommands: z.array(z.string()),
    shellTimeoutMs: z.number().int().positive(),
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Configuration file locations
 */
export function getConfigPaths(cwd: string = process.cwd()): { user: string; project: string } {
  return {
    user: join(getClaudeConfigDir(), CONFIG_FILE_NAME),
    project: join(cwd, PROJECT_CONFIG_FILE_NAME),
  };
}

/**
 * Load and validate a config file. Returns null when the file does not exist.
 * Relative roots are resolved against the file's directory.
 */
export function loadConfigFile(path: string): ConfigFile | null {
  if (!existsSync(path)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(path, errorMessage(err));
  }

  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigError(path, `${where}${issue?.message ?? 'unknown error'}`);
  }

  const config = result.data;
  if (config.roots) {
    const base = dirname(path);
    config.roots = config.roots.map((root) => resolve(base, root));
  }

  debugLog('config', `loaded ${path}`);
  return config;
}

/**
 * Merge a config file over a full configuration. Lists replace,
 * `rules` merges key by key.
 */
export function mergeConfig(target: SlashkitConfig, source: ConfigFile): SlashkitConfig {
  return {
    roots: source.roots ?? target.roots,
    includeProject: source.includeProject ?? target.includeProject,
    includeUser: source.includeUser ?? target.includeUser,
    rules: { ...target.rules, ...(source.rules ?? {}) },
    knownTools: source.knownTools ?? target.knownTools,
    builtinCommands: source.builtinCommands ?? target.builtinCommands,
    shellTimeoutMs: source.shellTimeoutMs ?? target.shellTimeoutMs,
  };
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(cwd: string = process.cwd()): ConfigFile {
  const config: ConfigFile = {};

  const roots = process.env.SLASHKIT_ROOTS;
  if (roots) {
    config.roots = roots
      .split(delimiter)
      .map((root) => root.trim())
      .filter((root) => root.length > 0)
      .map((root) => resolve(cwd, root));
  }

  const timeout = process.env.SLASHKIT_SHELL_TIMEOUT_MS;
  if (timeout) {
    const parsed = Number.parseInt(timeout, 10);
    if (Number.isFinite(parsed) && parsed > 0) {
      config.shellTimeoutMs = parsed;
    } else {
      debugLog('config', `ignoring SLASHKIT_SHELL_TIMEOUT_MS=${timeout}`);
    }
  }

  return config;
}

/**
 * Load and merge all configuration sources
 */
export function loadConfig(cwd: string = process.cwd()): SlashkitConfig {
  const paths = getConfigPaths(cwd);
  let config: SlashkitConfig = { ...DEFAULT_CONFIG, rules: {} };

  const userConfig = loadConfigFile(paths.user);
  if (userConfig) config = mergeConfig(config, userConfig);

  const projectConfig = loadConfigFile(paths.project);
  if (projectConfig) config = mergeConfig(config, projectConfig);

  return mergeConfig(config, loadEnvConfig(cwd));
}

/**
 * Corpus roots in priority order: explicit roots, configured roots,
 * the project's .claude directory, then the user's config directory.
 */
export function resolveRoots(
  config: SlashkitConfig,
  cwd: string = process.cwd(),
  extraRoots: string[] = [],
): CorpusRoot[] {
  const roots: CorpusRoot[] = [];
  const seen = new Set<string>();

  const add = (path: string, scope: CorpusRoot['scope']) => {
    const absolute = resolve(cwd, path);
    if (seen.has(absolute)) return;
    seen.add(absolute);
    roots.push({ path: absolute, scope });
  };

  for (const root of extraRoots) add(root, 'corpus');
  for (const root of config.roots) add(root, 'corpus');
  if (config.includeProject) add(getProjectClaudeDir(cwd), 'project');
  if (config.includeUser) add(getClaudeConfigDir(), 'user');

  return roots;
}

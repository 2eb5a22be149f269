/**
 * Names owned by the host: built-in slash commands and tools.
 */

/**
 * Claude Code native commands that user commands and skills must not shadow.
 */
export const BUILTIN_COMMANDS: ReadonlySet<string> = new Set([
  'add-dir',
  'agents',
  'bug',
  'clear',
  'compact',
  'config',
  'cost',
  'doctor',
  'help',
  'init',
  'login',
  'logout',
  'mcp',
  'memory',
  'model',
  'permissions',
  'plan',
  'pr-comments',
  'review',
  'security-review',
  'status',
  'terminal-setup',
  'vim',
]);

/**
 * Tool names the host provides to commands and agents.
 */
export const BUILTIN_TOOLS: ReadonlySet<string> = new Set([
  'Bash',
  'Edit',
  'Glob',
  'Grep',
  'LS',
  'MultiEdit',
  'NotebookEdit',
  'NotebookRead',
  'Read',
  'SlashCommand',
  'Skill',
  'Task',
  'TodoWrite',
  'WebFetch',
  'WebSearch',
  'Write',
]);

/** Model aliases accepted in `model:` besides full claude-* ids */
export const MODEL_ALIASES: ReadonlySet<string> = new Set(['sonnet', 'opus', 'haiku', 'inherit']);

export const PERMISSION_MODES: ReadonlySet<string> = new Set([
  'default',
  'acceptEdits',
  'bypassPermissions',
  'plan',
  'dontAsk',
]);

export function isBuiltinCommand(name: string, extra: readonly string[] = []): boolean {
  const normalized = name.trim().toLowerCase();
  return BUILTIN_COMMANDS.has(normalized) || extra.some((entry) => entry.toLowerCase() === normalized);
}

export function isKnownTool(name: string, extra: readonly string[] = []): boolean {
  return BUILTIN_TOOLS.has(name) || name.startsWith('mcp__') || extra.includes(name);
}

export function isValidModel(model: string): boolean {
  return MODEL_ALIASES.has(model) || /^claude-[a-z0-9][a-z0-9.-]*(\[1m\])?$/.test(model);
}

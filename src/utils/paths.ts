/**
 * Cross-Platform Path Utilities
 *
 * Resolves the host's config directories and normalises paths for display.
 */

import { homedir } from 'os';
import { join, relative, isAbsolute } from 'path';

/**
 * Convert a path to use forward slashes (for names and display)
 */
export function toForwardSlash(path: string): string {
  return path.replace(/\\/g, '/');
}

/**
 * Get Claude config directory path.
 * Respects the CLAUDE_CONFIG_DIR environment variable when set.
 */
export function getClaudeConfigDir(): string {
  return process.env.CLAUDE_CONFIG_DIR || join(homedir(), '.claude');
}

/**
 * Get the project-level Claude directory for a working directory
 */
export function getProjectClaudeDir(cwd: string = process.cwd()): string {
  return join(cwd, '.claude');
}

/**
 * Format a path relative to `cwd` when it lives below it
 */
export function displayPath(path: string, cwd: string = process.cwd()): string {
  const rel = relative(cwd, path);
  if (!rel || rel.startsWith('..') || isAbsolute(rel)) {
    return toForwardSlash(path);
  }
  return toForwardSlash(rel);
}

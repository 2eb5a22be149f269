import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { delimiter, join } from 'path';
import {
  DEFAULT_CONFIG,
  getConfigPaths,
  loadConfig,
  loadConfigFile,
  loadEnvConfig,
  mergeConfig,
  resolveRoots,
} from '../loader.js';
import { ConfigError } from '../../shared/errors.js';

describe('config loader', () => {
  let base: string;
  let userDir: string;
  let projectDir: string;

  beforeEach(() => {
    base = mkdtempSync(join(tmpdir(), 'slashkit-config-'));
    userDir = join(base, 'home', '.claude');
    projectDir = join(base, 'project');
    mkdirSync(userDir, { recursive: true });
    mkdirSync(projectDir, { recursive: true });
    vi.stubEnv('CLAUDE_CONFIG_DIR', userDir);
    vi.stubEnv('SLASHKIT_ROOTS', '');
    vi.stubEnv('SLASHKIT_SHELL_TIMEOUT_MS', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(base, { recursive: true, force: true });
  });

  it('locates user and project config files', () => {
    expect(getConfigPaths(projectDir)).toEqual({
      user: join(userDir, 'slashkit.json'),
      project: join(projectDir, '.slashkit.json'),
    });
  });

  it('returns defaults when no file exists', () => {
    expect(loadConfig(projectDir)).toEqual(DEFAULT_CONFIG);
  });

  it('layers project config over user config', () => {
    writeFileSync(
      join(userDir, 'slashkit.json'),
      JSON.stringify({ rules: { 'empty-body': 'off', 'invalid-model': 'error' }, knownTools: ['Custom'] }),
    );
    writeFileSync(
      join(projectDir, '.slashkit.json'),
      JSON.stringify({ rules: { 'empty-body': 'warning' }, includeUser: false }),
    );

    const config = loadConfig(projectDir);

    expect(config.rules).toEqual({ 'empty-body': 'warning', 'invalid-model': 'error' });
    expect(config.knownTools).toEqual(['Custom']);
    expect(config.includeUser).toBe(false);
    expect(config.includeProject).toBe(true);
  });

  it('resolves relative roots against the config file', () => {
    writeFileSync(join(projectDir, '.slashkit.json'), JSON.stringify({ roots: ['.', '../shared'] }));
    expect(loadConfigFile(join(projectDir, '.slashkit.json'))?.roots).toEqual([projectDir, join(base, 'shared')]);
  });

  it('rejects unknown keys and bad values', () => {
    const path = join(projectDir, '.slashkit.json');

    writeFileSync(path, JSON.stringify({ colour: 'red' }));
    expect(() => loadConfigFile(path)).toThrow(ConfigError);

    writeFileSync(path, JSON.stringify({ rules: { 'empty-body': 'loud' } }));
    expect(() => loadConfigFile(path)).toThrow(/rules\.empty-body/);

    writeFileSync(path, '{ not json');
    expect(() => loadConfigFile(path)).toThrow(/^Invalid configuration in /);
  });

  it('reads roots and the shell timeout from the environment', () => {
    vi.stubEnv('SLASHKIT_ROOTS', ['one', ' ', 'two'].join(delimiter));
    vi.stubEnv('SLASHKIT_SHELL_TIMEOUT_MS', '2500');

    expect(loadEnvConfig(projectDir)).toEqual({
      roots: [join(projectDir, 'one'), join(projectDir, 'two')],
      shellTimeoutMs: 2500,
    });
  });

  it('ignores an invalid timeout', () => {
    vi.stubEnv('SLASHKIT_SHELL_TIMEOUT_MS', 'soon');
    expect(loadEnvConfig(projectDir)).toEqual({});
  });

  it('merges lists by replacement', () => {
    const merged = mergeConfig({ ...DEFAULT_CONFIG, roots: ['/a'] }, { roots: ['/b'] });
    expect(merged.roots).toEqual(['/b']);
    expect(merged.shellTimeoutMs).toBe(DEFAULT_CONFIG.shellTimeoutMs);
  });

  describe('resolveRoots', () => {
    it('orders explicit, configured, project and user roots', () => {
      const config = { ...DEFAULT_CONFIG, roots: [join(base, 'configured')] };

      expect(resolveRoots(config, projectDir, ['extra'])).toEqual([
        { path: join(projectDir, 'extra'), scope: 'corpus' },
        { path: join(base, 'configured'), scope: 'corpus' },
        { path: join(projectDir, '.claude'), scope: 'project' },
        { path: userDir, scope: 'user' },
      ]);
    });

    it('drops duplicates and disabled scopes', () => {
      const config = { ...DEFAULT_CONFIG, roots: [projectDir], includeUser: false };

      expect(resolveRoots(config, projectDir, ['.'])).toEqual([
        { path: projectDir, scope: 'corpus' },
        { path: join(projectDir, '.claude'), scope: 'project' },
      ]);
    });
  });
});

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  extractFileReferences,
  extractShellDirectives,
  isToolAllowed,
  resolveFileReferences,
  resolveShellDirectives,
  type ShellRunner,
} from '../directives.js';

describe('extractShellDirectives', () => {
  it('finds each directive with its line', () => {
    const body = 'Status: !`git status`\n\nBranch: !` git branch --show-current `';
    expect(extractShellDirectives(body)).toEqual([
      { raw: '!`git status`', command: 'git status', line: 1 },
      { raw: '!` git branch --show-current `', command: 'git branch --show-current', line: 3 },
    ]);
  });

  it('ignores plain inline code', () => {
    expect(extractShellDirectives('Run `git status` yourself')).toEqual([]);
  });
});

describe('extractFileReferences', () => {
  it('finds references and trims trailing punctuation', () => {
    const body = 'See @src/index.ts, and @docs/.\nMail me@example.com\n(@README.md)';
    expect(extractFileReferences(body)).toEqual([
      { path: 'src/index.ts', line: 1 },
      { path: 'docs/', line: 1 },
      { path: 'README.md', line: 3 },
    ]);
  });

  it('reports a path once', () => {
    expect(extractFileReferences('@a.md and @a.md')).toEqual([{ path: 'a.md', line: 1 }]);
  });
});

describe('isToolAllowed', () => {
  it('allows any command for a bare tool', () => {
    expect(isToolAllowed(['Bash'], 'Bash', 'rm -rf build')).toBe(true);
    expect(isToolAllowed(['Bash(*)'], 'Bash', 'ls')).toBe(true);
  });

  it('matches word prefixes', () => {
    expect(isToolAllowed(['Bash(git:*)'], 'Bash', 'git status')).toBe(true);
    expect(isToolAllowed(['Bash(git:*)'], 'Bash', 'git')).toBe(true);
    expect(isToolAllowed(['Bash(git:*)'], 'Bash', 'gitk')).toBe(false);
    expect(isToolAllowed(['Bash(git log:*)'], 'Bash', 'git log --oneline')).toBe(true);
    expect(isToolAllowed(['Bash(git log:*)'], 'Bash', 'git status')).toBe(false);
    expect(isToolAllowed(['Bash(npm *)'], 'Bash', 'npm test')).toBe(true);
  });

  it('matches plain prefixes and exact commands', () => {
    expect(isToolAllowed(['Bash(npm run*)'], 'Bash', 'npm run build')).toBe(true);
    expect(isToolAllowed(['Bash(npm test)'], 'Bash', 'npm test')).toBe(true);
    expect(isToolAllowed(['Bash(npm test)'], 'Bash', 'npm test -- --watch')).toBe(false);
  });

  it('requires the tool to be listed', () => {
    expect(isToolAllowed(['Read', 'Grep'], 'Bash', 'ls')).toBe(false);
    expect(isToolAllowed(['Bash(git:*)'], 'Bash')).toBe(false);
  });
});

describe('resolveShellDirectives', () => {
  it('splices command output and reports failures', () => {
    const runShell = vi.fn<ShellRunner>((command) => {
      if (command === 'pwd') return '/work\n';
      throw new Error('boom');
    });

    const { text, results } = resolveShellDirectives('Dir: !`pwd`\nX: !`false`', {
      cwd: '/tmp',
      timeoutMs: 500,
      runShell,
    });

    expect(text).toBe('Dir: /work\nX: (command failed: boom)');
    expect(results.map((result) => result.ok)).toEqual([true, false]);
    expect(runShell).toHaveBeenCalledWith('pwd', { cwd: '/tmp', timeoutMs: 500 });
  });
});

describe('resolveFileReferences', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'slashkit-files-'));
    writeFileSync(join(dir, 'notes.txt'), 'hello\n');
    mkdirSync(join(dir, 'sub', 'a'), { recursive: true });
    writeFileSync(join(dir, 'sub', 'b.txt'), 'b');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('appends files and directory listings', () => {
    const { text, results } = resolveFileReferences('Read @notes.txt and @sub and @missing.md', { cwd: dir });

    expect(text).toBe(
      'Read @notes.txt and @sub and @missing.md\n\n' +
        '<file path="notes.txt">\nhello\n</file>\n\n' +
        '<file path="sub">\na/\nb.txt\n</file>\n',
    );
    expect(results.map((result) => [result.path, result.ok, result.error])).toEqual([
      ['notes.txt', true, undefined],
      ['sub', true, undefined],
      ['missing.md', false, 'not found'],
    ]);
  });

  it('leaves the body alone when nothing resolves', () => {
    const { text } = resolveFileReferences('Only @nowhere.md', { cwd: dir });
    expect(text).toBe('Only @nowhere.md');
  });
});

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadCommand, loadSkill } from '../../corpus/discovery.js';
import type { CorpusRoot } from '../../shared/types.js';
import { formatInvocation, renderDefinition, tryRenderDefinition } from '../render.js';

describe('rendering', () => {
  let dir: string;
  let root: CorpusRoot;

  function writeCommand(name: string, content: string) {
    const path = join(dir, 'commands', `${name}.md`);
    writeFileSync(path, content);
    return loadCommand(path, root);
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'slashkit-render-'));
    mkdirSync(join(dir, 'commands'), { recursive: true });
    root = { path: dir, scope: 'project' };
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('renderDefinition', () => {
    it('substitutes arguments without running directives by default', () => {
      const command = writeCommand(
        'fix',
        '---\ndescription: Fix an issue\nargument-hint: [issue]\n---\n\nFix issue $1 now.\nBranch: !`git branch --show-current`\n',
      );

      const result = renderDefinition(command, ['42'], { cwd: dir });

      expect(result.text).toBe('\nFix issue 42 now.\nBranch: !`git branch --show-current`\n');
      expect(result.unresolved).toEqual([]);
      expect(result.shell).toEqual([
        { raw: '!`git branch --show-current`', command: 'git branch --show-current', line: 3 },
      ]);
      expect(result.files).toEqual([]);
    });

    it('runs shell directives with the given runner', () => {
      const command = writeCommand('branch', '---\ndescription: Show branch\n---\nBranch: !`git branch --show-current`\n');
      const shellRunner = vi.fn(() => 'main\n');

      const result = renderDefinition(command, [], { cwd: dir, runShell: true, shellRunner, shellTimeoutMs: 1000 });

      expect(result.text).toBe('Branch: main\n');
      expect(shellRunner).toHaveBeenCalledWith('git branch --show-current', { cwd: dir, timeoutMs: 1000 });
    });

    it('never runs directive text that arrives in an argument', () => {
      const command = writeCommand('ask', '---\ndescription: Ask\nargument-hint: [question]\n---\nQ: $ARGUMENTS\n');
      const shellRunner = vi.fn(() => 'RAN');

      const result = renderDefinition(command, ['why !`rm -rf x`'], { cwd: dir, runShell: true, shellRunner });

      expect(shellRunner).not.toHaveBeenCalled();
      expect(result.text).toBe('Q: why !`rm -rf x`\n');
      expect(result.shell).toEqual([]);
    });

    it('runs a template directive as written, without inserting arguments', () => {
      const command = writeCommand(
        'log',
        '---\ndescription: Log\nargument-hint: [count]\n---\nShow $1: !`git log -n $1`\n',
      );
      const shellRunner = vi.fn(() => 'abc123\n');

      const result = renderDefinition(command, ['3'], { cwd: dir, runShell: true, shellRunner, shellTimeoutMs: 500 });

      expect(shellRunner).toHaveBeenCalledTimes(1);
      expect(shellRunner).toHaveBeenCalledWith('git log -n $1', { cwd: dir, timeoutMs: 500 });
      expect(result.text).toBe('Show 3: abc123\n');
    });

    it('does not read files referenced by an argument', () => {
      writeFileSync(join(dir, 'secret.txt'), 'hidden\n');
      const command = writeCommand('echo', '---\ndescription: Echo\nargument-hint: [text]\n---\nSay $1\n');

      const result = renderDefinition(command, ['@secret.txt'], { cwd: dir, resolveFiles: true });

      expect(result.text).toBe('Say @secret.txt\n');
      expect(result.files).toEqual([]);
    });

    it('inlines referenced files when asked', () => {
      writeFileSync(join(dir, 'notes.md'), 'remember this\n');
      const command = writeCommand('notes', '---\ndescription: Notes\n---\nUse @notes.md\n');

      const result = renderDefinition(command, [], { cwd: dir, resolveFiles: true });

      expect(result.text).toBe('Use @notes.md\n\n<file path="notes.md">\nremember this\n</file>\n');
    });

    it('reports unresolved placeholders', () => {
      const command = writeCommand('pair', '---\ndescription: Pair\nargument-hint: "[a] [b]"\n---\n$1 and $2\n');
      expect(renderDefinition(command, 'only').unresolved).toEqual(['$2']);
    });
  });

  describe('tryRenderDefinition', () => {
    it('wraps a successful render', () => {
      const command = writeCommand('hello', '---\ndescription: Hello\n---\nHi $ARGUMENTS\n');
      const outcome = tryRenderDefinition(command, 'there');

      expect(outcome.success).toBe(true);
      if (outcome.success) {
        expect(outcome.result.text).toBe('Hi there\n');
      }
    });
  });

  describe('formatInvocation', () => {
    it('prints a metadata header before the rendered body', () => {
      const command = writeCommand(
        'fix',
        '---\ndescription: Fix an issue\nargument-hint: [issue]\nmodel: sonnet\n---\n\nFix issue $1 now.\n',
      );

      expect(formatInvocation(command, ['42'])).toBe(
        '<command-name>/fix</command-name>\n\n' +
          '**Description**: Fix an issue\n\n' +
          '**Arguments**: 42\n\n' +
          '**Model**: sonnet\n\n' +
          '**Scope**: project\n\n' +
          '---\n\n' +
          'Fix issue 42 now.',
      );
    });

    it('appends arguments as a user request when the body has no placeholders', () => {
      const command = writeCommand('tidy', '---\ndescription: Tidy up\n---\nDo the thing.\n');

      const output = formatInvocation(command, 'make it fast');

      expect(output.endsWith('Do the thing.\n\n\n---\n\n## User Request\n\nmake it fast')).toBe(true);
    });

    it('reuses an already rendered body instead of running directives again', () => {
      const command = writeCommand('branch', '---\ndescription: Show branch\n---\nBranch: !`git branch --show-current`\n');
      const shellRunner = vi.fn(() => 'main\n');
      const options = { cwd: dir, runShell: true, shellRunner };

      const rendered = renderDefinition(command, [], options);
      const output = formatInvocation(command, [], { ...options, rendered });

      expect(shellRunner).toHaveBeenCalledTimes(1);
      expect(output.endsWith('---\n\nBranch: main')).toBe(true);
    });

    it('omits the arguments line when there are none', () => {
      const command = writeCommand('plain', '---\ndescription: Plain\n---\nBody\n');
      expect(formatInvocation(command, '')).toBe(
        '<command-name>/plain</command-name>\n\n**Description**: Plain\n\n**Scope**: project\n\n---\n\nBody',
      );
    });

    it('warns when a deprecated skill alias is used', () => {
      const skillDir = join(dir, 'skills', 'new-name');
      mkdirSync(skillDir, { recursive: true });
      writeFileSync(
        join(skillDir, 'SKILL.md'),
        '---\nname: new-name\ndescription: Renamed skill\naliases: [old-name]\n---\nGuide\n',
      );
      const [, alias] = loadSkill(join(skillDir, 'SKILL.md'), root);

      expect(formatInvocation(alias, '')).toContain(
        '⚠️ **Deprecated Alias**: `/old-name` is deprecated and will be removed in a future release. Use `/new-name` instead.',
      );
    });
  });
});

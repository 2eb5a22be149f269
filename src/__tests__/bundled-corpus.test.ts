import { describe, it, expect } from 'vitest';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { discoverCorpus, listDefinitions } from '../corpus/discovery.js';
import { lintCorpus, summarize } from '../lint/index.js';
import { findPlaceholders, parseArgumentHint } from '../template/arguments.js';

const repoRoot = join(dirname(fileURLToPath(import.meta.url)), '..', '..');
const corpus = discoverCorpus({ roots: [{ path: repoRoot, scope: 'corpus' }] });

describe('bundled corpus', () => {
  it('ships the expected commands, agents and skills', () => {
    const names = listDefinitions(corpus).map((entry) => `${entry.kind}:${entry.name}`);

    expect(names).toEqual([
      'command:ask',
      'command:changelog',
      'command:commit-push-pr',
      'command:debug',
      'command:diagnose',
      'command:generate-epic',
      'skill:frontend-design',
      'skill:slash-command-creator',
      'skill:temporal-workflows',
      'agent:bug-fixer',
      'agent:research-agent',
    ]);
  });

  it('lints without findings', () => {
    const diagnostics = lintCorpus(corpus);
    expect(diagnostics).toEqual([]);
    expect(summarize(diagnostics).errors).toBe(0);
  });

  it('declares a hint for every positional placeholder', () => {
    for (const command of corpus.commands) {
      const { maxPositional } = findPlaceholders(command.body);
      expect(parseArgumentHint(command.metadata.argumentHint).length, command.name).toBeGreaterThanOrEqual(
        maxPositional,
      );
    }
  });

  it('points command agents at bundled agents', () => {
    const agentNames = corpus.agents.map((agent) => agent.name);
    for (const command of corpus.commands) {
      if (command.metadata.agent) {
        expect(agentNames).toContain(command.metadata.agent);
      }
    }
  });
});

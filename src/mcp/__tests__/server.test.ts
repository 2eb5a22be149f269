import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { discoverCorpus, loadCommand } from '../../corpus/discovery.js';
import type { CommandDefinition, Corpus } from '../../shared/types.js';
import { collectPromptArguments, createPromptServer, promptArgumentShape } from '../server.js';

describe('MCP prompt server', () => {
  let dir: string;
  let corpus: Corpus;
  let server: McpServer;
  let client: Client;

  function write(relativePath: string, content: string): void {
    const path = join(dir, relativePath);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content);
  }

  function command(name: string): CommandDefinition {
    const found = corpus.commands.find((entry) => entry.name === name);
    if (!found) throw new Error(`missing fixture ${name}`);
    return found;
  }

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'slashkit-mcp-'));
    write('commands/fix.md', '---\ndescription: Fix an issue\nargument-hint: "[issue] [area]"\n---\nFix $1 in $2\n');
    write('commands/ask.md', '---\ndescription: Ask\nargument-hint: [question]\n---\nQ: $ARGUMENTS\n');
    write('skills/guide/SKILL.md', '---\nname: guide\ndescription: A guide\naliases: [old-guide]\n---\nFollow the guide.\n');
    write('agents/helper.md', '---\nname: helper\ndescription: Helps\n---\nYou help.\n');

    corpus = discoverCorpus({ roots: [{ path: dir, scope: 'corpus' }] });
    server = createPromptServer(corpus, { version: '1.0.0', cwd: dir });
    client = new Client({ name: 'test-client', version: '1.0.0' });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it('identifies itself as slashkit', () => {
    expect(client.getServerVersion()).toEqual({ name: 'slashkit', version: '1.0.0' });
  });

  it('lists commands and canonical skills, not agents or aliases', async () => {
    const { prompts } = await client.listPrompts();
    expect(prompts.map((prompt) => prompt.name)).toEqual(['ask', 'fix', 'skill:guide']);
    expect(prompts.find((prompt) => prompt.name === 'fix')?.description).toBe('Fix an issue');
  });

  it('describes positional arguments from the hint', async () => {
    const { prompts } = await client.listPrompts();
    const fix = prompts.find((prompt) => prompt.name === 'fix');

    expect(fix?.arguments?.map((argument) => [argument.name, argument.description, argument.required])).toEqual([
      ['arg1', 'issue', false],
      ['arg2', 'area', false],
    ]);
  });

  it('renders a command with positional arguments', async () => {
    const result = await client.getPrompt({ name: 'fix', arguments: { arg1: '42', arg2: 'parser' } });

    expect(result.messages).toHaveLength(1);
    expect(result.messages[0].role).toBe('user');
    expect(result.messages[0].content).toEqual({
      type: 'text',
      text:
        '<command-name>/fix</command-name>\n\n**Description**: Fix an issue\n\n**Arguments**: 42 parser\n\n' +
        '**Scope**: corpus\n\n---\n\nFix 42 in parser',
    });
  });

  it('fills a later positional argument when an earlier one is omitted', async () => {
    const result = await client.getPrompt({ name: 'fix', arguments: { arg2: 'parser' } });

    expect(result.messages[0].content).toEqual({
      type: 'text',
      text:
        '<command-name>/fix</command-name>\n\n**Description**: Fix an issue\n\n**Arguments**: parser\n\n' +
        '**Scope**: corpus\n\n---\n\nFix $1 in parser',
    });
  });

  it('passes free-form arguments through $ARGUMENTS', async () => {
    const result = await client.getPrompt({ name: 'ask', arguments: { arguments: 'why is it slow' } });

    expect(result.messages[0].content).toEqual({
      type: 'text',
      text:
        '<command-name>/ask</command-name>\n\n**Description**: Ask\n\n**Arguments**: why is it slow\n\n' +
        '**Scope**: corpus\n\n---\n\nQ: why is it slow',
    });
  });

  it('serves skills under a prefixed name', async () => {
    const result = await client.getPrompt({ name: 'skill:guide', arguments: {} });
    const [message] = result.messages;

    expect(message.content).toEqual({
      type: 'text',
      text: '<command-name>/guide</command-name>\n\n**Description**: A guide\n\n**Scope**: corpus\n\n---\n\nFollow the guide.',
    });
  });

  describe('argument helpers', () => {
    it('builds a shape with $ARGUMENTS and positional fields', () => {
      expect(Object.keys(promptArgumentShape(command('fix')))).toEqual(['arg1', 'arg2']);
      expect(Object.keys(promptArgumentShape(command('ask')))).toEqual(['arguments']);
    });

    it('registers only the positions a body uses', () => {
      write('commands/spend.md', '---\ndescription: Spend\nargument-hint: [amount]\n---\nSpend $1 of $20000000\n');
      const spend = loadCommand(join(dir, 'commands', 'spend.md'), { path: dir, scope: 'corpus' });

      expect(Object.keys(promptArgumentShape(spend))).toEqual(['arg1', 'arg20000000']);
    });

    it('keeps positional values by index', () => {
      expect(collectPromptArguments(command('fix'), { arg1: 'a', arg2: 'b' })).toEqual(
        new Map([
          [1, 'a'],
          [2, 'b'],
        ]),
      );
      expect(collectPromptArguments(command('fix'), { arg1: 'a', arg2: '' })).toEqual(new Map([[1, 'a']]));
      expect(collectPromptArguments(command('fix'), { arg2: 'parser' })).toEqual(new Map([[2, 'parser']]));
      expect(collectPromptArguments(command('fix'), { arguments: 'x y' })).toBe('x y');
      expect(collectPromptArguments(command('ask'), {})).toBe('');
    });
  });
});

/**
 * MCP Server - exposes the corpus' commands and skills as MCP prompts.
 *
 * Uses @modelcontextprotocol/sdk with stdio transport. Each prompt takes
 * an optional `arguments` string (for $ARGUMENTS) and `arg1`..`argN`
 * (for $1..$N).
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import type { CommandDefinition, Corpus, SkillDefinition } from '../shared/types.js';
import { findPlaceholders, parseArgumentHint } from '../template/arguments.js';
import { formatInvocation } from '../template/render.js';
import { debugLog } from '../utils/debug.js';

const SERVER_NAME = 'slashkit';

type PromptDefinition = CommandDefinition | SkillDefinition;
type PromptArgs = Record<string, string | undefined>;

/**
 * zod shape of the arguments a prompt accepts
 */
export function promptArgumentShape(definition: PromptDefinition): Record<string, z.ZodOptional<z.ZodString>> {
  const usage = findPlaceholders(definition.body);
  const hintNames = parseArgumentHint(definition.metadata.argumentHint);
  const shape: Record<string, z.ZodOptional<z.ZodString>> = {};

  if (usage.usesArguments) {
    const hint = definition.metadata.argumentHint;
    shape.arguments = z
      .string()
      .optional()
      .describe(hint ? `Arguments ${hint}` : 'Free-form arguments');
  }

  for (const index of usage.positional) {
    shape[`arg${index}`] = z
      .string()
      .optional()
      .describe(hintNames[index - 1] ?? `Positional argument $${index}`);
  }

  return shape;
}

/**
 * Rebuild the arguments from prompt arguments. Positional values are kept
 * by index, so `arg2` alone fills `$2` and leaves `$1` as written; without
 * any, the `arguments` value is passed as the raw argument string.
 */
export function collectPromptArguments(
  definition: PromptDefinition,
  args: PromptArgs,
): string | ReadonlyMap<number, string> {
  const positional = new Map<number, string>();

  for (const index of findPlaceholders(definition.body).positional) {
    const value = args[`arg${index}`];
    if (value === undefined || value === '') continue;
    positional.set(index, value);
  }

  if (positional.size > 0) {
    return positional;
  }
  return args.arguments ?? '';
}

function promptName(definition: PromptDefinition): string {
  return definition.kind === 'skill' ? `skill:${definition.name}` : definition.name;
}

/**
 * Build a server registering one prompt per command and non-alias skill.
 */
export function createPromptServer(corpus: Corpus, options: { version?: string; cwd?: string } = {}): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: options.version ?? '0.0.0',
  });

  const definitions: PromptDefinition[] = [
    ...corpus.commands,
    ...corpus.skills.filter((skill) => !skill.metadata.aliasOf),
  ];

  for (const definition of definitions) {
    const name = promptName(definition);
    const description = definition.metadata.description || `/${definition.name}`;

    server.prompt(name, description, promptArgumentShape(definition), (args: PromptArgs) => ({
      description,
      messages: [
        {
          role: 'user' as const,
          content: {
            type: 'text' as const,
            text: formatInvocation(definition, collectPromptArguments(definition, args), {
              cwd: options.cwd,
            }),
          },
        },
      ],
    }));
    debugLog('mcp', `registered prompt ${name}`);
  }

  return server;
}

/**
 * Serve the corpus over stdio until the client disconnects.
 */
export async function startPromptServer(corpus: Corpus, options: { version?: string; cwd?: string } = {}): Promise<void> {
  const server = createPromptServer(corpus, options);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

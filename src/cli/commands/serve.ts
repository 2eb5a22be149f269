import { startPromptServer } from '../../mcp/server.js';
import { getRuntimePackageVersion } from '../../lib/version.js';
import type { CliContext } from '../context.js';

/**
 * Serve the corpus as MCP prompts over stdio. Nothing may be written to
 * stdout here; it carries the protocol.
 */
export async function serveCommand(context: CliContext): Promise<void> {
  console.error(
    `slashkit MCP server: ${context.corpus.commands.length} commands, ${context.corpus.skills.length} skills`,
  );
  await startPromptServer(context.corpus, {
    version: getRuntimePackageVersion(),
    cwd: context.cwd,
  });
}

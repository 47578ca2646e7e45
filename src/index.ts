/**
 * src/index.ts: stdio MCP server over SpotifyClient.
 *
 * Reads SPOTIFY_ACCESS_TOKEN (and the optional SPOTIFY_* settings, see
 * .env.example) from the environment, builds one client and serves the tools
 * from src/tools/tools.ts on stdin/stdout.
 *
 * stdout carries the MCP protocol, so all diagnostics go to stderr.
 */

import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { SpotifyClient } from './client/SpotifyClient.js';
import { loadConfig } from './config.js';
import { createTools } from './tools/tools.js';

async function main() {
  const options = loadConfig();
  const client = new SpotifyClient(options);

  const server = createTools(client);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  const scopes = options.scopes ? options.scopes.join(' ') || '(none)' : '(unchecked)';
  console.error(`Spotify MCP server running on stdio. Scopes: ${scopes}. Bulk requests: ${options.allowBulkRequests ? 'on' : 'off'}`);

  process.on('SIGINT', () => {
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Error while closing MCP server:', error);
        process.exit(1);
      },
    );
  });
}

main().catch((error: unknown) => {
  console.error('MCP server failed to start:', error instanceof Error ? error.message : error);
  process.exit(1);
});

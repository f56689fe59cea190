import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getSearchClient } from '../client-context.js';
import { runTool } from '../tool-response.js';

export function registerCheckConnectionTool(server: McpServer): void {
  server.registerTool(
    'check_connection',
    {
      description: 'Check whether the Weaviate cluster responds. Returns {"ready": true|false}.',
      inputSchema: {},
    },
    async () =>
      runTool('check_connection', 'Failed to reach Weaviate', () =>
        getSearchClient().checkConnection()
      )
  );
}

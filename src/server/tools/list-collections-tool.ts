import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getSearchClient } from '../client-context.js';
import { runTool } from '../tool-response.js';

export function registerListCollectionsTool(server: McpServer): void {
  server.registerTool(
    'list_collections',
    {
      description:
        'List existing collections (classes) in the Weaviate cluster, sorted by name. ' +
        'Use get_schema to inspect the properties of one collection.',
      inputSchema: {},
    },
    async () =>
      runTool('list_collections', 'Failed to list collections', () =>
        getSearchClient().listCollections()
      )
  );
}

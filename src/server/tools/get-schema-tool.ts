import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { getSearchClient } from '../client-context.js';
import { runTool } from '../tool-response.js';

export function registerGetSchemaTool(server: McpServer): void {
  server.registerTool(
    'get_schema',
    {
      description:
        'Get the schema/config of a collection: properties, vectorizer and index settings. ' +
        'Returns {"error": "Collection \'<name>\' not found"} for unknown collections.',
      inputSchema: {
        collection: z.string().min(1).describe('Collection name, e.g. "Sinde".'),
      },
    },
    async ({ collection }) =>
      runTool('get_schema', 'Failed to get collection schema', () =>
        getSearchClient().getSchema(collection)
      )
  );
}

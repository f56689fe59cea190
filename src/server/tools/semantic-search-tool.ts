import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { DEFAULT_LIMIT } from '../../constants.js';
import { getSearchClient } from '../client-context.js';
import { runTool } from '../tool-response.js';
import { collectionField, limitField, queryField } from './search-input.js';

export function registerSemanticSearchTool(server: McpServer): void {
  server.registerTool(
    'semantic_search',
    {
      description:
        'Semantic (vector) search via near-text. Requires a vectorized collection. ' +
        'Each result carries uuid, properties and distance (lower is closer).',
      inputSchema: {
        collection: collectionField,
        query: queryField,
        limit: limitField,
      },
    },
    async (params) =>
      runTool('semantic_search', 'Semantic search failed', () =>
        getSearchClient().semanticSearch({
          collection: params.collection,
          query: params.query,
          limit: params.limit ?? DEFAULT_LIMIT,
        })
      )
  );
}

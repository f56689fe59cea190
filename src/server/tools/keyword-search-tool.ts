import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { DEFAULT_LIMIT } from '../../constants.js';
import { getSearchClient } from '../client-context.js';
import { runTool } from '../tool-response.js';
import { collectionField, limitField, queryField } from './search-input.js';

/** Register the keyword_search tool (BM25F) on the MCP server. */
export function registerKeywordSearchTool(server: McpServer): void {
  server.registerTool(
    'keyword_search',
    {
      description:
        'Keyword search (BM25F) in a collection. Use for exact terms, codes or names. ' +
        'Each result carries uuid, properties and bm25_score.',
      inputSchema: {
        collection: collectionField,
        query: queryField,
        limit: limitField,
      },
    },
    async (params) =>
      runTool('keyword_search', 'Keyword search failed', () =>
        getSearchClient().keywordSearch({
          collection: params.collection,
          query: params.query,
          limit: params.limit ?? DEFAULT_LIMIT,
        })
      )
  );
}

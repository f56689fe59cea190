import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { DEFAULT_ALPHA, DEFAULT_LIMIT } from '../../constants.js';
import { getSearchClient } from '../client-context.js';
import { requireImage } from '../image-lookup.js';
import { runTool } from '../tool-response.js';
import {
  alphaField,
  collectionField,
  imageIdField,
  limitField,
  queryField,
} from './search-input.js';

export function registerHybridSearchTool(server: McpServer): void {
  server.registerTool(
    'hybrid_search',
    {
      description:
        'Hybrid search (BM25 + vector) in a collection. alpha: 0 = BM25 only, 1 = vector only. ' +
        'Pass image_id (from upload_image) to also search by image; results of both searches are merged by uuid. ' +
        'With image_id, query may be empty for a pure image search. ' +
        'Each result carries uuid, properties, bm25_score and distance.',
      inputSchema: {
        collection: collectionField,
        query: queryField,
        alpha: alphaField,
        limit: limitField,
        query_properties: z
          .array(z.string())
          .optional()
          .describe('Optional properties to run the keyword part against, e.g. ["name", "text"].'),
        image_id: imageIdField.optional(),
      },
    },
    async (params) =>
      runTool('hybrid_search', 'Hybrid search failed', () => {
        const image = params.image_id ? requireImage(params.image_id) : undefined;
        return getSearchClient().hybridSearch({
          collection: params.collection,
          query: params.query,
          alpha: params.alpha ?? DEFAULT_ALPHA,
          limit: params.limit ?? DEFAULT_LIMIT,
          queryProperties: params.query_properties,
          imageBase64: image?.base64,
        });
      })
  );
}

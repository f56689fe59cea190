import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  DEFAULT_ALPHA,
  DEFAULT_COLLECTION,
  DEFAULT_LIMIT,
  DISPLAY_FIELDS,
  NOT_FOUND_MESSAGE,
} from '../../constants.js';
import type { DisplayRow } from '../../types.js';
import { isCollectionNotFound } from '../../weaviate-client.js';
import { getSearchClient } from '../client-context.js';
import { requireImage } from '../image-lookup.js';
import { renderResultTable, toDisplayRow } from '../result-table.js';
import { searchWithRetry, type SearchAttempt } from '../search-retry.js';
import { getToolErrorMessage, logToolError } from '../tool-error.js';
import { jsonErrorResponse, jsonResponse } from '../tool-response.js';
import { alphaField, imageIdField, limitField } from './search-input.js';

export interface SearchDocumentsResponse {
  status: 'success' | 'not_found' | 'error';
  collection?: string;
  attempts?: SearchAttempt[];
  result_count?: number;
  rows?: DisplayRow[];
  table?: string;
  message?: string;
}

export interface SearchDocumentsParams {
  query: string;
  limit: number;
  alpha: number;
  fallback_query?: string;
  image_id?: string;
}

class MissingCollectionError extends Error {}

export async function executeSearchDocuments(
  params: SearchDocumentsParams
): Promise<SearchDocumentsResponse> {
  const query = params.query.trim();
  const image = params.image_id ? requireImage(params.image_id) : undefined;
  if (!query && !image) {
    return { status: 'error', message: 'query cannot be empty' };
  }

  const client = getSearchClient();
  const runSearch = async (text: string): Promise<DisplayRow[]> => {
    const result = await client.hybridSearch({
      collection: DEFAULT_COLLECTION,
      query: text,
      alpha: params.alpha,
      limit: params.limit,
      returnProperties: [...DISPLAY_FIELDS],
      imageBase64: image?.base64,
    });
    if (isCollectionNotFound(result)) {
      throw new MissingCollectionError(result.error);
    }
    return result.results.map((row) => toDisplayRow(row.properties));
  };

  // An image-only search has no wording to change, so it gets a single attempt.
  const { attempts, rows } = query
    ? await searchWithRetry(query, runSearch, params.fallback_query)
    : await runSearch('').then((found) => ({
        attempts: [{ query: '', result_count: found.length }],
        rows: found,
      }));

  if (rows.length === 0) {
    return {
      status: 'not_found',
      collection: DEFAULT_COLLECTION,
      attempts,
      result_count: 0,
      rows: [],
      message: NOT_FOUND_MESSAGE,
    };
  }

  return {
    status: 'success',
    collection: DEFAULT_COLLECTION,
    attempts,
    result_count: rows.length,
    rows,
    table: renderResultTable(rows),
  };
}

export function registerSearchDocumentsTool(server: McpServer): void {
  server.registerTool(
    'search_documents',
    {
      description:
        `Answer a user question from the ${DEFAULT_COLLECTION} collection. ` +
        `Runs hybrid_search on "${DEFAULT_COLLECTION}" and returns rows with ${DISPLAY_FIELDS.join(', ')} plus a Markdown table to show the user. ` +
        'When nothing matches it retries once with a reworded query (fallback_query, or the query reduced to keywords); ' +
        'if still empty it returns status "not_found". Report that no information was found; do not invent an answer.',
      inputSchema: {
        query: z.string().describe('The user question or search terms.'),
        limit: limitField,
        alpha: alphaField,
        fallback_query: z
          .string()
          .optional()
          .describe('Optional rewording to use if the first search finds nothing.'),
        image_id: imageIdField.optional(),
      },
    },
    async (params) => {
      try {
        const response = await executeSearchDocuments({
          query: params.query,
          limit: params.limit ?? DEFAULT_LIMIT,
          alpha: params.alpha ?? DEFAULT_ALPHA,
          fallback_query: params.fallback_query,
          image_id: params.image_id,
        });
        if (response.status === 'error') {
          return jsonErrorResponse(response);
        }
        return jsonResponse(response);
      } catch (error) {
        if (error instanceof MissingCollectionError) {
          return jsonErrorResponse({ status: 'error', message: error.message });
        }
        logToolError('search_documents', error);
        const response: SearchDocumentsResponse = {
          status: 'error',
          message: getToolErrorMessage(error, 'Document search failed'),
        };
        return jsonErrorResponse(response);
      }
    }
  );
}

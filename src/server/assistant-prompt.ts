/**
 * The assistant usage contract as an MCP prompt.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  DEFAULT_COLLECTION,
  DISPLAY_FIELDS,
  MAX_SEARCH_ATTEMPTS,
  NOT_FOUND_MESSAGE,
} from '../constants.js';

export const ASSISTANT_PROMPT_NAME = 'sinde_assistant';

export function buildAssistantPrompt(question: string): string {
  return [
    `You answer questions using only the Weaviate collection "${DEFAULT_COLLECTION}".`,
    '',
    'Rules:',
    `1. Search with search_documents, or hybrid_search with collection "${DEFAULT_COLLECTION}". Never use another collection.`,
    `2. Show results as a table with exactly these columns: ${DISPLAY_FIELDS.join(', ')}.`,
    `3. Make at most ${MAX_SEARCH_ATTEMPTS} search attempts per question. If the first returns nothing, retry once with a reworded query.`,
    `4. If the results are still empty, answer: "${NOT_FOUND_MESSAGE}" Do not invent information.`,
    '5. For an image, call upload_image with image_url (or use POST /upload-image) and search with the returned image_id. Do not send image_b64 when a URL or the upload endpoint is available.',
    '',
    `Question: ${question.trim()}`,
  ].join('\n');
}

export function registerAssistantPrompt(server: McpServer): void {
  server.registerPrompt(
    ASSISTANT_PROMPT_NAME,
    {
      title: `${DEFAULT_COLLECTION} assistant`,
      description: `Instructions for answering a question from the ${DEFAULT_COLLECTION} collection.`,
      argsSchema: {
        question: z.string().describe('The user question.'),
      },
    },
    ({ question }) => ({
      messages: [
        {
          role: 'user',
          content: { type: 'text', text: buildAssistantPrompt(question) },
        },
      ],
    })
  );
}

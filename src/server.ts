/**
 * Weaviate MCP Server
 *
 * Builds an MCP server exposing keyword, semantic and hybrid search over a Weaviate
 * cluster, image upload for image-based search, cluster inspection tools, and the
 * assistant prompt for the Sinde collection.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SERVER_INSTRUCTIONS, SERVER_NAME, SERVER_VERSION } from './constants.js';
import { registerAssistantPrompt } from './server/assistant-prompt.js';
import { registerCheckConnectionTool } from './server/tools/check-connection-tool.js';
import { registerGetConfigTool } from './server/tools/get-config-tool.js';
import { registerGetSchemaTool } from './server/tools/get-schema-tool.js';
import { registerHybridSearchTool } from './server/tools/hybrid-search-tool.js';
import { registerKeywordSearchTool } from './server/tools/keyword-search-tool.js';
import { registerListCollectionsTool } from './server/tools/list-collections-tool.js';
import { registerSearchDocumentsTool } from './server/tools/search-documents-tool.js';
import { registerSemanticSearchTool } from './server/tools/semantic-search-tool.js';
import { registerUploadImageTool } from './server/tools/upload-image-tool.js';

export { setServerContext } from './server/client-context.js';

export function setupServer(): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      instructions: SERVER_INSTRUCTIONS,
    }
  );

  registerGetConfigTool(server);
  registerCheckConnectionTool(server);
  registerListCollectionsTool(server);
  registerGetSchemaTool(server);
  registerKeywordSearchTool(server);
  registerSemanticSearchTool(server);
  registerHybridSearchTool(server);
  registerUploadImageTool(server);
  registerSearchDocumentsTool(server);
  registerAssistantPrompt(server);

  return server;
}

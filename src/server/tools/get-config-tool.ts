import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerConfig } from '../../config.js';
import { DEFAULT_COLLECTION } from '../../constants.js';
import { resolveVertexAuthMode } from '../../vertex-auth.js';
import { getServerContext } from '../client-context.js';
import { runTool } from '../tool-response.js';

/** Current configuration with every secret reduced to a "set" flag. */
export function describeConfig(config: ServerConfig) {
  return {
    weaviate_url: config.weaviateUrl ?? null,
    weaviate_api_key_set: Boolean(config.weaviateApiKey),
    openai_api_key_set: Boolean(config.openaiApiKey),
    cohere_api_key_set: Boolean(config.cohereApiKey),
    vertex_auth_mode: resolveVertexAuthMode(config.vertex),
    mcp_path: config.mcpPath,
    default_collection: DEFAULT_COLLECTION,
  };
}

export function registerGetConfigTool(server: McpServer): void {
  server.registerTool(
    'get_config',
    {
      description:
        'Show the current server configuration. Sensitive values are never returned; ' +
        'API keys are reported only as set/not set.',
      inputSchema: {},
    },
    async () =>
      runTool('get_config', 'Failed to read configuration', async () =>
        describeConfig(getServerContext().config)
      )
  );
}

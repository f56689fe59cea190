#!/usr/bin/env node

/**
 * Weaviate MCP CLI
 *
 * Entry point for the Weaviate MCP server. Serves MCP over Streamable HTTP (default,
 * with /health and /upload-image) or over stdio for local clients.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import * as dotenv from 'dotenv';
import { loadConfig, type ConfigOverrides, type ServerConfig } from './config.js';
import { DEFAULT_HOST, DEFAULT_MCP_PATH, DEFAULT_PORT } from './constants.js';
import { buildHttpApp } from './http-app.js';
import { ImageStore } from './image-store.js';
import { error as logError, info as logInfo, setLogLevel, warn as logWarn } from './logger.js';
import { setServerContext, setupServer } from './server.js';
import type { ServerContext } from './server/client-context.js';
import { VertexAuth } from './vertex-auth.js';
import { WeaviateSearchClient } from './weaviate-client.js';

// Load environment variables
dotenv.config();

function parseArgs(argv: string[]): ConfigOverrides {
  const options: ConfigOverrides = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const nextArg = argv[i + 1];

    switch (arg) {
      case '--transport':
        options.transport = nextArg;
        i++;
        break;
      case '--host':
        options.host = nextArg;
        i++;
        break;
      case '--port':
        options.port = nextArg;
        i++;
        break;
      case '--mcp-path':
        options.mcpPath = nextArg;
        i++;
        break;
      case '--log-level':
        options.logLevel = nextArg;
        i++;
        break;
      case '--help':
      case '-h':
        printHelp();
        process.exit(0);
        break;
    }
  }

  return options;
}

function printHelp(): void {
  console.log(`
Weaviate MCP Server

Usage: weaviate-mcp-server [options]

Options:
  --transport TEXT      http or stdio [default: http]
  --host TEXT           HTTP bind address [default: ${DEFAULT_HOST}]
  --port NUMBER         HTTP port [default: ${DEFAULT_PORT}]
  --mcp-path TEXT       MCP endpoint path [default: ${DEFAULT_MCP_PATH}]
  --log-level TEXT      DEBUG, INFO, WARN or ERROR [default: INFO]
  --help, -h            Show this help message

Environment Variables:
  WEAVIATE_CLUSTER_URL / WEAVIATE_URL   Weaviate Cloud cluster URL
  WEAVIATE_API_KEY                      Weaviate API key
  MCP_PATH, PORT, HOST, MCP_TRANSPORT   HTTP settings
  VERTEX_APIKEY                         Vertex AI key for the multimodal vectorizer
  VERTEX_BEARER_TOKEN                   Static Vertex AI access token
  VERTEX_USE_OAUTH                      Fetch Vertex tokens with a service account
  GOOGLE_APPLICATION_CREDENTIALS_JSON   Inline service account JSON
  VERTEX_SA_PATH                        Service account key file
  GOOGLE_APPLICATION_CREDENTIALS        Service account key file (fallback)
  OPENAI_API_KEY, COHERE_API_KEY        Forwarded to Weaviate vectorizer modules
  WEAVIATE_MCP_LOG_LEVEL / LOG_LEVEL    Logging level

Examples:
  # HTTP server on the default port, MCP at /mcp/
  WEAVIATE_URL=https://example.weaviate.cloud WEAVIATE_API_KEY=... weaviate-mcp-server

  # Local client over stdio
  weaviate-mcp-server --transport stdio
`);
}

function createContext(config: ServerConfig): ServerContext {
  return {
    config,
    images: new ImageStore(),
    client: new WeaviateSearchClient({
      clusterUrl: config.weaviateUrl,
      apiKey: config.weaviateApiKey,
      openaiApiKey: config.openaiApiKey,
      cohereApiKey: config.cohereApiKey,
      vertexAuth: new VertexAuth(config.vertex),
    }),
  };
}

async function main(): Promise<void> {
  try {
    const config = loadConfig(process.env, parseArgs(process.argv.slice(2)));
    setLogLevel(config.logLevel);
    setServerContext(createContext(config));

    if (!config.weaviateUrl || !config.weaviateApiKey) {
      logWarn(
        'WEAVIATE_URL/WEAVIATE_CLUSTER_URL or WEAVIATE_API_KEY is not set; tools will fail until configured'
      );
    }

    if (config.transport === 'stdio') {
      const server = setupServer();
      await server.connect(new StdioServerTransport());
      logInfo('Weaviate MCP server running on stdio');
      process.on('SIGINT', () => process.exit(0));
      process.on('SIGTERM', () => process.exit(0));
      return;
    }

    const app = await buildHttpApp({ mcpPath: config.mcpPath });
    await app.listen({ host: config.host, port: config.port });
    logInfo(`Weaviate MCP server listening on http://${config.host}:${config.port}${config.mcpPath}`);

    const shutdown = (signal: string) => {
      logInfo(`Received ${signal}, shutting down`);
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logError('Error during shutdown', err);
          process.exit(1);
        }
      );
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    logError('Fatal error in main()', error);
    process.exit(1);
  }
}

void main();

import type { ServerConfig } from '../config.js';
import type { ImageStore } from '../image-store.js';
import type { WeaviateSearchClient } from '../weaviate-client.js';

/** Everything the MCP tools and HTTP routes share within one process. */
export interface ServerContext {
  client: WeaviateSearchClient;
  images: ImageStore;
  config: ServerConfig;
}

let serverContext: ServerContext | null = null;

/** Return the shared context; throws if setServerContext has not been called. */
export function getServerContext(): ServerContext {
  if (!serverContext) {
    throw new Error('Server context not initialized. Call setServerContext first.');
  }
  return serverContext;
}

export function setServerContext(context: ServerContext): void {
  serverContext = context;
}

export function getSearchClient(): WeaviateSearchClient {
  return getServerContext().client;
}

export function getImageStore(): ImageStore {
  return getServerContext().images;
}

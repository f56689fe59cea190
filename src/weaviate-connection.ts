/**
 * Adapter from the weaviate-client SDK to the WeaviateConnection interface.
 *
 * Keeps SDK types out of the rest of the server: results are reduced to SearchHit
 * (uuid, properties, score, distance).
 */

import weaviate, { type WeaviateClient } from 'weaviate-client';
import { info as logInfo } from './logger.js';
import type {
  ConnectionSettings,
  HybridQueryOptions,
  KeywordQueryOptions,
  SearchHit,
  VectorQueryOptions,
  WeaviateConnection,
} from './types.js';

type SdkObject = {
  uuid: string;
  properties: Record<string, unknown>;
  metadata?: { score?: number; distance?: number };
};

function toHits(objects: SdkObject[]): SearchHit[] {
  return objects.map((o) => ({
    uuid: String(o.uuid),
    properties: o.properties ?? {},
    score: o.metadata?.score,
    distance: o.metadata?.distance,
  }));
}

class SdkConnection implements WeaviateConnection {
  constructor(private client: WeaviateClient) {}

  isReady(): Promise<boolean> {
    return this.client.isReady();
  }

  async listCollectionNames(): Promise<string[]> {
    const configs = await this.client.collections.listAll();
    return configs.map((c) => c.name);
  }

  collectionExists(collection: string): Promise<boolean> {
    return this.client.collections.exists(collection);
  }

  getCollectionConfig(collection: string): Promise<unknown> {
    return this.client.collections.get(collection).config.get();
  }

  async bm25(collection: string, query: string, options: KeywordQueryOptions): Promise<SearchHit[]> {
    const resp = await this.client.collections.get(collection).query.bm25(query, {
      limit: options.limit,
      returnMetadata: ['score'],
    });
    return toHits(resp.objects);
  }

  async nearText(collection: string, query: string, options: VectorQueryOptions): Promise<SearchHit[]> {
    const resp = await this.client.collections.get(collection).query.nearText(query, {
      limit: options.limit,
      returnProperties: options.returnProperties,
      returnMetadata: ['distance'],
    });
    return toHits(resp.objects);
  }

  async nearImage(
    collection: string,
    imageBase64: string,
    options: VectorQueryOptions
  ): Promise<SearchHit[]> {
    const resp = await this.client.collections.get(collection).query.nearImage(imageBase64, {
      limit: options.limit,
      returnProperties: options.returnProperties,
      returnMetadata: ['distance'],
    });
    return toHits(resp.objects);
  }

  async hybrid(collection: string, query: string, options: HybridQueryOptions): Promise<SearchHit[]> {
    const resp = await this.client.collections.get(collection).query.hybrid(query, {
      alpha: options.alpha,
      limit: options.limit,
      queryProperties: options.queryProperties,
      returnProperties: options.returnProperties,
      returnMetadata: ['score', 'distance'],
    });
    return toHits(resp.objects);
  }

  close(): Promise<void> {
    return this.client.close();
  }
}

/** Open a Weaviate Cloud connection authenticated with an API key. */
export async function connectToWeaviateCloud(
  settings: ConnectionSettings
): Promise<WeaviateConnection> {
  const client = await weaviate.connectToWeaviateCloud(settings.clusterUrl, {
    authCredentials: new weaviate.ApiKey(settings.apiKey),
    headers: settings.headers,
  });
  logInfo('Connected to Weaviate cluster', { url: settings.clusterUrl });
  return new SdkConnection(client);
}

/**
 * Weaviate search client.
 *
 * Opens a connection per operation and always closes it afterwards. Implements the
 * keyword (BM25F), semantic (near-text) and hybrid searches the MCP tools expose, plus
 * cluster inspection (readiness, collections, schema).
 */

import {
  debug as logDebug,
  error as logError,
  info as logInfo,
} from './logger.js';
import { DEFAULT_ALPHA, DEFAULT_LIMIT, MAX_LIMIT } from './constants.js';
import { ConfigurationError, InvalidInputError } from './errors.js';
import { VertexAuth } from './vertex-auth.js';
import { connectToWeaviateCloud } from './weaviate-connection.js';
import type {
  CollectionNotFound,
  ConnectionFactory,
  HybridResultRow,
  HybridSearchParams,
  KeywordResultRow,
  KeywordSearchParams,
  SearchHit,
  SearchResponse,
  SemanticResultRow,
  SemanticSearchParams,
  WeaviateConnection,
} from './types.js';

export interface WeaviateSearchClientConfig {
  clusterUrl?: string;
  apiKey?: string;
  openaiApiKey?: string;
  cohereApiKey?: string;
  vertexAuth?: VertexAuth;
  /** Override for tests; defaults to Weaviate Cloud. */
  connect?: ConnectionFactory;
}

export function collectionNotFound(collection: string): CollectionNotFound {
  return { error: `Collection '${collection}' not found` };
}

export function isCollectionNotFound(value: unknown): value is CollectionNotFound {
  return (
    typeof value === 'object' &&
    value !== null &&
    'error' in value &&
    typeof value.error === 'string'
  );
}

function clampLimit(limit: number | undefined): number {
  const requested = limit ?? DEFAULT_LIMIT;
  if (requested < 1) {
    throw new InvalidInputError('limit must be at least 1');
  }
  return Math.min(requested, MAX_LIMIT);
}

function clampAlpha(alpha: number | undefined): number {
  const requested = alpha ?? DEFAULT_ALPHA;
  if (Number.isNaN(requested) || requested < 0 || requested > 1) {
    throw new InvalidInputError('alpha must be between 0 and 1');
  }
  return requested;
}

/**
 * Merge hybrid hits with near-image hits by uuid. Hybrid hits keep their order and come
 * first; an image hit for an object already present only fills in its distance.
 */
export function mergeHits(textHits: SearchHit[], imageHits: SearchHit[], limit: number): SearchHit[] {
  const byUuid = new Map<string, SearchHit>();
  for (const hit of textHits) {
    if (!byUuid.has(hit.uuid)) {
      byUuid.set(hit.uuid, { ...hit });
    }
  }
  for (const hit of imageHits) {
    const existing = byUuid.get(hit.uuid);
    if (existing === undefined) {
      byUuid.set(hit.uuid, { ...hit });
    } else if (existing.distance === undefined) {
      existing.distance = hit.distance;
    }
  }
  return [...byUuid.values()].slice(0, limit);
}

export class WeaviateSearchClient {
  private clusterUrl?: string;
  private apiKey?: string;
  private openaiApiKey?: string;
  private cohereApiKey?: string;
  private vertexAuth: VertexAuth;
  private connect: ConnectionFactory;

  constructor(config: WeaviateSearchClientConfig) {
    this.clusterUrl = config.clusterUrl;
    this.apiKey = config.apiKey;
    this.openaiApiKey = config.openaiApiKey;
    this.cohereApiKey = config.cohereApiKey;
    this.vertexAuth = config.vertexAuth ?? new VertexAuth({ useOAuth: false });
    this.connect = config.connect ?? connectToWeaviateCloud;
  }

  private async buildHeaders(): Promise<Record<string, string>> {
    const headers = await this.vertexAuth.getHeaders();
    if (this.openaiApiKey) headers['X-OpenAI-Api-Key'] = this.openaiApiKey;
    if (this.cohereApiKey) headers['X-Cohere-Api-Key'] = this.cohereApiKey;
    return headers;
  }

  /**
   * Open a connection, run fn, and close the connection whatever the outcome.
   */
  private async withConnection<T>(fn: (conn: WeaviateConnection) => Promise<T>): Promise<T> {
    if (!this.clusterUrl) {
      throw new ConfigurationError('Please set WEAVIATE_URL or WEAVIATE_CLUSTER_URL.');
    }
    if (!this.apiKey) {
      throw new ConfigurationError('Please set WEAVIATE_API_KEY.');
    }
    const conn = await this.connect({
      clusterUrl: this.clusterUrl,
      apiKey: this.apiKey,
      headers: await this.buildHeaders(),
    });
    try {
      return await fn(conn);
    } finally {
      try {
        await conn.close();
      } catch (closeError) {
        logError('Error closing Weaviate connection', closeError);
      }
    }
  }

  /** Run fn against an existing collection, or report it as not found. */
  private withCollection<T>(
    collection: string,
    fn: (conn: WeaviateConnection) => Promise<T>
  ): Promise<T | CollectionNotFound> {
    return this.withConnection(async (conn) => {
      if (!(await conn.collectionExists(collection))) {
        logInfo(`Collection "${collection}" not found`);
        return collectionNotFound(collection);
      }
      return fn(conn);
    });
  }

  async checkConnection(): Promise<{ ready: boolean }> {
    return this.withConnection(async (conn) => ({ ready: Boolean(await conn.isReady()) }));
  }

  /** Sorted, de-duplicated collection names. */
  async listCollections(): Promise<string[]> {
    const names = await this.withConnection((conn) => conn.listCollectionNames());
    return [...new Set(names)].sort();
  }

  async getSchema(
    collection: string
  ): Promise<{ collection: string; config: unknown } | CollectionNotFound> {
    return this.withCollection(collection, async (conn) => ({
      collection,
      config: await conn.getCollectionConfig(collection),
    }));
  }

  async keywordSearch(
    params: KeywordSearchParams
  ): Promise<SearchResponse<KeywordResultRow> | CollectionNotFound> {
    const query = params.query.trim();
    if (!query) {
      throw new InvalidInputError('Query cannot be empty');
    }
    const limit = clampLimit(params.limit);

    return this.withCollection(params.collection, async (conn) => {
      const hits = await conn.bm25(params.collection, query, { limit });
      logDebug(`keyword search returned ${hits.length} hit(s)`, { collection: params.collection });
      const results = hits.map((hit) => ({
        uuid: hit.uuid,
        properties: hit.properties,
        bm25_score: hit.score ?? null,
      }));
      return { count: results.length, results };
    });
  }

  async semanticSearch(
    params: SemanticSearchParams
  ): Promise<SearchResponse<SemanticResultRow> | CollectionNotFound> {
    const query = params.query.trim();
    if (!query) {
      throw new InvalidInputError('Query cannot be empty');
    }
    const limit = clampLimit(params.limit);

    return this.withCollection(params.collection, async (conn) => {
      const hits = await conn.nearText(params.collection, query, { limit });
      logDebug(`semantic search returned ${hits.length} hit(s)`, { collection: params.collection });
      const results = hits.map((hit) => ({
        uuid: hit.uuid,
        properties: hit.properties,
        distance: hit.distance ?? null,
      }));
      return { count: results.length, results };
    });
  }

  /**
   * Hybrid search (BM25 + vector). With an image payload, a near-image search runs as
   * well and the two result lists are merged by uuid; with an image and no text, only
   * the near-image search runs.
   */
  async hybridSearch(
    params: HybridSearchParams
  ): Promise<SearchResponse<HybridResultRow> | CollectionNotFound> {
    const query = params.query.trim();
    if (!query && !params.imageBase64) {
      throw new InvalidInputError('Query cannot be empty');
    }
    const limit = clampLimit(params.limit);
    const alpha = clampAlpha(params.alpha);
    const queryProperties = params.queryProperties?.length ? params.queryProperties : undefined;

    return this.withCollection(params.collection, async (conn) => {
      const [textHits, imageHits] = await Promise.all([
        query
          ? conn.hybrid(params.collection, query, {
              limit,
              alpha,
              queryProperties,
              returnProperties: params.returnProperties,
            })
          : Promise.resolve([]),
        params.imageBase64
          ? conn.nearImage(params.collection, params.imageBase64, {
              limit,
              returnProperties: params.returnProperties,
            })
          : Promise.resolve([]),
      ]);

      const hits = params.imageBase64 ? mergeHits(textHits, imageHits, limit) : textHits;
      logInfo(
        `Retrieved ${hits.length} result(s) from hybrid search (text: ${textHits.length}, image: ${imageHits.length})`
      );

      const results = hits.map((hit) => ({
        uuid: hit.uuid,
        properties: hit.properties,
        bm25_score: hit.score ?? null,
        distance: hit.distance ?? null,
      }));
      return { count: results.length, results };
    });
  }
}

/**
 * Types for the Weaviate MCP server
 */

import type { DISPLAY_FIELDS } from './constants.js';

/** Properties of a stored object, as returned by Weaviate. */
export type RecordProperties = Record<string, unknown>;

/** One object returned by a Weaviate query, with whichever metadata the query asked for. */
export interface SearchHit {
  uuid: string;
  properties: RecordProperties;
  score?: number;
  distance?: number;
}

export interface KeywordQueryOptions {
  limit: number;
}

export interface VectorQueryOptions {
  limit: number;
  returnProperties?: string[];
}

export interface HybridQueryOptions {
  limit: number;
  alpha: number;
  queryProperties?: string[];
  returnProperties?: string[];
}

/**
 * A single open connection to a Weaviate cluster.
 * Collection-scoped calls take the collection name; callers check existence first.
 */
export interface WeaviateConnection {
  isReady(): Promise<boolean>;
  listCollectionNames(): Promise<string[]>;
  collectionExists(collection: string): Promise<boolean>;
  getCollectionConfig(collection: string): Promise<unknown>;
  bm25(collection: string, query: string, options: KeywordQueryOptions): Promise<SearchHit[]>;
  nearText(collection: string, query: string, options: VectorQueryOptions): Promise<SearchHit[]>;
  nearImage(collection: string, imageBase64: string, options: VectorQueryOptions): Promise<SearchHit[]>;
  hybrid(collection: string, query: string, options: HybridQueryOptions): Promise<SearchHit[]>;
  close(): Promise<void>;
}

/** Settings needed to open a connection. Headers carry vectorizer-module credentials. */
export interface ConnectionSettings {
  clusterUrl: string;
  apiKey: string;
  headers: Record<string, string>;
}

export type ConnectionFactory = (settings: ConnectionSettings) => Promise<WeaviateConnection>;

/** Returned instead of a result when the requested collection does not exist. */
export interface CollectionNotFound {
  error: string;
}

export interface KeywordResultRow {
  uuid: string;
  properties: RecordProperties;
  bm25_score: number | null;
}

export interface SemanticResultRow {
  uuid: string;
  properties: RecordProperties;
  distance: number | null;
}

export interface HybridResultRow {
  uuid: string;
  properties: RecordProperties;
  bm25_score: number | null;
  distance: number | null;
}

export interface SearchResponse<Row> {
  count: number;
  results: Row[];
}

export interface KeywordSearchParams {
  collection: string;
  query: string;
  limit?: number;
}

export type SemanticSearchParams = KeywordSearchParams;

export interface HybridSearchParams {
  collection: string;
  query: string;
  limit?: number;
  alpha?: number;
  queryProperties?: string[];
  /** Base64 image payload for a near-image search, already resolved from an image_id. */
  imageBase64?: string;
  /** Restrict the returned properties; omit for all. */
  returnProperties?: string[];
}

export type DisplayField = (typeof DISPLAY_FIELDS)[number];

/** A result row reduced to the fields shown to the user. */
export type DisplayRow = Record<DisplayField, string>;

export type VertexAuthMode = 'api_key' | 'bearer_token' | 'oauth' | 'none';

export interface StoredImage {
  id: string;
  base64: string;
  mimeType: string;
  sizeBytes: number;
  createdAt: number;
  expiresAt: number;
}

export interface UploadImageResponse {
  image_id: string;
  mime_type: string;
  size_bytes: number;
  expires_in: number;
  expires_at: string;
}

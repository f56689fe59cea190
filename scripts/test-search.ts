#!/usr/bin/env tsx
/**
 * Smoke test against a live Weaviate cluster without an MCP client.
 *
 * Usage:
 *   WEAVIATE_URL=... WEAVIATE_API_KEY=... npm run test:search
 *   or
 *   tsx scripts/test-search.ts "query text" [collection]
 */

import * as dotenv from 'dotenv';
import { loadConfig } from '../src/config.js';
import { DEFAULT_COLLECTION } from '../src/constants.js';
import { VertexAuth } from '../src/vertex-auth.js';
import { isCollectionNotFound, WeaviateSearchClient } from '../src/weaviate-client.js';

dotenv.config();

async function run(): Promise<void> {
  const config = loadConfig();
  if (!config.weaviateUrl || !config.weaviateApiKey) {
    console.error('Error: set WEAVIATE_URL (or WEAVIATE_CLUSTER_URL) and WEAVIATE_API_KEY');
    process.exit(1);
  }

  const query = process.argv[2] ?? 'test query';
  const collection = process.argv[3] ?? DEFAULT_COLLECTION;
  const client = new WeaviateSearchClient({
    clusterUrl: config.weaviateUrl,
    apiKey: config.weaviateApiKey,
    openaiApiKey: config.openaiApiKey,
    cohereApiKey: config.cohereApiKey,
    vertexAuth: new VertexAuth(config.vertex),
  });

  console.log('Checking connection...');
  console.log(await client.checkConnection());

  console.log('\nCollections:');
  for (const name of await client.listCollections()) {
    console.log(`  - ${name}`);
  }

  console.log(`\nKeyword search in "${collection}" for "${query}"`);
  let started = Date.now();
  const keyword = await client.keywordSearch({ collection, query, limit: 3 });
  if (isCollectionNotFound(keyword)) {
    console.error(keyword.error);
    process.exit(1);
  }
  console.log(`  ${keyword.count} result(s) in ${Date.now() - started}ms`);

  console.log(`\nHybrid search in "${collection}" for "${query}"`);
  started = Date.now();
  const hybrid = await client.hybridSearch({ collection, query, limit: 3 });
  if (isCollectionNotFound(hybrid)) {
    console.error(hybrid.error);
    process.exit(1);
  }
  console.log(`  ${hybrid.count} result(s) in ${Date.now() - started}ms`);
  for (const row of hybrid.results) {
    console.log(`  - ${row.uuid} score=${row.bm25_score ?? '-'} distance=${row.distance ?? '-'}`);
  }
}

run().catch((error: unknown) => {
  console.error('Search test failed:', error);
  process.exit(1);
});

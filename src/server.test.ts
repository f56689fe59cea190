import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { loadConfig } from './config.js';
import { NOT_FOUND_MESSAGE } from './constants.js';
import { ImageStore } from './image-store.js';
import { setServerContext, setupServer } from './server.js';
import { FakeWeaviate, type FakeCollection } from './testing/fake-weaviate.js';
import { VertexAuth } from './vertex-auth.js';
import { WeaviateSearchClient } from './weaviate-client.js';

const toolResultSchema = z.object({
  isError: z.boolean().optional(),
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })),
});

const promptResultSchema = z.object({
  messages: z.array(
    z.object({
      role: z.string(),
      content: z.object({ type: z.literal('text'), text: z.string() }),
    })
  ),
});

const pumpHit = {
  uuid: 'uuid-pump',
  properties: {
    name: 'Water pump P-3',
    source_pdf: 'plant-manual.pdf',
    page_index: 42,
    mediaType: 'text',
    text: 'The water pump P-3 is located in the basement.',
  },
  score: 0.71,
};

let fake: FakeWeaviate;
let client: Client;

function useCluster(
  collections: Record<string, FakeCollection>,
  images: ImageStore = new ImageStore()
): void {
  fake = new FakeWeaviate(collections);
  const config = loadConfig({
    WEAVIATE_URL: 'https://test-cluster.example',
    WEAVIATE_API_KEY: 'test-api-key',
    VERTEX_APIKEY: 'test-vertex',
  });
  setServerContext({
    config,
    images,
    client: new WeaviateSearchClient({
      clusterUrl: config.weaviateUrl,
      apiKey: config.weaviateApiKey,
      vertexAuth: new VertexAuth(config.vertex),
      connect: fake.connect,
    }),
  });
}

const valveHit = {
  uuid: 'uuid-valve',
  properties: { name: 'Valve V-7', source_pdf: 'valves.pdf', page_index: 3, mediaType: 'image' },
  distance: 0.3,
};

const uploadedImageSchema = z.object({ image_id: z.string() });

async function uploadTestImage(): Promise<string> {
  const upload = await callTool('upload_image', { image_b64: 'data:image/png;base64,aGVsbG8=' });
  return uploadedImageSchema.parse(upload.body).image_id;
}

async function callTool(name: string, args: Record<string, unknown> = {}) {
  const result = toolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const body: unknown = JSON.parse(result.content[0]?.text ?? 'null');
  return { isError: result.isError ?? false, body };
}

beforeEach(async () => {
  useCluster({ Sinde: { hybrid: [pumpHit], bm25: [pumpHit] } });
  const server = setupServer();
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  client = new Client({ name: 'test-client', version: '1.0.0' });
  await client.connect(clientTransport);
});

afterEach(async () => {
  await client.close();
});

describe('MCP server', () => {
  it('registers every tool', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name).sort()).toEqual([
      'check_connection',
      'get_config',
      'get_schema',
      'hybrid_search',
      'keyword_search',
      'list_collections',
      'search_documents',
      'semantic_search',
      'upload_image',
    ]);
  });

  it('get_config reports which secrets are set without returning them', async () => {
    const { isError, body } = await callTool('get_config');
    expect(isError).toBe(false);
    expect(body).toEqual({
      weaviate_url: 'https://test-cluster.example',
      weaviate_api_key_set: true,
      openai_api_key_set: false,
      cohere_api_key_set: false,
      vertex_auth_mode: 'api_key',
      mcp_path: '/mcp/',
      default_collection: 'Sinde',
    });
  });

  it('list_collections returns the collection names', async () => {
    const { body } = await callTool('list_collections');
    expect(body).toEqual(['Sinde']);
  });

  it('keyword_search reports a missing collection', async () => {
    const { isError, body } = await callTool('keyword_search', { collection: 'Other', query: 'pump' });
    expect(isError).toBe(false);
    expect(body).toEqual({ error: "Collection 'Other' not found" });
  });

  it('hybrid_search returns scored results with the default alpha and limit', async () => {
    const { body } = await callTool('hybrid_search', { collection: 'Sinde', query: 'water pump' });
    expect(body).toEqual({
      count: 1,
      results: [
        { uuid: 'uuid-pump', properties: pumpHit.properties, bm25_score: 0.71, distance: null },
      ],
    });
    expect(fake.calls[0]?.options).toEqual({
      limit: 10,
      alpha: 0.5,
      queryProperties: undefined,
      returnProperties: undefined,
    });
  });

  it('hybrid_search rejects an unknown image id', async () => {
    const { isError, body } = await callTool('hybrid_search', {
      collection: 'Sinde',
      query: 'pump',
      image_id: 'missing-image',
    });
    expect(isError).toBe(true);
    expect(body).toEqual({
      status: 'error',
      message:
        'Image "missing-image" not found or expired (images are kept for one hour). Upload it again with upload_image.',
    });
  });

  it('hides internal error details outside DEBUG', async () => {
    useCluster({
      Sinde: {
        hybrid: () => {
          throw new Error('grpc deadline exceeded');
        },
      },
    });
    const { isError, body } = await callTool('hybrid_search', { collection: 'Sinde', query: 'pump' });
    expect(isError).toBe(true);
    expect(body).toEqual({ status: 'error', message: 'Hybrid search failed' });
  });

  it('uploads a base64 image and searches with its image_id', async () => {
    const upload = await callTool('upload_image', { image_b64: 'data:image/png;base64,aGVsbG8=' });
    expect(upload.isError).toBe(false);
    const uploaded = z
      .object({ image_id: z.string(), mime_type: z.string(), size_bytes: z.number(), expires_in: z.number() })
      .parse(upload.body);
    expect(uploaded.mime_type).toBe('image/png');
    expect(uploaded.size_bytes).toBe(5);
    expect(uploaded.expires_in).toBe(3600);

    await callTool('hybrid_search', { collection: 'Sinde', query: '', image_id: uploaded.image_id });

    expect(fake.calls).toEqual([
      { method: 'nearImage', collection: 'Sinde', query: 'aGVsbG8=', options: { limit: 10, returnProperties: undefined } },
    ]);
  });

  it('hybrid_search merges text and image hits by uuid', async () => {
    useCluster({
      Sinde: {
        hybrid: [pumpHit],
        nearImage: [{ uuid: 'uuid-pump', properties: pumpHit.properties, distance: 0.2 }, valveHit],
      },
    });
    const imageId = await uploadTestImage();

    const { isError, body } = await callTool('hybrid_search', {
      collection: 'Sinde',
      query: 'water pump',
      image_id: imageId,
    });

    expect(isError).toBe(false);
    expect(body).toEqual({
      count: 2,
      results: [
        { uuid: 'uuid-pump', properties: pumpHit.properties, bm25_score: 0.71, distance: 0.2 },
        { uuid: 'uuid-valve', properties: valveHit.properties, bm25_score: null, distance: 0.3 },
      ],
    });
    expect(fake.calls.map((call) => call.method)).toEqual(['hybrid', 'nearImage']);
  });

  it('upload_image rejects more than one source', async () => {
    const { isError, body } = await callTool('upload_image', {
      image_url: 'https://img.example/a.png',
      image_b64: 'aGVsbG8=',
    });
    expect(isError).toBe(true);
    expect(body).toEqual({
      status: 'error',
      message: 'Provide exactly one of image_url, image_path or image_b64',
    });
  });
});

describe('search_documents', () => {
  it('searches Sinde for the display fields and returns a table', async () => {
    const { isError, body } = await callTool('search_documents', { query: 'water pump' });

    expect(isError).toBe(false);
    expect(body).toEqual({
      status: 'success',
      collection: 'Sinde',
      attempts: [{ query: 'water pump', result_count: 1 }],
      result_count: 1,
      rows: [
        { name: 'Water pump P-3', source_pdf: 'plant-manual.pdf', page_index: '42', mediaType: 'text' },
      ],
      table: [
        '| name | source_pdf | page_index | mediaType |',
        '| --- | --- | --- | --- |',
        '| Water pump P-3 | plant-manual.pdf | 42 | text |',
      ].join('\n'),
    });
    expect(fake.calls).toEqual([
      {
        method: 'hybrid',
        collection: 'Sinde',
        query: 'water pump',
        options: {
          limit: 10,
          alpha: 0.5,
          queryProperties: undefined,
          returnProperties: ['name', 'source_pdf', 'page_index', 'mediaType'],
        },
      },
    ]);
  });

  it('retries once with the reworded query', async () => {
    useCluster({ Sinde: { hybrid: (query) => (query === 'water pump' ? [pumpHit] : []) } });

    const { body } = await callTool('search_documents', { query: 'Where is the water pump?' });

    expect(fake.calls.map((call) => call.query)).toEqual(['Where is the water pump?', 'water pump']);
    expect(body).toMatchObject({
      status: 'success',
      attempts: [
        { query: 'Where is the water pump?', result_count: 0 },
        { query: 'water pump', result_count: 1 },
      ],
      result_count: 1,
    });
  });

  it('reports that nothing was found after two empty attempts', async () => {
    useCluster({ Sinde: { hybrid: [] } });

    const { isError, body } = await callTool('search_documents', {
      query: 'turbine schedule',
      fallback_query: 'turbine maintenance',
    });

    expect(isError).toBe(false);
    expect(body).toEqual({
      status: 'not_found',
      collection: 'Sinde',
      attempts: [
        { query: 'turbine schedule', result_count: 0 },
        { query: 'turbine maintenance', result_count: 0 },
      ],
      result_count: 0,
      rows: [],
      message: NOT_FOUND_MESSAGE,
    });
    expect(fake.calls).toHaveLength(2);
  });

  it('runs a single near-image attempt for an image-only question', async () => {
    useCluster({ Sinde: { nearImage: [valveHit] } });
    const imageId = await uploadTestImage();

    const { isError, body } = await callTool('search_documents', { query: '', image_id: imageId });

    expect(isError).toBe(false);
    expect(body).toEqual({
      status: 'success',
      collection: 'Sinde',
      attempts: [{ query: '', result_count: 1 }],
      result_count: 1,
      rows: [{ name: 'Valve V-7', source_pdf: 'valves.pdf', page_index: '3', mediaType: 'image' }],
      table: [
        '| name | source_pdf | page_index | mediaType |',
        '| --- | --- | --- | --- |',
        '| Valve V-7 | valves.pdf | 3 | image |',
      ].join('\n'),
    });
    expect(fake.calls).toEqual([
      {
        method: 'nearImage',
        collection: 'Sinde',
        query: 'aGVsbG8=',
        options: { limit: 10, returnProperties: ['name', 'source_pdf', 'page_index', 'mediaType'] },
      },
    ]);
  });

  it('does not retry an empty image-only search', async () => {
    useCluster({ Sinde: {} });
    const imageId = await uploadTestImage();

    const { body } = await callTool('search_documents', { query: '', image_id: imageId });

    expect(body).toEqual({
      status: 'not_found',
      collection: 'Sinde',
      attempts: [{ query: '', result_count: 0 }],
      result_count: 0,
      rows: [],
      message: NOT_FOUND_MESSAGE,
    });
    expect(fake.calls).toHaveLength(1);
  });

  it('repeats the image search alongside the reworded text query', async () => {
    useCluster({ Sinde: { hybrid: [] } });
    const imageId = await uploadTestImage();

    const { body } = await callTool('search_documents', {
      query: 'Where is the water pump?',
      image_id: imageId,
    });

    expect(fake.calls.map((call) => [call.method, call.query])).toEqual([
      ['hybrid', 'Where is the water pump?'],
      ['nearImage', 'aGVsbG8='],
      ['hybrid', 'water pump'],
      ['nearImage', 'aGVsbG8='],
    ]);
    expect(body).toMatchObject({
      status: 'not_found',
      attempts: [
        { query: 'Where is the water pump?', result_count: 0 },
        { query: 'water pump', result_count: 0 },
      ],
    });
  });

  it('rejects an image_id once its hour has passed', async () => {
    const clock = { now: Date.UTC(2026, 0, 1, 12, 0, 0) };
    useCluster(
      { Sinde: { hybrid: [pumpHit] } },
      new ImageStore({ now: () => clock.now, generateId: () => 'img-1' })
    );
    const imageId = await uploadTestImage();
    clock.now += 3_600_000;

    const { isError, body } = await callTool('search_documents', {
      query: 'water pump',
      image_id: imageId,
    });

    expect(isError).toBe(true);
    expect(body).toEqual({
      status: 'error',
      message:
        'Image "img-1" not found or expired (images are kept for one hour). Upload it again with upload_image.',
    });
    expect(fake.calls).toEqual([]);
  });

  it('fails when the Sinde collection does not exist', async () => {
    useCluster({ Other: {} });
    const { isError, body } = await callTool('search_documents', { query: 'pump' });
    expect(isError).toBe(true);
    expect(body).toEqual({ status: 'error', message: "Collection 'Sinde' not found" });
  });
});

describe('sinde_assistant prompt', () => {
  it('embeds the question and the search rules', async () => {
    const result = promptResultSchema.parse(
      await client.getPrompt({ name: 'sinde_assistant', arguments: { question: ' Where is pump P-3? ' } })
    );
    const text = result.messages[0]?.content.text ?? '';
    expect(result.messages[0]?.role).toBe('user');
    expect(text.split('\n')[0]).toBe('You answer questions using only the Weaviate collection "Sinde".');
    expect(text).toContain('exactly these columns: name, source_pdf, page_index, mediaType.');
    expect(text.endsWith('Question: Where is pump P-3?')).toBe(true);
  });
});

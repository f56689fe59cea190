import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { loadConfig } from './config.js';
import { buildHttpApp } from './http-app.js';
import { ImageStore } from './image-store.js';
import { setServerContext } from './server.js';
import { FakeWeaviate } from './testing/fake-weaviate.js';
import { WeaviateSearchClient } from './weaviate-client.js';

const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const BOUNDARY = 'test-boundary-123';

function multipart(field: string, filename: string, contentType: string, data: Buffer) {
  const head =
    `--${BOUNDARY}\r\n` +
    `Content-Disposition: form-data; name="${field}"; filename="${filename}"\r\n` +
    `Content-Type: ${contentType}\r\n\r\n`;
  return {
    payload: Buffer.concat([Buffer.from(head), data, Buffer.from(`\r\n--${BOUNDARY}--\r\n`)]),
    headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` },
  };
}

let app: FastifyInstance;
let images: ImageStore;

beforeEach(async () => {
  let next = 0;
  images = new ImageStore({ generateId: () => `upload-${++next}` });
  setServerContext({
    config: loadConfig({}),
    images,
    client: new WeaviateSearchClient({ connect: new FakeWeaviate().connect }),
  });
  app = await buildHttpApp({ mcpPath: '/mcp/' });
});

afterEach(async () => {
  await app.close();
});

describe('GET /health', () => {
  it('reports the service as ok', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok', service: 'weaviate-mcp-http' });
  });
});

describe('POST /upload-image', () => {
  it('stores the image and returns its id', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/upload-image',
      ...multipart('image', 'page.png', 'image/png', PNG_BYTES),
    });

    expect(res.statusCode).toBe(200);
    const body: unknown = res.json();
    expect(body).toMatchObject({
      image_id: 'upload-1',
      mime_type: 'image/png',
      size_bytes: 8,
      expires_in: 3600,
    });
    expect(images.get('upload-1')?.base64).toBe(PNG_BYTES.toString('base64'));
  });

  it('requires the "image" field', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/upload-image',
      ...multipart('file', 'page.png', 'image/png', PNG_BYTES),
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ status: 'error', message: 'Missing "image" file field' });
    expect(images.size).toBe(0);
  });

  it('rejects files that are not images', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/upload-image',
      ...multipart('image', 'notes.txt', 'text/plain', Buffer.from('hello')),
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ status: 'error', message: 'Unsupported content type: text/plain' });
  });

  it('rejects empty files', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/upload-image',
      ...multipart('image', 'empty.png', 'image/png', Buffer.alloc(0)),
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ status: 'error', message: 'Image is empty' });
  });

  it('rejects requests that are not multipart', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/upload-image',
      payload: { image: 'aGVsbG8=' },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      status: 'error',
      message: 'Expected multipart/form-data with an "image" field',
    });
  });
});

describe('MCP endpoint', () => {
  it('answers initialize over Streamable HTTP', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/mcp/',
      headers: {
        'content-type': 'application/json',
        accept: 'application/json, text/event-stream',
      },
      payload: {
        jsonrpc: '2.0',
        id: 1,
        method: 'initialize',
        params: {
          protocolVersion: '2025-03-26',
          capabilities: {},
          clientInfo: { name: 'test-client', version: '1.0.0' },
        },
      },
    });

    expect(res.statusCode).toBe(200);
    const body = z
      .object({
        id: z.number(),
        result: z.object({ serverInfo: z.object({ name: z.string(), version: z.string() }) }),
      })
      .parse(res.json());
    expect(body.id).toBe(1);
    expect(body.result.serverInfo).toEqual({ name: 'Weaviate MCP', version: '0.1.0' });
  });

  it('rejects GET and DELETE in stateless mode', async () => {
    for (const method of ['GET', 'DELETE'] as const) {
      const res = await app.inject({ method, url: '/mcp' });
      expect(res.statusCode).toBe(405);
      expect(res.json()).toEqual({
        jsonrpc: '2.0',
        error: { code: -32000, message: 'Method not allowed.' },
        id: null,
      });
    }
  });
});

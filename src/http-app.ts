/**
 * HTTP surface: health check, multipart image upload, and the stateless MCP
 * Streamable HTTP endpoint.
 */

import multipart from '@fastify/multipart';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import Fastify, { type FastifyInstance } from 'fastify';
import { MAX_IMAGE_BYTES, SERVICE_NAME } from './constants.js';
import { isUserFacingError } from './errors.js';
import { assertImageSize, normalizeImageMimeType } from './image-input.js';
import { error as logError, info as logInfo } from './logger.js';
import { setupServer } from './server.js';
import { getImageStore } from './server/client-context.js';

export interface HttpAppOptions {
  mcpPath: string;
}

const METHOD_NOT_ALLOWED = {
  jsonrpc: '2.0',
  error: { code: -32000, message: 'Method not allowed.' },
  id: null,
};

export async function buildHttpApp(options: HttpAppOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: false, ignoreTrailingSlash: true });

  await app.register(multipart, {
    limits: { fileSize: MAX_IMAGE_BYTES, files: 1 },
  });

  app.get('/health', async () => ({ status: 'ok', service: SERVICE_NAME }));

  app.post('/upload-image', async (request, reply) => {
    try {
      if (!request.isMultipart()) {
        reply.status(400);
        return { status: 'error', message: 'Expected multipart/form-data with an "image" field' };
      }
      const file = await request.file();
      const data = file ? await file.toBuffer() : undefined;
      if (!file || !data || file.fieldname !== 'image') {
        reply.status(400);
        return { status: 'error', message: 'Missing "image" file field' };
      }
      const mimeType = normalizeImageMimeType(file.mimetype);
      if (!mimeType) {
        reply.status(400);
        return { status: 'error', message: `Unsupported content type: ${file.mimetype}` };
      }
      assertImageSize(data);

      const images = getImageStore();
      const image = images.put(data, mimeType);
      logInfo(`Uploaded image ${image.id} via HTTP (${image.sizeBytes} bytes)`);
      return images.toUploadResponse(image);
    } catch (error) {
      if (isUserFacingError(error)) {
        reply.status(400);
        return { status: 'error', message: error.message };
      }
      if (error instanceof app.multipartErrors.RequestFileTooLargeError) {
        reply.status(400);
        return { status: 'error', message: `Image exceeds the ${MAX_IMAGE_BYTES} byte limit` };
      }
      logError('Error handling image upload', error);
      reply.status(500);
      return { status: 'error', message: 'Image upload failed' };
    }
  });

  // Stateless: every request gets its own server and transport
  app.post(options.mcpPath, async (request, reply) => {
    const server = setupServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });
    reply.raw.on('close', () => {
      transport.close().catch((err: unknown) => logError('Error closing MCP transport', err));
      server.close().catch((err: unknown) => logError('Error closing MCP server', err));
    });

    reply.hijack();
    try {
      await server.connect(transport);
      await transport.handleRequest(request.raw, reply.raw, request.body);
    } catch (error) {
      logError('Error handling MCP request', error);
      if (!reply.raw.headersSent) {
        reply.raw.writeHead(500, { 'Content-Type': 'application/json' });
        reply.raw.end(
          JSON.stringify({
            jsonrpc: '2.0',
            error: { code: -32603, message: 'Internal server error' },
            id: null,
          })
        );
      }
    }
  });

  for (const method of ['GET', 'DELETE'] as const) {
    app.route({
      method,
      url: options.mcpPath,
      handler: async (_request, reply) => {
        reply.status(405);
        return METHOD_NOT_ALLOWED;
      },
    });
  }

  return app;
}

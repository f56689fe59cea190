import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { loadImage } from '../../image-input.js';
import { info as logInfo } from '../../logger.js';
import { getImageStore } from '../client-context.js';
import { runTool } from '../tool-response.js';

export function registerUploadImageTool(server: McpServer): void {
  server.registerTool(
    'upload_image',
    {
      description:
        'Upload an image for image-based search and get an image_id valid for one hour. ' +
        'Provide exactly one of image_url, image_path or image_b64. ' +
        'Prefer image_url (or the POST /upload-image endpoint); send image_b64 only when neither is available.',
      inputSchema: {
        image_url: z.string().optional().describe('http(s) URL of the image. Preferred.'),
        image_path: z.string().optional().describe('Path of an image file on the server host.'),
        image_b64: z
          .string()
          .optional()
          .describe('Base64 image data or a data: URL. Last resort: large payloads slow the agent down.'),
      },
    },
    async (params) =>
      runTool('upload_image', 'Image upload failed', async () => {
        const { data, mimeType } = await loadImage(params);
        const images = getImageStore();
        const image = images.put(data, mimeType);
        logInfo(`Uploaded image ${image.id} (${image.sizeBytes} bytes, ${image.mimeType})`);
        return images.toUploadResponse(image);
      })
  );
}

/**
 * Resolve upload_image inputs (URL, local path, or base64) into raw image bytes.
 */

import { fileTypeFromBuffer } from 'file-type';
import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { IMAGE_FETCH_TIMEOUT_MS, MAX_IMAGE_BYTES } from './constants.js';
import { InvalidInputError } from './errors.js';

export interface ImageInput {
  image_url?: string;
  image_path?: string;
  image_b64?: string;
}

export interface LoadedImage {
  data: Buffer;
  mimeType: string;
}

export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<Response>;

const MIME_BY_EXTENSION: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.bmp': 'image/bmp',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff',
};

const DATA_URL_PATTERN = /^data:([^;,]+);base64,(.*)$/s;

export function mimeTypeFromPath(path: string): string | undefined {
  return MIME_BY_EXTENSION[extname(path).toLowerCase()];
}

/** Accept only image/* MIME types; parameters such as "; charset" are dropped. */
export function normalizeImageMimeType(raw: string | null | undefined): string | undefined {
  const mime = (raw ?? '').split(';')[0]?.trim().toLowerCase();
  return mime && mime.startsWith('image/') ? mime : undefined;
}

const TOO_LARGE_MESSAGE = `Image exceeds the ${MAX_IMAGE_BYTES} byte limit`;

export function assertImageSize(data: Buffer): void {
  if (data.length === 0) {
    throw new InvalidInputError('Image is empty');
  }
  if (data.length > MAX_IMAGE_BYTES) {
    throw new InvalidInputError(TOO_LARGE_MESSAGE);
  }
}

/**
 * Decode plain base64 or a data: URL. Plain base64 is typed from its leading bytes and
 * falls back to PNG when the format is not recognised.
 */
export async function decodeBase64Image(input: string): Promise<LoadedImage> {
  const trimmed = input.trim();
  const match = DATA_URL_PATTERN.exec(trimmed);
  const declared = match ? normalizeImageMimeType(match[1]) : undefined;
  if (match && !declared) {
    throw new InvalidInputError('Data URL does not describe an image');
  }
  const payload = (match ? match[2] ?? '' : trimmed).replace(/\s+/g, '');
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(payload)) {
    throw new InvalidInputError('image_b64 is not valid base64');
  }
  const data = Buffer.from(payload, 'base64');
  if (declared) {
    return { data, mimeType: declared };
  }
  const detected = await fileTypeFromBuffer(data);
  return { data, mimeType: normalizeImageMimeType(detected?.mime) ?? 'image/png' };
}

/** Read a response body, giving up as soon as it passes MAX_IMAGE_BYTES. */
async function readLimitedBody(response: Response): Promise<Buffer> {
  const declared = Number(response.headers.get('content-length') ?? '');
  if (declared > MAX_IMAGE_BYTES) {
    await response.body?.cancel();
    throw new InvalidInputError(TOO_LARGE_MESSAGE);
  }

  const reader = response.body?.getReader();
  if (!reader) return Buffer.alloc(0);
  const chunks: Buffer[] = [];
  let total = 0;
  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    const chunk = Buffer.from(value);
    total += chunk.length;
    if (total > MAX_IMAGE_BYTES) {
      await reader.cancel();
      throw new InvalidInputError(TOO_LARGE_MESSAGE);
    }
    chunks.push(chunk);
  }
  return Buffer.concat(chunks);
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

async function fetchImage(url: string, fetchImpl: FetchLike): Promise<LoadedImage> {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InvalidInputError(`Invalid image_url: ${url}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new InvalidInputError('image_url must use http or https');
  }

  try {
    const response = await fetchImpl(parsed.toString(), {
      signal: AbortSignal.timeout(IMAGE_FETCH_TIMEOUT_MS),
    });
    if (!response.ok) {
      await response.body?.cancel();
      throw new InvalidInputError(`Fetching image_url failed with HTTP ${response.status}`);
    }
    const mimeType = normalizeImageMimeType(response.headers.get('content-type'));
    if (!mimeType) {
      await response.body?.cancel();
      throw new InvalidInputError('image_url did not return an image content type');
    }
    return { data: await readLimitedBody(response), mimeType };
  } catch (error) {
    if (isTimeout(error)) {
      throw new InvalidInputError(
        `Fetching image_url timed out after ${IMAGE_FETCH_TIMEOUT_MS / 1000} s`
      );
    }
    throw error;
  }
}

async function readImageFile(path: string): Promise<LoadedImage> {
  const mimeType = mimeTypeFromPath(path);
  if (!mimeType) {
    throw new InvalidInputError(`Unsupported image file extension: ${extname(path) || '(none)'}`);
  }
  try {
    return { data: await readFile(path), mimeType };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidInputError(`Cannot read image_path: ${reason}`);
  }
}

/** Load exactly one of image_url, image_path or image_b64. */
export async function loadImage(
  input: ImageInput,
  fetchImpl: FetchLike = fetch
): Promise<LoadedImage> {
  const given = [input.image_url, input.image_path, input.image_b64].filter(
    (value) => value !== undefined && value.trim() !== ''
  );
  if (given.length !== 1) {
    throw new InvalidInputError('Provide exactly one of image_url, image_path or image_b64');
  }

  let image: LoadedImage;
  if (input.image_url?.trim()) {
    image = await fetchImage(input.image_url.trim(), fetchImpl);
  } else if (input.image_path?.trim()) {
    image = await readImageFile(input.image_path.trim());
  } else {
    image = await decodeBase64Image(input.image_b64 ?? '');
  }
  assertImageSize(image.data);
  return image;
}

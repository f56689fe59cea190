/**
 * In-memory store for uploaded images. Entries expire IMAGE_TTL_MS after upload and
 * are pruned whenever the store is touched. Total size is capped at maxTotalBytes;
 * when an upload would pass it, the oldest images are evicted first.
 */

import { randomUUID } from 'node:crypto';
import { IMAGE_TTL_MS, MAX_STORED_IMAGE_BYTES } from './constants.js';
import { debug as logDebug } from './logger.js';
import type { StoredImage, UploadImageResponse } from './types.js';

export interface ImageStoreOptions {
  ttlMs?: number;
  maxTotalBytes?: number;
  now?: () => number;
  generateId?: () => string;
}

export class ImageStore {
  private images = new Map<string, StoredImage>();
  private ttlMs: number;
  private maxTotalBytes: number;
  private totalBytes = 0;
  private now: () => number;
  private generateId: () => string;

  constructor(options: ImageStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? IMAGE_TTL_MS;
    this.maxTotalBytes = options.maxTotalBytes ?? MAX_STORED_IMAGE_BYTES;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;
  }

  put(data: Buffer, mimeType: string): StoredImage {
    this.prune();
    this.evictFor(data.length);
    const createdAt = this.now();
    const image: StoredImage = {
      id: this.generateId(),
      base64: data.toString('base64'),
      mimeType,
      sizeBytes: data.length,
      createdAt,
      expiresAt: createdAt + this.ttlMs,
    };
    this.images.set(image.id, image);
    this.totalBytes += image.sizeBytes;
    logDebug('Stored uploaded image', { image_id: image.id, size_bytes: image.sizeBytes });
    return image;
  }

  /** Return the image, or undefined when unknown or expired. */
  get(id: string): StoredImage | undefined {
    this.prune();
    return this.images.get(id);
  }

  get size(): number {
    this.prune();
    return this.images.size;
  }

  /** Bytes currently held, after expired images are dropped. */
  get totalSizeBytes(): number {
    this.prune();
    return this.totalBytes;
  }

  private remove(id: string, image: StoredImage): void {
    this.images.delete(id);
    this.totalBytes -= image.sizeBytes;
  }

  private prune(): void {
    const now = this.now();
    for (const [id, image] of this.images) {
      if (now >= image.expiresAt) {
        this.remove(id, image);
      }
    }
  }

  // Map iteration follows insertion order, so the first entries are the oldest uploads.
  private evictFor(incomingBytes: number): void {
    for (const [id, image] of this.images) {
      if (this.totalBytes + incomingBytes <= this.maxTotalBytes) break;
      this.remove(id, image);
      logDebug('Evicted uploaded image to stay under the store limit', { image_id: id });
    }
  }

  toUploadResponse(image: StoredImage): UploadImageResponse {
    return {
      image_id: image.id,
      mime_type: image.mimeType,
      size_bytes: image.sizeBytes,
      expires_in: Math.max(0, Math.ceil((image.expiresAt - this.now()) / 1000)),
      expires_at: new Date(image.expiresAt).toISOString(),
    };
  }
}

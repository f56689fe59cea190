import { InvalidInputError } from '../errors.js';
import type { StoredImage } from '../types.js';
import { getImageStore } from './client-context.js';

/** Resolve an image_id to its stored image; unknown and expired ids are input errors. */
export function requireImage(imageId: string): StoredImage {
  const image = getImageStore().get(imageId.trim());
  if (!image) {
    throw new InvalidInputError(
      `Image "${imageId}" not found or expired (images are kept for one hour). Upload it again with upload_image.`
    );
  }
  return image;
}

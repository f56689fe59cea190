import { z } from 'zod';
import { DEFAULT_ALPHA, DEFAULT_LIMIT, MAX_LIMIT, MIN_LIMIT } from '../../constants.js';

/** Input fields shared by the search tools. */
export const collectionField = z
  .string()
  .min(1)
  .describe('Collection to search. Use list_collections to discover collections, e.g. "Sinde".');

export const queryField = z.string().describe('Search query text. Be specific for better results.');

export const limitField = z
  .number()
  .int()
  .min(MIN_LIMIT)
  .max(MAX_LIMIT)
  .default(DEFAULT_LIMIT)
  .describe(`Number of results to return (${MIN_LIMIT}-${MAX_LIMIT}). Default: ${DEFAULT_LIMIT}`);

export const alphaField = z
  .number()
  .min(0)
  .max(1)
  .default(DEFAULT_ALPHA)
  .describe(`Blend between keyword and vector scoring: 0 = BM25 only, 1 = vector only. Default: ${DEFAULT_ALPHA}`);

export const imageIdField = z
  .string()
  .min(1)
  .describe('image_id returned by upload_image or POST /upload-image; valid for one hour.');

/**
 * Constants for the Weaviate MCP server
 */

export const SERVICE_NAME = 'weaviate-mcp-http';
export const SERVER_NAME = 'Weaviate MCP';
export const SERVER_VERSION = '0.1.0';

export const DEFAULT_COLLECTION = 'Sinde';
export const DEFAULT_MCP_PATH = '/mcp/';
export const DEFAULT_PORT = 10000;
export const DEFAULT_HOST = '0.0.0.0';

export const DEFAULT_LIMIT = 10;
export const MIN_LIMIT = 1;
export const MAX_LIMIT = 100;
/** Hybrid blend: 0 = BM25 only, 1 = vector only. */
export const DEFAULT_ALPHA = 0.5;

/** Uploaded images stay valid for one hour. */
export const IMAGE_TTL_MS = 60 * 60 * 1000;
export const MAX_IMAGE_BYTES = 10 * 1024 * 1024;
/** Upper bound on the bytes held by the image store; the oldest uploads are evicted first. */
export const MAX_STORED_IMAGE_BYTES = 200 * 1024 * 1024;
export const IMAGE_FETCH_TIMEOUT_MS = 15_000;

/** Properties shown to the user for every record, in display order. */
export const DISPLAY_FIELDS = ['name', 'source_pdf', 'page_index', 'mediaType'] as const;
/** One original attempt plus one reworded retry. */
export const MAX_SEARCH_ATTEMPTS = 2;
export const NOT_FOUND_MESSAGE = `No information was found in the ${DEFAULT_COLLECTION} collection for this query.`;

export const SERVER_INSTRUCTIONS = `A Weaviate connector exposing keyword, semantic and hybrid search plus image upload over MCP.

Rules for assistants answering from the ${DEFAULT_COLLECTION} collection:
- Always search the collection "${DEFAULT_COLLECTION}". Prefer search_documents, which fixes the collection and display fields for you.
- Show results as a table with exactly these columns: ${DISPLAY_FIELDS.join(', ')}.
- If a search returns nothing, retry once with a reworded query. If it is still empty, say that no information was found. Never invent an answer.
- For image questions, pass image_url to upload_image or use the POST /upload-image endpoint, then search with the returned image_id. Only send image_b64 when neither is available.
- An image_id is valid for one hour.

Other tools:
- list_collections / get_schema to inspect the cluster
- keyword_search (BM25), semantic_search (near-text), hybrid_search (alpha 0 = keyword only, 1 = vector only)
- check_connection / get_config for diagnostics (no secrets are returned)`;

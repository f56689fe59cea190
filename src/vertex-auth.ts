/**
 * Vertex AI credentials for Weaviate's Google multimodal vectorizer.
 *
 * The resolved token is sent to Weaviate in the X-Goog-Vertex-Api-Key header; Weaviate
 * uses it when it embeds text or images with Vertex AI. Resolution order: static API key,
 * static bearer token, then OAuth through a service account when VERTEX_USE_OAUTH is set.
 */

import { GoogleAuth } from 'google-auth-library';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { VertexAuthConfig } from './config.js';
import { debug as logDebug } from './logger.js';
import type { VertexAuthMode } from './types.js';

export const VERTEX_HEADER = 'X-Goog-Vertex-Api-Key';
const CLOUD_PLATFORM_SCOPE = 'https://www.googleapis.com/auth/cloud-platform';

const serviceAccountSchema = z.object({
  client_email: z.string(),
  private_key: z.string(),
  project_id: z.string().optional(),
});

export type AccessTokenSource = () => Promise<string | null | undefined>;

/** Decide which credential a config will use, without touching the network. */
export function resolveVertexAuthMode(config: VertexAuthConfig): VertexAuthMode {
  if (config.apiKey) return 'api_key';
  if (config.bearerToken) return 'bearer_token';
  if (config.useOAuth) return 'oauth';
  return 'none';
}

/** Build a google-auth-library token source from inline JSON, a key file, or ADC. */
export function createGoogleTokenSource(config: VertexAuthConfig): AccessTokenSource {
  let auth: GoogleAuth;
  if (config.credentialsJson) {
    let raw: unknown;
    try {
      raw = JSON.parse(config.credentialsJson);
    } catch {
      throw new ConfigurationError('GOOGLE_APPLICATION_CREDENTIALS_JSON is not valid JSON.');
    }
    const parsed = serviceAccountSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(
        'GOOGLE_APPLICATION_CREDENTIALS_JSON must be a service account key with client_email and private_key.'
      );
    }
    auth = new GoogleAuth({
      scopes: [CLOUD_PLATFORM_SCOPE],
      credentials: {
        client_email: parsed.data.client_email,
        private_key: parsed.data.private_key,
      },
      projectId: parsed.data.project_id,
    });
  } else if (config.credentialsPath) {
    auth = new GoogleAuth({ scopes: [CLOUD_PLATFORM_SCOPE], keyFilename: config.credentialsPath });
  } else {
    auth = new GoogleAuth({ scopes: [CLOUD_PLATFORM_SCOPE] });
  }
  return () => auth.getAccessToken();
}

export class VertexAuth {
  readonly mode: VertexAuthMode;
  private config: VertexAuthConfig;
  private tokenSource: AccessTokenSource | null;

  constructor(config: VertexAuthConfig, tokenSource?: AccessTokenSource) {
    this.config = config;
    this.mode = resolveVertexAuthMode(config);
    this.tokenSource = tokenSource ?? null;
  }

  /** Return the token to forward to Weaviate, or undefined when Vertex auth is not configured. */
  async getToken(): Promise<string | undefined> {
    switch (this.mode) {
      case 'api_key':
        return this.config.apiKey;
      case 'bearer_token':
        return this.config.bearerToken;
      case 'oauth': {
        // google-auth-library caches the token and refreshes it before expiry
        if (!this.tokenSource) {
          this.tokenSource = createGoogleTokenSource(this.config);
        }
        const token = await this.tokenSource();
        if (!token) {
          throw new Error('Vertex OAuth did not return an access token');
        }
        logDebug('Obtained Vertex access token via OAuth');
        return token;
      }
      case 'none':
        return undefined;
    }
  }

  /** Headers to attach to a Weaviate connection. */
  async getHeaders(): Promise<Record<string, string>> {
    const token = await this.getToken();
    return token ? { [VERTEX_HEADER]: token } : {};
  }
}

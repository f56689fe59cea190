/**
 * Environment configuration for the Weaviate MCP server.
 */

import { z } from 'zod';
import {
  DEFAULT_HOST,
  DEFAULT_MCP_PATH,
  DEFAULT_PORT,
} from './constants.js';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';
export const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

export type TransportKind = 'http' | 'stdio';

export type Env = Record<string, string | undefined>;

export interface VertexAuthConfig {
  apiKey?: string;
  bearerToken?: string;
  useOAuth: boolean;
  /** Inline service-account JSON. */
  credentialsJson?: string;
  /** Path to a service-account key file. */
  credentialsPath?: string;
}

export interface ServerConfig {
  weaviateUrl?: string;
  weaviateApiKey?: string;
  openaiApiKey?: string;
  cohereApiKey?: string;
  vertex: VertexAuthConfig;
  transport: TransportKind;
  host: string;
  port: number;
  mcpPath: string;
  logLevel: LogLevel;
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const truthy = z
  .string()
  .optional()
  .transform((value) => ['1', 'true', 'yes', 'on'].includes((value ?? '').trim().toLowerCase()));

const portSchema = z.coerce.number().int().min(1).max(65535);

const envSchema = z.object({
  WEAVIATE_CLUSTER_URL: optionalString,
  WEAVIATE_URL: optionalString,
  WEAVIATE_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  COHERE_API_KEY: optionalString,
  VERTEX_APIKEY: optionalString,
  VERTEX_BEARER_TOKEN: optionalString,
  VERTEX_USE_OAUTH: truthy,
  GOOGLE_APPLICATION_CREDENTIALS_JSON: optionalString,
  VERTEX_SA_PATH: optionalString,
  GOOGLE_APPLICATION_CREDENTIALS: optionalString,
  MCP_TRANSPORT: optionalString,
  HOST: optionalString,
  PORT: optionalString,
  MCP_PATH: optionalString,
  WEAVIATE_MCP_LOG_LEVEL: optionalString,
  LOG_LEVEL: optionalString,
});

/** Command-line overrides; every field wins over its environment variable. */
export interface ConfigOverrides {
  transport?: string;
  host?: string;
  port?: string;
  mcpPath?: string;
  logLevel?: string;
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  const upper = (raw ?? '').toUpperCase();
  return LOG_LEVELS.find((level) => level === upper) ?? 'INFO';
}

function parsePort(raw: string | undefined): number {
  const parsed = portSchema.safeParse(raw);
  return parsed.success ? parsed.data : DEFAULT_PORT;
}

/** Normalize an MCP path to start and end with a slash, e.g. "mcp" -> "/mcp/". */
export function normalizeMcpPath(raw: string | undefined): string {
  const trimmed = (raw ?? '').trim().replace(/^\/+|\/+$/g, '');
  return trimmed ? `/${trimmed}/` : DEFAULT_MCP_PATH;
}

export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): ServerConfig {
  const parsed = envSchema.parse(env);
  const transportRaw = (overrides.transport ?? parsed.MCP_TRANSPORT ?? 'http').toLowerCase();

  return {
    weaviateUrl: parsed.WEAVIATE_CLUSTER_URL ?? parsed.WEAVIATE_URL,
    weaviateApiKey: parsed.WEAVIATE_API_KEY,
    openaiApiKey: parsed.OPENAI_API_KEY,
    cohereApiKey: parsed.COHERE_API_KEY,
    vertex: {
      apiKey: parsed.VERTEX_APIKEY,
      bearerToken: parsed.VERTEX_BEARER_TOKEN,
      useOAuth: parsed.VERTEX_USE_OAUTH,
      credentialsJson: parsed.GOOGLE_APPLICATION_CREDENTIALS_JSON,
      credentialsPath: parsed.VERTEX_SA_PATH ?? parsed.GOOGLE_APPLICATION_CREDENTIALS,
    },
    transport: transportRaw === 'stdio' ? 'stdio' : 'http',
    host: overrides.host ?? parsed.HOST ?? DEFAULT_HOST,
    port: parsePort(overrides.port ?? parsed.PORT),
    mcpPath: normalizeMcpPath(overrides.mcpPath ?? parsed.MCP_PATH),
    logLevel: parseLogLevel(
      overrides.logLevel ?? parsed.WEAVIATE_MCP_LOG_LEVEL ?? parsed.LOG_LEVEL
    ),
  };
}

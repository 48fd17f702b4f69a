import { z } from 'zod';

/**
 * Server and client configuration.
 * Defaults live in the schemas so `schema.parse({})` yields a usable config.
 */

const positiveInt = z.coerce.number().int().positive();

export const serverConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(8080),
  host: z.string().min(1).default('127.0.0.1'),
  path: z.string().startsWith('/').default('/api/sse/connect'),
  maxConnections: positiveInt.default(10_000),
  keepAliveMs: positiveInt.default(10_000),
  broadcastTimeoutMs: positiveInt.default(5_000),
  handshakeTimeoutMs: positiveInt.default(2_000),
  /** Empty list allows any origin. */
  corsOrigins: z.array(z.string().min(1)).default([]),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;
export type ServerConfigInput = z.input<typeof serverConfigSchema>;

export const clientConfigSchema = z.object({
  serverUrl: z.string().url(),
  clientId: z.string().min(1).optional(),
  path: z.string().startsWith('/').default('/api/sse/connect'),
  maxRetries: positiveInt.default(10),
  initialBackoffMs: positiveInt.default(1_000),
  maxBackoffMs: positiveInt.default(60_000),
  resetBackoffOnConnect: z.boolean().default(false),
  autoReconnect: z.boolean().default(false),
  queueCapacity: positiveInt.default(1_000),
  queueOverflow: z.enum(['drop-oldest', 'block']).default('drop-oldest'),
  queueBlockTimeoutMs: positiveInt.default(5_000),
});

export type ClientConfig = z.infer<typeof clientConfigSchema>;
export type ClientConfigInput = z.input<typeof clientConfigSchema>;

type Env = Record<string, string | undefined>;

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return value === '1' || value.toLowerCase() === 'true';
}

/** Load server configuration from environment variables (SSE_*, LOG_LEVEL). */
export function loadServerConfig(env: Env = process.env): ServerConfig {
  return serverConfigSchema.parse({
    port: env.SSE_PORT,
    host: env.SSE_HOST,
    path: env.SSE_PATH,
    maxConnections: env.SSE_MAX_CONNECTIONS,
    keepAliveMs: env.SSE_KEEPALIVE_MS,
    broadcastTimeoutMs: env.SSE_BROADCAST_TIMEOUT_MS,
    corsOrigins: splitList(env.SSE_CORS_ORIGINS),
    logLevel: env.LOG_LEVEL,
  });
}

/** Load agent configuration. SERVER_URL defaults to http://localhost:8080. */
export function loadClientConfig(env: Env = process.env): ClientConfig {
  return clientConfigSchema.parse({
    serverUrl: env.SERVER_URL ?? 'http://localhost:8080',
    clientId: env.SSE_CLIENT_ID || undefined,
    path: env.SSE_PATH,
    maxRetries: env.SSE_MAX_RETRIES,
    initialBackoffMs: env.SSE_INITIAL_BACKOFF_MS,
    maxBackoffMs: env.SSE_MAX_BACKOFF_MS,
    autoReconnect: parseFlag(env.SSE_AUTO_RECONNECT),
  });
}

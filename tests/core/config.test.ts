import { describe, it, expect } from 'vitest';
import { loadClientConfig, loadServerConfig, serverConfigSchema } from '../../src/core/config.js';

describe('loadServerConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadServerConfig({})).toEqual({
      port: 8080,
      host: '127.0.0.1',
      path: '/api/sse/connect',
      maxConnections: 10_000,
      keepAliveMs: 10_000,
      broadcastTimeoutMs: 5_000,
      handshakeTimeoutMs: 2_000,
      corsOrigins: [],
      logLevel: 'info',
    });
  });

  it('reads numeric values and the origin list', () => {
    const config = loadServerConfig({
      SSE_PORT: '9000',
      SSE_MAX_CONNECTIONS: '3',
      SSE_KEEPALIVE_MS: '250',
      SSE_CORS_ORIGINS: 'http://a.test, http://b.test,',
      LOG_LEVEL: 'debug',
    });
    expect(config.port).toBe(9000);
    expect(config.maxConnections).toBe(3);
    expect(config.keepAliveMs).toBe(250);
    expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
    expect(config.logLevel).toBe('debug');
  });

  it('rejects a non-positive connection limit', () => {
    expect(() => loadServerConfig({ SSE_MAX_CONNECTIONS: '0' })).toThrow();
  });

  it('rejects a path without a leading slash', () => {
    expect(() => serverConfigSchema.parse({ path: 'events' })).toThrow();
  });
});

describe('loadClientConfig', () => {
  it('defaults the server URL and retry settings', () => {
    const config = loadClientConfig({});
    expect(config.serverUrl).toBe('http://localhost:8080');
    expect(config.clientId).toBeUndefined();
    expect(config.maxRetries).toBe(10);
    expect(config.initialBackoffMs).toBe(1_000);
    expect(config.maxBackoffMs).toBe(60_000);
    expect(config.autoReconnect).toBe(false);
  });

  it('reads a pinned client id and reconnect flag', () => {
    const config = loadClientConfig({
      SERVER_URL: 'http://relay.test:9000',
      SSE_CLIENT_ID: 'agent-1',
      SSE_AUTO_RECONNECT: 'true',
    });
    expect(config.serverUrl).toBe('http://relay.test:9000');
    expect(config.clientId).toBe('agent-1');
    expect(config.autoReconnect).toBe(true);
  });

  it('rejects an invalid server URL', () => {
    expect(() => loadClientConfig({ SERVER_URL: 'not a url' })).toThrow();
  });
});

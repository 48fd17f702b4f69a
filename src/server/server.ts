import Fastify, { LogController, type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { serverConfigSchema, type ServerConfigInput } from '../core/config.js';
import { createLogger } from '../core/logger.js';
import { ConnectionRegistry } from '../services/ConnectionRegistry.js';
import { Dispatcher } from '../services/Dispatcher.js';
import { resolveAllowedOrigin, CORS_ALLOW_HEADERS, CORS_ALLOW_METHODS } from './cors.js';
import { publishRoutes } from './routes/publish.js';
import { streamRoutes } from './routes/stream.js';

export interface ServerOptions {
  config?: ServerConfigInput;
  logger?: FastifyBaseLogger;
  generateClientId?: () => string;
}

export interface RelayServer {
  app: FastifyInstance;
  registry: ConnectionRegistry;
  dispatcher: Dispatcher;
}

/** Assemble the relay without listening. Each call gets its own registry. */
export async function buildServer(options: ServerOptions = {}): Promise<RelayServer> {
  const config = serverConfigSchema.parse(options.config ?? {});
  const logger = options.logger ?? createLogger('sse-relay', config.logLevel);

  // Streams are ended in preClose; sockets left open after that are dropped
  const app = Fastify({
    loggerInstance: logger,
    logController: new LogController({ disableRequestLogging: true }),
    forceCloseConnections: true,
  });

  const registry = new ConnectionRegistry({
    maxConnections: config.maxConnections,
    logger: logger.child({ component: 'registry' }),
  });
  const dispatcher = new Dispatcher({
    registry,
    broadcastTimeoutMs: config.broadcastTimeoutMs,
    logger: logger.child({ component: 'dispatcher' }),
  });

  const corsOrigin = (origin: string | undefined, cb: (err: Error | null, allow: string) => void): void => {
    cb(null, resolveAllowedOrigin(config.corsOrigins, origin));
  };
  await app.register(cors, {
    origin: corsOrigin,
    methods: CORS_ALLOW_METHODS,
    allowedHeaders: CORS_ALLOW_HEADERS,
    optionsSuccessStatus: 200,
    strictPreflight: false,
  });

  // Open streams would otherwise keep close() waiting forever
  app.addHook('preClose', async () => {
    registry.closeAll();
  });

  await app.register(streamRoutes, {
    path: config.path,
    registry,
    dispatcher,
    keepAliveMs: config.keepAliveMs,
    handshakeTimeoutMs: config.handshakeTimeoutMs,
    generateClientId: options.generateClientId,
  });
  await app.register(publishRoutes, { registry, dispatcher });

  return { app, registry, dispatcher };
}

export async function startServer(options: ServerOptions = {}): Promise<RelayServer> {
  const config = serverConfigSchema.parse(options.config ?? {});
  const server = await buildServer({ ...options, config });

  try {
    await server.app.listen({ port: config.port, host: config.host });
  } catch (err) {
    server.app.log.error(err);
    throw err;
  }
  return server;
}

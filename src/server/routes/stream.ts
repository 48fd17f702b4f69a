import type { FastifyInstance } from 'fastify';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { CONNECTED_EVENT, type ConnectedPayload } from '../../core/message.js';
import { StreamingUnsupportedError, isSseRelayError } from '../../core/errors.js';
import type { ConnectionRegistry } from '../../services/ConnectionRegistry.js';
import type { Dispatcher } from '../../services/Dispatcher.js';
import { LivenessPinger } from '../../services/LivenessPinger.js';
import { SseConnection, createResponseSink } from '../../services/SseConnection.js';
import { CORS_ALLOW_HEADERS, CORS_ALLOW_METHODS } from '../cors.js';

export interface StreamRouteOptions {
  path: string;
  registry: ConnectionRegistry;
  dispatcher: Dispatcher;
  keepAliveMs: number;
  handshakeTimeoutMs: number;
  generateClientId?: () => string;
}

export const streamQuerySchema = z.object({
  client_id: z.string().optional(),
});

export function generateClientId(): string {
  return `client-${randomUUID()}`;
}

function waitForEither(a: AbortSignal, b: AbortSignal): Promise<'request' | 'connection'> {
  return new Promise(resolve => {
    if (a.aborted) return resolve('request');
    if (b.aborted) return resolve('connection');
    const onA = () => {
      b.removeEventListener('abort', onB);
      resolve('request');
    };
    const onB = () => {
      a.removeEventListener('abort', onA);
      resolve('connection');
    };
    a.addEventListener('abort', onA, { once: true });
    b.addEventListener('abort', onB, { once: true });
  });
}

export async function streamRoutes(fastify: FastifyInstance, opts: StreamRouteOptions): Promise<void> {
  const { path, registry, dispatcher, keepAliveMs, handshakeTimeoutMs } = opts;
  const nextClientId = opts.generateClientId ?? generateClientId;

  fastify.route({
    method: ['POST', 'PUT', 'PATCH', 'DELETE', 'HEAD'],
    url: path,
    handler: async (_request, reply) => {
      return reply.code(405).header('Allow', CORS_ALLOW_METHODS).send({ error: 'Method not allowed' });
    },
  });

  fastify.get(path, { exposeHeadRoute: false }, async (request, reply) => {
    const query = streamQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.code(400).send({ error: 'Invalid query', issues: query.error.issues });
    }

    const raw = reply.raw;
    if (raw.destroyed || raw.writableEnded) {
      const err = new StreamingUnsupportedError();
      request.log.error({ err }, 'cannot open event stream');
      return reply.code(500).send({ error: err.message });
    }

    const clientId = query.data.client_id || nextClientId();
    const connection = new SseConnection(clientId, createResponseSink(raw));

    try {
      registry.register(connection);
    } catch (err) {
      if (isSseRelayError(err) && err.code === 'CAPACITY_EXCEEDED') {
        request.log.warn({ clientId }, err.message);
        return reply.code(503).send({ error: err.message });
      }
      if (isSseRelayError(err) && err.code === 'DUPLICATE_CONNECTION') {
        return reply.code(409).send({ error: err.message });
      }
      throw err;
    }

    reply.hijack();
    raw.writeHead(200, {
      ...reply.getHeaders(),
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      'Connection': 'keep-alive',
      'Access-Control-Allow-Methods': CORS_ALLOW_METHODS,
      'Access-Control-Allow-Headers': CORS_ALLOW_HEADERS,
    });

    const requestClosed = new AbortController();
    raw.once('close', () => requestClosed.abort());
    const pinger = new LivenessPinger(connection, requestClosed.signal, {
      registry,
      intervalMs: keepAliveMs,
      logger: request.log,
    });

    try {
      const payload: ConnectedPayload = { client_id: clientId };
      try {
        await dispatcher.send({ eventType: CONNECTED_EVENT, data: payload }, [clientId], {
          timeoutMs: handshakeTimeoutMs,
          signal: requestClosed.signal,
        });
      } catch (err) {
        request.log.warn({ clientId, err }, 'failed to send connected event');
        return;
      }
      request.log.info({ clientId }, 'client connected');

      pinger.start();
      const trigger = await waitForEither(requestClosed.signal, connection.done);
      request.log.debug({ clientId, trigger }, 'event stream ended');
    } finally {
      pinger.stop();
      registry.remove(clientId);
      if (!raw.writableEnded) raw.end();
    }
  });
}

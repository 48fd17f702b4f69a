import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import { PartialDeliveryError, isSseRelayError } from '../../core/errors.js';
import type { ConnectionRegistry } from '../../services/ConnectionRegistry.js';
import type { Dispatcher } from '../../services/Dispatcher.js';

export interface PublishRouteOptions {
  registry: ConnectionRegistry;
  dispatcher: Dispatcher;
}

export const sendRequestSchema = z.object({
  event_type: z.string().min(1),
  data: z.unknown(),
  client_ids: z.array(z.string().min(1)).optional(),
});

const STATUS_BY_CODE: Record<string, number> = {
  INVALID_MESSAGE: 400,
  NO_MATCHING_CLIENTS: 404,
  PARTIAL_DELIVERY: 502,
};

function sendFailure(reply: FastifyReply, err: unknown): FastifyReply {
  if (!isSseRelayError(err) || !(err.code in STATUS_BY_CODE)) throw err;
  const body: Record<string, unknown> = { error: err.message, code: err.code };
  if (err instanceof PartialDeliveryError) {
    body.failed = err.failed;
    body.total = err.total;
  }
  return reply.code(STATUS_BY_CODE[err.code]).send(body);
}

/** HTTP surface for business logic: push events and inspect connected clients. */
export async function publishRoutes(fastify: FastifyInstance, opts: PublishRouteOptions): Promise<void> {
  const { registry, dispatcher } = opts;

  fastify.get('/health', async () => ({
    status: 'ok',
    connectedClients: registry.count(),
  }));

  fastify.get('/api/sse/clients', async () => ({
    count: registry.count(),
    clients: registry.list(),
  }));

  fastify.post('/api/sse/send', async (request, reply) => {
    const parsed = sendRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: 'Invalid request body', issues: parsed.error.issues });
    }

    const { event_type, data, client_ids } = parsed.data;
    try {
      await dispatcher.send({ eventType: event_type, data }, client_ids ?? []);
    } catch (err) {
      return sendFailure(reply, err);
    }
    return { ok: true };
  });
}

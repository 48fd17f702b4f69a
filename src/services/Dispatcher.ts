/**
 * Dispatcher: delivers one message to one, many or all registered connections.
 *
 * The payload is serialized once and the same frame is written to every
 * recipient under a single deadline. A recipient whose write fails or misses
 * the deadline is evicted from the registry; nothing is retried.
 */

import type { FastifyBaseLogger } from 'fastify';
import { deadline } from '../core/abort.js';
import { DeliveryTimeoutError, NoMatchingClientsError, PartialDeliveryError } from '../core/errors.js';
import { formatEvent, serializeMessage, type Message } from '../core/message.js';
import type { ConnectionRegistry } from './ConnectionRegistry.js';
import type { SseConnection } from './SseConnection.js';

export interface DispatcherOptions {
  registry: ConnectionRegistry;
  broadcastTimeoutMs: number;
  logger: FastifyBaseLogger;
}

export interface SendOptions {
  /** Caller cancellation; aborting it rejects with the signal's reason and evicts nobody. */
  signal?: AbortSignal;
  /** Overrides the configured broadcast timeout for this send. */
  timeoutMs?: number;
}

export class Dispatcher {
  private readonly registry: ConnectionRegistry;
  private readonly broadcastTimeoutMs: number;
  private readonly logger: FastifyBaseLogger;

  constructor(options: DispatcherOptions) {
    this.registry = options.registry;
    this.broadcastTimeoutMs = options.broadcastTimeoutMs;
    this.logger = options.logger;
  }

  /**
   * Send `message` to `targetIds`, or to every connection when the list is empty.
   * @throws InvalidMessageError before any I/O
   * @throws NoMatchingClientsError when none of `targetIds` is connected
   * @throws PartialDeliveryError when at least one recipient failed
   */
  async send(message: Message, targetIds: readonly string[] = [], options: SendOptions = {}): Promise<void> {
    const frame = formatEvent(message.eventType, serializeMessage(message));
    options.signal?.throwIfAborted();

    const isBroadcast = targetIds.length === 0;
    const recipients = isBroadcast ? this.registry.snapshot() : this.registry.resolve(targetIds);

    if (recipients.length === 0) {
      if (isBroadcast) return;
      throw new NoMatchingClientsError(targetIds);
    }

    const timeoutMs = options.timeoutMs ?? this.broadcastTimeoutMs;
    const guard = deadline(timeoutMs, () => new DeliveryTimeoutError(timeoutMs), options.signal);

    try {
      if (recipients.length === 1) {
        const [only] = recipients;
        try {
          await this.deliver(only, frame, guard.signal, options.signal);
        } catch (err) {
          options.signal?.throwIfAborted();
          throw new PartialDeliveryError([only.id], 1, err);
        }
        return;
      }

      const results = await Promise.allSettled(
        recipients.map(connection => this.deliver(connection, frame, guard.signal, options.signal)),
      );

      const failedIds: string[] = [];
      let firstError: unknown;
      results.forEach((result, i) => {
        if (result.status === 'fulfilled') return;
        if (failedIds.length === 0) firstError = result.reason;
        failedIds.push(recipients[i].id);
      });

      if (failedIds.length > 0) {
        options.signal?.throwIfAborted();
        throw new PartialDeliveryError(failedIds, recipients.length, firstError);
      }
    } finally {
      guard.dispose();
    }
  }

  private async deliver(
    connection: SseConnection,
    frame: string,
    signal: AbortSignal,
    callerSignal: AbortSignal | undefined,
  ): Promise<void> {
    try {
      await connection.write(frame, signal);
    } catch (err) {
      if (callerSignal?.aborted) throw err;
      this.logger.warn({ clientId: connection.id, err }, 'failed to send to client, evicting');
      this.registry.remove(connection.id);
      throw err;
    }
  }
}

/**
 * ConnectionRegistry: the set of live event streams, keyed by connection id.
 *
 * Responsibilities:
 * - Enforces the maximum connection count at insertion
 * - Idempotent removal that fires each connection's done signal once
 * - Snapshot queries for the dispatcher and the HTTP surface
 *
 * All mutations are synchronous Map operations, so the event loop serializes them.
 */

import type { FastifyBaseLogger } from 'fastify';
import { CapacityExceededError, DuplicateConnectionError } from '../core/errors.js';
import type { SseConnection } from './SseConnection.js';

export interface ConnectionRegistryOptions {
  maxConnections: number;
  logger: FastifyBaseLogger;
}

export class ConnectionRegistry {
  private readonly connections = new Map<string, SseConnection>();
  private readonly maxConnections: number;
  private readonly logger: FastifyBaseLogger;

  constructor(options: ConnectionRegistryOptions) {
    this.maxConnections = options.maxConnections;
    this.logger = options.logger;
  }

  register(connection: SseConnection): void {
    if (this.connections.size >= this.maxConnections) {
      throw new CapacityExceededError(this.maxConnections);
    }
    if (this.connections.has(connection.id)) {
      throw new DuplicateConnectionError(connection.id);
    }
    this.connections.set(connection.id, connection);
  }

  /** Remove a connection and fire its done signal. Unknown ids are a no-op. */
  remove(id: string): boolean {
    const connection = this.connections.get(id);
    if (!connection) return false;
    this.connections.delete(id);

    if (connection.close()) {
      this.logger.info({ clientId: id }, 'client disconnected');
    }
    return true;
  }

  /** Remove every connection (server shutdown). */
  closeAll(): void {
    for (const id of [...this.connections.keys()]) this.remove(id);
  }

  get(id: string): SseConnection | undefined {
    return this.connections.get(id);
  }

  contains(id: string): boolean {
    return this.connections.has(id);
  }

  count(): number {
    return this.connections.size;
  }

  /** Connected ids in registration order. */
  list(): string[] {
    return [...this.connections.keys()];
  }

  snapshot(): SseConnection[] {
    return [...this.connections.values()];
  }

  /** Present connections among `ids`; unknown and repeated ids are skipped. */
  resolve(ids: readonly string[]): SseConnection[] {
    const found = new Map<string, SseConnection>();
    for (const id of ids) {
      const connection = this.connections.get(id);
      if (connection) found.set(id, connection);
    }
    return [...found.values()];
  }
}

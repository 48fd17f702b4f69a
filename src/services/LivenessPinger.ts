import type { FastifyBaseLogger } from 'fastify';
import { KEEPALIVE_FRAME } from '../core/message.js';
import type { ConnectionRegistry } from './ConnectionRegistry.js';
import type { SseConnection } from './SseConnection.js';

export interface LivenessPingerOptions {
  registry: ConnectionRegistry;
  intervalMs: number;
  logger: FastifyBaseLogger;
}

/**
 * Writes a keepalive comment to one connection on a fixed interval so proxies
 * do not close idle streams. A failed keepalive evicts the connection, the same
 * as a failed send. Stops for good when the connection or the request ends.
 */
export class LivenessPinger {
  private timer: ReturnType<typeof setInterval> | null = null;
  private stopped = false;
  private readonly stopHandler = () => this.stop();

  constructor(
    private readonly connection: SseConnection,
    private readonly requestSignal: AbortSignal,
    private readonly options: LivenessPingerOptions,
  ) {}

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.stopped || this.timer || this.connection.closed || this.requestSignal.aborted) return;

    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.intervalMs);

    this.connection.done.addEventListener('abort', this.stopHandler, { once: true });
    this.requestSignal.addEventListener('abort', this.stopHandler, { once: true });
  }

  stop(): void {
    this.stopped = true;
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.connection.done.removeEventListener('abort', this.stopHandler);
    this.requestSignal.removeEventListener('abort', this.stopHandler);
  }

  private async tick(): Promise<void> {
    try {
      await this.connection.write(KEEPALIVE_FRAME, this.connection.done);
    } catch (err) {
      if (this.connection.closed) return;
      this.options.logger.warn({ clientId: this.connection.id, err }, 'keepalive failed, evicting');
      this.stop();
      this.options.registry.remove(this.connection.id);
    }
  }
}

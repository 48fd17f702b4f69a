/**
 * SseClient: agent side of the relay.
 *
 * Responsibilities:
 * - Connects to the relay's event stream, retrying with capped exponential backoff
 * - Frames the stream into events and hands them to handlers through a bounded queue
 * - Tracks the assigned client id and connection status
 * - Signals each disconnect exactly once
 */

import { pino, type Logger } from 'pino';
import { z } from 'zod';
import { sleep } from '../core/abort.js';
import { Backoff } from '../core/backoff.js';
import { clientConfigSchema, type ClientConfig, type ClientConfigInput } from '../core/config.js';
import { ClientClosedError, ConnectionExhaustedError } from '../core/errors.js';
import { EventFramer, type FramedEvent } from '../core/eventFramer.js';
import { CONNECTED_EVENT } from '../core/message.js';
import { DispatchQueue } from './DispatchQueue.js';
import { HandlerRegistry, type EventHandler } from './HandlerRegistry.js';

export type ClientStatus = 'idle' | 'connecting' | 'connected' | 'disconnected' | 'closed';

export interface SseClientOptions extends ClientConfigInput {
  logger?: Logger;
  fetch?: typeof fetch;
  onStatusChange?: (status: ClientStatus) => void;
  /** Receives failures of automatic reconnects, which have no caller to reject. */
  onError?: (err: unknown) => void;
}

const connectedPayloadSchema = z.object({ client_id: z.string().min(1) });

class Disconnect {
  private fired = false;
  private resolveFn: () => void = () => {};
  readonly promise: Promise<void>;

  constructor() {
    this.promise = new Promise(resolve => {
      this.resolveFn = resolve;
    });
  }

  /** Returns false when this disconnect was already signalled. */
  fire(): boolean {
    if (this.fired) return false;
    this.fired = true;
    this.resolveFn();
    return true;
  }
}

export class SseClient {
  private readonly config: ClientConfig;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;
  private readonly handlers: HandlerRegistry;
  private readonly queue: DispatchQueue<FramedEvent>;
  private readonly backoff: Backoff;
  private readonly controller = new AbortController();
  private readonly onStatusChange?: (status: ClientStatus) => void;
  private readonly onError?: (err: unknown) => void;

  private status: ClientStatus = 'idle';
  private clientId: string | undefined;
  private disconnect: Disconnect | null = null;
  private connecting: Promise<void> | null = null;

  constructor(options: SseClientOptions) {
    const { logger, fetch: fetchImpl, onStatusChange, onError, ...config } = options;
    this.config = clientConfigSchema.parse(config);
    this.logger = logger ?? pino({ name: 'sse-client' });
    this.fetchImpl = fetchImpl ?? fetch;
    this.onStatusChange = onStatusChange;
    this.onError = onError;
    this.clientId = this.config.clientId;
    this.backoff = new Backoff(this.config.initialBackoffMs, this.config.maxBackoffMs);
    this.handlers = new HandlerRegistry(this.logger);
    this.queue = new DispatchQueue<FramedEvent>({
      capacity: this.config.queueCapacity,
      overflow: this.config.queueOverflow,
      blockTimeoutMs: this.config.queueBlockTimeoutMs,
      worker: event => this.handlers.dispatch(event.type, Buffer.from(event.data, 'utf8')),
      logger: this.logger,
    });
  }

  addEventHandler(eventType: string, handler: EventHandler): void {
    this.handlers.add(eventType, handler);
  }

  addJsonHandler<S extends z.ZodTypeAny>(
    eventType: string,
    schema: S,
    handler: (value: z.output<S>) => void | Promise<void>,
  ): void {
    this.handlers.addJson(eventType, schema, handler);
  }

  getStatus(): ClientStatus {
    return this.status;
  }

  isConnected(): boolean {
    return this.status === 'connected';
  }

  getClientId(): string | undefined {
    return this.clientId;
  }

  /** Delay the next failed attempt will wait. */
  get nextBackoffMs(): number {
    return this.backoff.delayMs;
  }

  /**
   * Open the event stream. No-op when already connected; concurrent calls
   * share one attempt sequence.
   * @throws ConnectionExhaustedError once every attempt has failed
   * @throws ClientClosedError if `close()` is called meanwhile
   */
  connect(): Promise<void> {
    if (this.status === 'connected') return Promise.resolve();
    if (this.status === 'closed') return Promise.reject(new ClientClosedError());
    if (!this.connecting) {
      this.connecting = this.connectWithRetry().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  /** Resolves when the current connection ends, or immediately if there is none. */
  waitForDisconnect(): Promise<void> {
    if (!this.disconnect || this.status !== 'connected') return Promise.resolve();
    return this.disconnect.promise;
  }

  /** Resolves once every event received so far has been handled. */
  drain(): Promise<void> {
    return this.queue.onIdle();
  }

  close(): void {
    if (this.status === 'closed') return;
    this.controller.abort(new ClientClosedError());
    this.queue.close();
    this.setStatus('closed');
    this.disconnect?.fire();
  }

  private async connectWithRetry(): Promise<void> {
    const { maxRetries } = this.config;
    let lastError: unknown;

    this.setStatus('connecting');
    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        await this.establishConnection();
        return;
      } catch (err) {
        if (this.status === 'closed') throw new ClientClosedError();
        lastError = err;
      }

      if (attempt === maxRetries) break;
      const delayMs = this.backoff.next();
      this.logger.warn(
        { attempt, maxRetries, delayMs, err: lastError },
        'connection attempt failed, retrying',
      );
      try {
        await sleep(delayMs, this.controller.signal);
      } catch {
        throw new ClientClosedError();
      }
    }

    this.logger.error({ attempts: maxRetries, err: lastError }, 'giving up on event stream');
    this.setStatus('disconnected');
    throw new ConnectionExhaustedError(maxRetries, lastError);
  }

  private buildUrl(): string {
    const base = this.config.serverUrl.replace(/\/+$/, '');
    const url = new URL(`${base}${this.config.path}`);
    if (this.clientId) url.searchParams.set('client_id', this.clientId);
    return url.toString();
  }

  private async establishConnection(): Promise<void> {
    const url = this.buildUrl();
    this.logger.info({ url }, 'connecting to event stream');

    // No timeout: the stream stays open for as long as the server keeps it
    const response = await this.fetchImpl(url, {
      headers: { Accept: 'text/event-stream' },
      signal: this.controller.signal,
    });

    if (!response.ok || !response.body) {
      await response.body?.cancel();
      throw new Error(`server returned non-OK status: ${response.status}`);
    }

    if (this.config.resetBackoffOnConnect) this.backoff.reset();
    const disconnect = new Disconnect();
    this.disconnect = disconnect;
    this.setStatus('connected');
    this.logger.info('event stream connected');

    void this.readEvents(response.body, disconnect);
  }

  private async readEvents(body: NonNullable<Response['body']>, disconnect: Disconnect): Promise<void> {
    const reader = body.getReader();
    const decoder = new TextDecoder();
    const completed: FramedEvent[] = [];
    const framer = new EventFramer(event => completed.push(event));

    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        framer.push(decoder.decode(value, { stream: true }));
        for (const event of completed.splice(0)) await this.receive(event);
      }
    } catch (err) {
      if (this.status !== 'closed') this.logger.warn({ err }, 'error reading event stream');
    } finally {
      reader.releaseLock();
      this.handleDisconnect(disconnect);
    }
  }

  private async receive(event: FramedEvent): Promise<void> {
    if (event.type === CONNECTED_EVENT) this.captureClientId(event.data);
    await this.queue.push(event);
  }

  private captureClientId(data: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (err) {
      this.logger.warn({ err }, 'malformed connected event');
      return;
    }
    const result = connectedPayloadSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn({ issues: result.error.issues }, 'connected event without client_id');
      return;
    }
    this.clientId = result.data.client_id;
    this.logger.info({ clientId: this.clientId }, 'assigned client id');
  }

  private handleDisconnect(disconnect: Disconnect): void {
    if (!disconnect.fire()) return;
    this.setStatus('disconnected');
    this.logger.info('event stream disconnected');

    if (this.config.autoReconnect) {
      this.connect().catch((err: unknown) => this.reportError(err));
    }
  }

  private reportError(err: unknown): void {
    if (err instanceof ClientClosedError) return;
    if (this.onError) {
      this.onError(err);
    } else {
      this.logger.error({ err }, 'automatic reconnect failed');
    }
  }

  private setStatus(status: ClientStatus): void {
    if (this.status === status || this.status === 'closed') return;
    this.status = status;
    this.onStatusChange?.(status);
  }
}

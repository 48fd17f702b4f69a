/**
 * SseConnection: one registered event stream.
 *
 * Responsibilities:
 * - Serializes writes to its sink so dispatcher frames and keepalive comments never interleave
 * - Owns the done signal, fired exactly once when the connection is closed
 */

import type { ServerResponse } from 'http';
import { raceAbort } from '../core/abort.js';

export interface StreamSink {
  /** Write one complete frame; resolves once the frame has been handed to the socket. */
  write(frame: string): Promise<void>;
}

export class ConnectionClosedError extends Error {
  constructor(id: string) {
    super(`connection ${id} is closed`);
    this.name = 'ConnectionClosedError';
  }
}

export class SseConnection {
  readonly id: string;
  private readonly sink: StreamSink;
  private readonly controller = new AbortController();
  private tail: Promise<void> = Promise.resolve();

  constructor(id: string, sink: StreamSink) {
    this.id = id;
    this.sink = sink;
  }

  /** Fires once, when the connection is removed from its registry. */
  get done(): AbortSignal {
    return this.controller.signal;
  }

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Queue a frame behind any in-flight write. Rejects if `signal` aborts while
   * waiting for the lock or for the sink.
   */
  write(frame: string, signal?: AbortSignal): Promise<void> {
    const previous = this.tail;
    const run = raceAbort(previous, signal).then(() => this.writeNow(frame, signal));
    this.tail = previous.then(() => run).then(noop, noop);
    return run;
  }

  /** Fire the done signal. Returns false if it had already fired. */
  close(reason?: unknown): boolean {
    if (this.controller.signal.aborted) return false;
    this.controller.abort(reason ?? new ConnectionClosedError(this.id));
    return true;
  }

  private writeNow(frame: string, signal?: AbortSignal): Promise<void> {
    if (this.closed) return Promise.reject(new ConnectionClosedError(this.id));
    return raceAbort(this.sink.write(frame), signal);
  }
}

function noop(): void {}

/** Sink over a raw Node response. Rejects once the socket is gone. */
export function createResponseSink(res: ServerResponse): StreamSink {
  return {
    write(frame) {
      return new Promise((resolve, reject) => {
        if (res.destroyed || res.writableEnded) {
          reject(new Error('response stream is closed'));
          return;
        }
        res.write(frame, err => (err ? reject(err) : resolve()));
      });
    },
  };
}

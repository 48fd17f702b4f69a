/**
 * DispatchQueue: bounded FIFO between the stream reader and event handlers.
 *
 * Responsibilities:
 * - Lets the reader keep parsing (and noticing disconnects) while handlers run
 * - Applies the overflow policy when handlers fall behind
 * - Runs one worker at a time, preserving arrival order
 */

import type { Logger } from 'pino';

export type OverflowPolicy = 'drop-oldest' | 'block';

export interface DispatchQueueOptions<T> {
  capacity: number;
  overflow: OverflowPolicy;
  /** How long `push` waits for room under the 'block' policy. */
  blockTimeoutMs: number;
  worker: (item: T) => Promise<void>;
  logger: Logger;
}

export class DispatchQueue<T> {
  private readonly items: T[] = [];
  private readonly spaceWaiters: Array<(hasSpace: boolean) => void> = [];
  private readonly idleWaiters: Array<() => void> = [];
  private draining = false;
  private closed = false;
  private droppedCount = 0;

  constructor(private readonly options: DispatchQueueOptions<T>) {}

  get size(): number {
    return this.items.length;
  }

  /** Events discarded by the overflow policy so far. */
  get dropped(): number {
    return this.droppedCount;
  }

  /** Enqueue an item. Resolves false when the item was not accepted. */
  async push(item: T): Promise<boolean> {
    if (this.closed) return false;

    if (this.items.length >= this.options.capacity) {
      if (this.options.overflow === 'drop-oldest') {
        this.items.shift();
        this.recordDrop('queue full, dropped oldest event');
      } else {
        const hasSpace = await this.waitForSpace();
        if (!hasSpace || this.closed) {
          if (!this.closed) this.recordDrop('queue full, dropped incoming event');
          return false;
        }
      }
    }

    this.items.push(item);
    void this.drain();
    return true;
  }

  /** Resolves once every queued item has been handed to the worker and it finished. */
  onIdle(): Promise<void> {
    if (!this.draining && this.items.length === 0) return Promise.resolve();
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  /** Discard pending items and release anyone blocked in `push`. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.items.length = 0;
    for (const waiter of this.spaceWaiters.splice(0)) waiter(false);
    if (!this.draining) this.notifyIdle();
  }

  private recordDrop(message: string): void {
    this.droppedCount++;
    this.options.logger.warn({ dropped: this.droppedCount, capacity: this.options.capacity }, message);
  }

  private waitForSpace(): Promise<boolean> {
    return new Promise(resolve => {
      const waiter = (hasSpace: boolean) => {
        clearTimeout(timer);
        resolve(hasSpace);
      };
      const timer = setTimeout(() => {
        const index = this.spaceWaiters.indexOf(waiter);
        if (index !== -1) this.spaceWaiters.splice(index, 1);
        resolve(false);
      }, this.options.blockTimeoutMs);
      this.spaceWaiters.push(waiter);
    });
  }

  private async drain(): Promise<void> {
    if (this.draining) return;
    this.draining = true;
    try {
      while (!this.closed && this.items.length > 0) {
        const item = this.items.splice(0, 1)[0];
        this.spaceWaiters.shift()?.(true);
        try {
          await this.options.worker(item);
        } catch (err) {
          this.options.logger.error({ err }, 'dispatch worker failed');
        }
      }
    } finally {
      this.draining = false;
      this.notifyIdle();
    }
  }

  private notifyIdle(): void {
    for (const resolve of this.idleWaiters.splice(0)) resolve();
  }
}

import { pino } from 'pino';
import type { StreamSink } from '../src/services/SseConnection.js';

export const silentLogger = pino({ level: 'silent' });

/** In-memory sink; set `failWith` to make writes reject, `hang` to make them never settle. */
export class FakeSink implements StreamSink {
  readonly frames: string[] = [];
  failWith: Error | null = null;
  hang = false;

  async write(frame: string): Promise<void> {
    if (this.failWith) throw this.failWith;
    if (this.hang) return new Promise<void>(() => {});
    this.frames.push(frame);
  }
}

/** Yield to the macrotask queue so every pending promise callback runs. */
export function flush(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

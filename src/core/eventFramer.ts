export interface FramedEvent {
  type: string;
  data: string;
}

export type FramedEventListener = (event: FramedEvent) => void;

/**
 * Incremental parser for the relay's event-stream framing.
 *
 * Feed raw text chunks with `push`; complete events are handed to the listener.
 * Chunks may split lines anywhere. Only single-line `data:` payloads exist on
 * this protocol, so a second `data:` line before the blank line replaces the first.
 */
export class EventFramer {
  private buffer = '';
  private eventType = '';
  private eventData = '';

  constructor(private readonly onEvent: FramedEventListener) {}

  push(chunk: string): void {
    this.buffer += chunk;
    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      let line = this.buffer.slice(0, newline);
      this.buffer = this.buffer.slice(newline + 1);
      if (line.endsWith('\r')) line = line.slice(0, -1);
      this.processLine(line);
      newline = this.buffer.indexOf('\n');
    }
  }

  /** Discard any partial line and pending fields (stream ended mid-event). */
  reset(): void {
    this.buffer = '';
    this.eventType = '';
    this.eventData = '';
  }

  private processLine(line: string): void {
    if (line.startsWith(':')) return;

    if (line.startsWith('event: ')) {
      this.eventType = line.slice('event: '.length);
    } else if (line.startsWith('data: ')) {
      this.eventData = line.slice('data: '.length);
    } else if (line === '' && this.eventType !== '' && this.eventData !== '') {
      const event: FramedEvent = { type: this.eventType, data: this.eventData };
      this.eventType = '';
      this.eventData = '';
      this.onEvent(event);
    }
  }
}

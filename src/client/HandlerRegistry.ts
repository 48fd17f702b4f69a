import type { Logger } from 'pino';
import type { z } from 'zod';

export type EventHandler = (data: Buffer) => void | Promise<void>;

/**
 * Maps event types to callbacks. Callbacks run one after another in the order
 * they were added; one failing does not stop the rest.
 */
export class HandlerRegistry {
  private readonly handlers = new Map<string, EventHandler[]>();

  constructor(private readonly logger: Logger) {}

  add(eventType: string, handler: EventHandler): void {
    const list = this.handlers.get(eventType);
    if (list) {
      list.push(handler);
    } else {
      this.handlers.set(eventType, [handler]);
    }
  }

  /** Parse the payload as JSON and validate it with `schema` before calling `handler`. */
  addJson<S extends z.ZodTypeAny>(
    eventType: string,
    schema: S,
    handler: (value: z.output<S>) => void | Promise<void>,
  ): void {
    this.add(eventType, async data => {
      const parsed = schema.safeParse(JSON.parse(data.toString('utf8')));
      if (!parsed.success) {
        throw new Error(`invalid ${eventType} payload: ${parsed.error.message}`);
      }
      await handler(parsed.data);
    });
  }

  count(eventType: string): number {
    return this.handlers.get(eventType)?.length ?? 0;
  }

  async dispatch(eventType: string, data: Buffer): Promise<void> {
    const list = this.handlers.get(eventType);
    if (!list || list.length === 0) {
      this.logger.debug({ eventType }, 'received event without handler');
      return;
    }

    // Copy so handlers added mid-dispatch only see later events
    for (const handler of [...list]) {
      try {
        await handler(data);
      } catch (err) {
        this.logger.error({ eventType, err }, 'event handler failed');
      }
    }
  }
}

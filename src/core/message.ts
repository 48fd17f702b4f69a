import { InvalidMessageError } from './errors.js';

export const CONNECTED_EVENT = 'connected';
export const KEEPALIVE_FRAME = ': keepalive\n\n';

export interface Message {
  eventType: string;
  data: unknown;
}

export interface ConnectedPayload {
  client_id: string;
}

/**
 * Validates a message and serializes its payload once.
 * Returns the JSON text that every recipient's frame shares.
 */
export function serializeMessage(msg: Message): string {
  if (!msg.eventType) {
    throw new InvalidMessageError('eventType cannot be empty');
  }
  if (/[\r\n]/.test(msg.eventType)) {
    throw new InvalidMessageError('eventType cannot contain line breaks');
  }
  if (msg.data === undefined || msg.data === null) {
    throw new InvalidMessageError('data cannot be empty');
  }

  let json: string | undefined;
  try {
    json = JSON.stringify(msg.data);
  } catch (err) {
    throw new InvalidMessageError('data is not JSON-serializable', { cause: err });
  }
  // JSON.stringify returns undefined for functions and symbols
  if (json === undefined) {
    throw new InvalidMessageError('data is not JSON-serializable');
  }
  return json;
}

export function formatEvent(eventType: string, json: string): string {
  return `event: ${eventType}\ndata: ${json}\n\n`;
}

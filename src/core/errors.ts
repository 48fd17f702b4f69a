/**
 * Error taxonomy shared by the relay server and the agent client.
 * Every error carries a stable `code` so HTTP routes and callers can branch
 * without `instanceof` checks across module boundaries.
 */

export type SseRelayErrorCode =
  | 'CAPACITY_EXCEEDED'
  | 'DUPLICATE_CONNECTION'
  | 'INVALID_MESSAGE'
  | 'NO_MATCHING_CLIENTS'
  | 'PARTIAL_DELIVERY'
  | 'DELIVERY_TIMEOUT'
  | 'STREAMING_UNSUPPORTED'
  | 'CONNECTION_EXHAUSTED'
  | 'CLIENT_CLOSED';

export class SseRelayError extends Error {
  readonly code: SseRelayErrorCode;

  constructor(code: SseRelayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class CapacityExceededError extends SseRelayError {
  readonly maxConnections: number;

  constructor(maxConnections: number) {
    super('CAPACITY_EXCEEDED', `maximum connections (${maxConnections}) reached`);
    this.maxConnections = maxConnections;
  }
}

export class DuplicateConnectionError extends SseRelayError {
  readonly connectionId: string;

  constructor(connectionId: string) {
    super('DUPLICATE_CONNECTION', `connection ${connectionId} is already registered`);
    this.connectionId = connectionId;
  }
}

export class InvalidMessageError extends SseRelayError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super('INVALID_MESSAGE', `invalid message: ${reason}`, options);
  }
}

export class NoMatchingClientsError extends SseRelayError {
  readonly requestedIds: readonly string[];

  constructor(requestedIds: readonly string[]) {
    super('NO_MATCHING_CLIENTS', 'no clients found from the specified IDs');
    this.requestedIds = requestedIds;
  }
}

/** Some recipients of a send failed and were evicted. `cause` is the first failure. */
export class PartialDeliveryError extends SseRelayError {
  readonly failed: number;
  readonly total: number;
  readonly failedIds: readonly string[];

  constructor(failedIds: readonly string[], total: number, cause: unknown) {
    super(
      'PARTIAL_DELIVERY',
      `failed to deliver to ${failedIds.length}/${total} clients: ${describeCause(cause)}`,
      { cause },
    );
    this.failed = failedIds.length;
    this.total = total;
    this.failedIds = failedIds;
  }
}

export class DeliveryTimeoutError extends SseRelayError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('DELIVERY_TIMEOUT', `delivery deadline of ${timeoutMs}ms exceeded`);
    this.timeoutMs = timeoutMs;
  }
}

export class StreamingUnsupportedError extends SseRelayError {
  constructor() {
    super('STREAMING_UNSUPPORTED', 'streaming unsupported: response is not writable');
  }
}

export class ConnectionExhaustedError extends SseRelayError {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(
      'CONNECTION_EXHAUSTED',
      `could not connect after ${attempts} attempts: ${describeCause(cause)}`,
      { cause },
    );
    this.attempts = attempts;
  }
}

export class ClientClosedError extends SseRelayError {
  constructor() {
    super('CLIENT_CLOSED', 'client was closed');
  }
}

export function isSseRelayError(err: unknown): err is SseRelayError {
  return err instanceof SseRelayError;
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

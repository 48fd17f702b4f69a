/**
 * Delay before retry `attempt` (1-based): initial * 2^(attempt-1), capped at max.
 */
export function backoffDelay(attempt: number, initialMs: number, maxMs: number): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(initialMs * 2 ** exponent, maxMs);
}

export class Backoff {
  private current: number;

  constructor(
    private readonly initialMs: number,
    private readonly maxMs: number,
  ) {
    this.current = Math.min(initialMs, maxMs);
  }

  /** Current delay; the next call to `next()` returns this value. */
  get delayMs(): number {
    return this.current;
  }

  /** Return the delay to wait now and double the stored delay for next time. */
  next(): number {
    const delay = this.current;
    this.current = Math.min(this.current * 2, this.maxMs);
    return delay;
  }

  reset(): void {
    this.current = Math.min(this.initialMs, this.maxMs);
  }
}

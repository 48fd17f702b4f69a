import { describe, it, expect } from 'vitest';
import { Backoff, backoffDelay } from '../../src/core/backoff.js';

describe('backoffDelay', () => {
  it('doubles from the initial delay', () => {
    expect([1, 2, 3, 4].map(k => backoffDelay(k, 1_000, 60_000))).toEqual([1_000, 2_000, 4_000, 8_000]);
  });

  it('caps at the maximum delay', () => {
    expect(backoffDelay(7, 1_000, 60_000)).toBe(60_000);
    expect(backoffDelay(20, 1_000, 60_000)).toBe(60_000);
  });
});

describe('Backoff', () => {
  it('follows min(initial * 2^(k-1), max)', () => {
    const backoff = new Backoff(1_000, 60_000);
    const delays = Array.from({ length: 8 }, () => backoff.next());
    expect(delays).toEqual([1_000, 2_000, 4_000, 8_000, 16_000, 32_000, 60_000, 60_000]);
    delays.forEach((delay, i) => expect(delay).toBe(backoffDelay(i + 1, 1_000, 60_000)));
  });

  it('reports the delay the next attempt will use', () => {
    const backoff = new Backoff(500, 60_000);
    expect(backoff.delayMs).toBe(500);
    backoff.next();
    expect(backoff.delayMs).toBe(1_000);
  });

  it('reset returns to the initial delay', () => {
    const backoff = new Backoff(100, 1_000);
    backoff.next();
    backoff.next();
    backoff.reset();
    expect(backoff.next()).toBe(100);
  });

  it('never starts above the maximum', () => {
    const backoff = new Backoff(5_000, 1_000);
    expect(backoff.next()).toBe(1_000);
  });
});

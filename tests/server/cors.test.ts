import { describe, it, expect } from 'vitest';
import { resolveAllowedOrigin } from '../../src/server/cors.js';

describe('resolveAllowedOrigin', () => {
  it('allows any origin when no list is configured', () => {
    expect(resolveAllowedOrigin([], 'http://app.test')).toBe('*');
    expect(resolveAllowedOrigin([], undefined)).toBe('*');
  });

  it('echoes a listed origin', () => {
    expect(resolveAllowedOrigin(['http://a.test', 'http://b.test'], 'http://b.test')).toBe('http://b.test');
  });

  it('echoes any origin when the list contains a wildcard', () => {
    expect(resolveAllowedOrigin(['*'], 'http://c.test')).toBe('http://c.test');
  });

  it('answers unlisted origins with the first configured one', () => {
    expect(resolveAllowedOrigin(['http://a.test', 'http://b.test'], 'http://evil.test')).toBe('http://a.test');
    expect(resolveAllowedOrigin(['http://a.test'], undefined)).toBe('http://a.test');
  });
});

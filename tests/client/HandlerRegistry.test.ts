import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { HandlerRegistry } from '../../src/client/HandlerRegistry.js';
import { silentLogger } from '../helpers.js';

const payload = (text: string) => Buffer.from(text, 'utf8');

describe('HandlerRegistry', () => {
  let registry: HandlerRegistry;

  beforeEach(() => {
    registry = new HandlerRegistry(silentLogger);
  });

  it('drops events that have no handler', async () => {
    await expect(registry.dispatch('unknown', payload('{}'))).resolves.toBeUndefined();
    expect(registry.count('unknown')).toBe(0);
  });

  it('invokes handlers in registration order with the payload bytes', async () => {
    const calls: string[] = [];
    registry.add('ping', data => {
      calls.push(`first:${data.toString('utf8')}`);
    });
    registry.add('ping', data => {
      calls.push(`second:${data.toString('utf8')}`);
    });

    await registry.dispatch('ping', payload('{"x":1}'));

    expect(calls).toEqual(['first:{"x":1}', 'second:{"x":1}']);
  });

  it('allows the same handler twice', async () => {
    let count = 0;
    const handler = () => {
      count++;
    };
    registry.add('ping', handler);
    registry.add('ping', handler);

    await registry.dispatch('ping', payload('1'));

    expect(count).toBe(2);
  });

  it('keeps going after a handler throws or rejects', async () => {
    const calls: string[] = [];
    registry.add('ping', () => {
      throw new Error('boom');
    });
    registry.add('ping', async () => {
      throw new Error('async boom');
    });
    registry.add('ping', () => {
      calls.push('third');
    });

    await registry.dispatch('ping', payload('1'));

    expect(calls).toEqual(['third']);
  });

  it('waits for an async handler before calling the next one', async () => {
    const calls: string[] = [];
    registry.add('ping', async () => {
      await new Promise(resolve => setTimeout(resolve, 5));
      calls.push('slow');
    });
    registry.add('ping', () => {
      calls.push('fast');
    });

    await registry.dispatch('ping', payload('1'));

    expect(calls).toEqual(['slow', 'fast']);
  });

  it('routes by event type', async () => {
    const calls: string[] = [];
    registry.add('a', () => {
      calls.push('a');
    });
    registry.add('b', () => {
      calls.push('b');
    });

    await registry.dispatch('b', payload('1'));

    expect(calls).toEqual(['b']);
  });

  describe('addJson', () => {
    const scanSchema = z.object({ start: z.string(), end: z.string() });

    it('passes the validated value', async () => {
      const received: Array<z.infer<typeof scanSchema>> = [];
      registry.addJson('scan', scanSchema, value => {
        received.push(value);
      });

      await registry.dispatch('scan', payload('{"start":"10.0.0.1","end":"10.0.0.9"}'));

      expect(received).toEqual([{ start: '10.0.0.1', end: '10.0.0.9' }]);
    });

    it('skips the callback for invalid payloads without stopping later handlers', async () => {
      const calls: string[] = [];
      registry.addJson('scan', scanSchema, () => {
        calls.push('json');
      });
      registry.add('scan', () => {
        calls.push('raw');
      });

      await registry.dispatch('scan', payload('{"start":1}'));
      await registry.dispatch('scan', payload('not json'));

      expect(calls).toEqual(['raw', 'raw']);
    });
  });
});

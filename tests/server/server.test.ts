import { afterEach, describe, it, expect, vi } from 'vitest';
import { buildServer } from '../../src/server/server.js';
import { silentLogger } from '../helpers.js';

describe('buildServer', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('starts without Fastify deprecation warnings', async () => {
    const emitWarning = vi.spyOn(process, 'emitWarning').mockImplementation(() => {});

    const { app } = await buildServer({ logger: silentLogger });
    await app.ready();
    await app.close();

    const codes = emitWarning.mock.calls.flat().filter(arg => typeof arg === 'string' && arg.startsWith('FSTDEP'));
    expect(codes).toEqual([]);
  });

  it('gives each server its own registry', async () => {
    const first = await buildServer({ logger: silentLogger });
    const second = await buildServer({ logger: silentLogger });

    expect(first.registry).not.toBe(second.registry);

    await first.app.close();
    await second.app.close();
  });
});

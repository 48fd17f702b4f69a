#!/usr/bin/env node
import { pino } from 'pino';
import { loadClientConfig } from '../core/config.js';
import { SseClient } from './SseClient.js';

/**
 * Agent entry point: connects to the relay and logs every event type listed in
 * SSE_EVENTS (comma separated). Real agents register their own handlers instead.
 */

const logger = pino({ name: 'sse-agent', level: process.env.LOG_LEVEL ?? 'info' });
const config = loadClientConfig();

const client = new SseClient({
  ...config,
  logger,
  onError: err => {
    logger.fatal({ err }, 'relay unreachable');
    client.close();
    process.exitCode = 1;
  },
});

const eventTypes = (process.env.SSE_EVENTS ?? '').split(',').map(s => s.trim()).filter(Boolean);
for (const eventType of eventTypes) {
  client.addEventHandler(eventType, data => {
    logger.info({ eventType, payload: data.toString('utf8') }, 'event received');
  });
}

const shutdown = (): void => {
  logger.info('shutting down');
  client.close();
};
process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

try {
  await client.connect();
} catch (err) {
  logger.fatal({ err }, 'could not connect to relay');
  process.exitCode = 1;
}

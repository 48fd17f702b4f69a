import { pino } from 'pino';
import type { FastifyBaseLogger } from 'fastify';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export function createLogger(name: string, level: LogLevel = 'info'): FastifyBaseLogger {
  return pino({ name, level });
}

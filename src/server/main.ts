#!/usr/bin/env node
import { loadServerConfig } from '../core/config.js';
import { startServer } from './server.js';

const config = loadServerConfig();
const { app } = await startServer({ config });

const shutdown = (signal: string): void => {
  app.log.info({ signal }, 'shutting down');
  app.close().then(
    () => process.exit(0),
    (err: unknown) => {
      app.log.error({ err }, 'error during shutdown');
      process.exit(1);
    },
  );
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

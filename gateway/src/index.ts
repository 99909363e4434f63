// Load environment variables first
import './env-loader.js';

import { logger } from '@dialtone/logger';
import { DialtoneApplication } from './main.js';

async function start() {
  const app = new DialtoneApplication();

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    app
      .shutdown()
      .catch((error: unknown) => logger.error({ err: String(error) }, 'Shutdown failed'))
      .finally(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled Rejection');
  });

  process.on('uncaughtException', (error) => {
    logger.error({ err: error.message, stack: error.stack }, 'Uncaught Exception');
    process.exit(1);
  });

  await app.initialize();
}

start().catch((error: unknown) => {
  logger.error({ err: error instanceof Error ? error.message : String(error) }, 'Failed to start dialtone');
  process.exit(1);
});

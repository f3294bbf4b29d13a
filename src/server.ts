// src/server.ts

import express from 'express';
import { createReviewGateway } from './bootstrap';
import { errorMessage } from './errors';

function main(): void {
  const gateway = createReviewGateway();
  const { settings, logger } = gateway;

  const app = express();
  app.disable('x-powered-by');
  app.use(gateway.createRouter());

  const server = app.listen(settings.port, () => {
    logger.info(
      { port: settings.port, provider: settings.llmProvider, rateLimitPerMinute: settings.rateLimitPerMinute },
      'Review gateway listening',
    );
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

try {
  main();
} catch (e) {
  console.error(`🔴 Fatal Error: ${errorMessage(e)}`);
  process.exit(1);
}

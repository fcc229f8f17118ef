/**
 * Groundwork API Server
 *
 * Loads .env, builds the container and serves the Hono app on Node.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from '@/app';
import { loadConfig } from '@/config';
import { createContainer } from '@/container';
import { logger } from '@/utils/logger';

const config = loadConfig();
const container = createContainer(config);
const app = createApp(container);

// Capture server reference for graceful shutdown with request drain
const server = serve({
  fetch: app.fetch,
  port: config.port,
});

logger.info('Groundwork API server running', {
  port: config.port,
  store: container.store.kind,
  search: container.repositories.search.status().state,
  generation: container.repositories.generation.status().state,
});

function gracefulShutdown(signal: string) {
  logger.info(`${signal} received: shutting down gracefully...`);
  server.close(() => {
    logger.info('HTTP server closed, draining connections');
    container.store
      .close()
      .then(() => {
        logger.info('Message store closed');
        process.exit(0);
      })
      .catch((err) => {
        logger.error('Error closing message store', { error: String(err) });
        process.exit(1);
      });
  });
  // Force exit after 10 seconds if drain takes too long
  setTimeout(() => {
    logger.error('Forced shutdown after 10s timeout');
    process.exit(1);
  }, 10_000).unref();
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

#!/usr/bin/env node

import { logger } from '@sessiongate/observability';
import { createServerFromEnvironment } from './server/bootstrap.js';

async function main() {
  try {
    const server = await createServerFromEnvironment();
    await server.start();

    const handleShutdown = async (signal: string) => {
      logger.info('Received shutdown signal, shutting down gracefully', { signal });
      try {
        await server.stop();
        logger.info('Server stopped successfully');
        process.exit(0);
      } catch (error) {
        logger.error('Error during shutdown', error);
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void handleShutdown('SIGINT'));
    process.on('SIGTERM', () => void handleShutdown('SIGTERM'));
  } catch (error) {
    logger.error('Server startup failed', error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error('Unhandled server error', error);
  process.exit(1);
});

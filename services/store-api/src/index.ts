import { getCodec } from '@bookstore/shared';
import { createApp } from './app';
import { CatalogStore } from './catalog/CatalogStore';
import { config } from './config';
import { logger } from './logger';

function main(): void {
  // Building the codec checks the wire schema against the type registry
  const codec = getCodec();
  const app = createApp({ store: new CatalogStore(), codec });

  const server = app.listen(config.port, () => {
    logger.info({ port: config.port, protocolVersion: codec.version }, 'Store API started successfully');
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down Store API');
    server.close((err) => {
      if (err) {
        logger.error({ error: err }, 'Failed to close Store API cleanly');
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

try {
  main();
} catch (error) {
  logger.error({ error }, 'Failed to start Store API');
  process.exit(1);
}

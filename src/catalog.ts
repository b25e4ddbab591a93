import Fastify from 'fastify';

import { loadConfig, catalogPlugin } from './infrastructure/index.js';
import { productRoutes } from './interfaces/http/index.js';

/**
 * Bootstrap the catalog server. It owns the product collection; the
 * reviews server only writes the derived `rating` field.
 */
async function main(): Promise<void> {
  const config = loadConfig();

  const fastify = Fastify({
    logger: {
      level: config.LOG_LEVEL,
    },
  });

  await fastify.register(catalogPlugin, {
    url: config.CATALOG_MONGODB_URL,
    database: config.CATALOG_MONGODB_DATABASE,
    collection: config.CATALOG_MONGODB_COLLECTION,
  });

  await fastify.register(productRoutes);

  fastify.get('/health', async () => ({ status: 'healthy', version: config.APP_VERSION }));

  const shutdown = (signal: string): void => {
    fastify.log.info({ signal }, 'Shutting down catalog server...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await fastify.listen({
    host: config.HOST,
    port: config.CATALOG_PORT,
  });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start catalog server', err);
  process.exit(1);
});

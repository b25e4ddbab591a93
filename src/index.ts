import Fastify from 'fastify';

import {
  loadConfig,
  dbPlugin,
  createActiveReviewReader,
  catalogGatewayPlugin,
  eventsPlugin,
  SubscriptionRegistry,
  createMainScope,
  runInScope,
} from './infrastructure/index.js';
import { setupEventHandlers } from './application/index.js';
import { reviewRoutes, healthRoutes } from './interfaces/http/index.js';

const scope = createMainScope();

/**
 * Bootstrap the reviews server.
 *
 * Order:
 * 1) Infrastructure plugins (db, catalog, then the event bus so it drains first on close)
 * 2) Event handlers
 * 3) HTTP routes
 * 4) Shutdown signals
 * 5) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();

  const fastify = Fastify({
    logger: {
      level: config.LOG_LEVEL,
    },
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(dbPlugin, { databaseUrl: config.DATABASE_URL });
  await fastify.register(catalogGatewayPlugin, {
    url: config.CATALOG_MONGODB_URL,
    database: config.CATALOG_MONGODB_DATABASE,
    collection: config.CATALOG_MONGODB_COLLECTION,
  });

  const registry = new SubscriptionRegistry(fastify.log);
  await fastify.register(eventsPlugin, {
    registry,
    scope,
    workers: config.EVENT_WORKERS,
    handlerTimeoutMs: config.EVENT_HANDLER_TIMEOUT_MS,
    drainTimeoutMs: config.EVENT_DRAIN_TIMEOUT_MS,
  });

  setupEventHandlers(registry, {
    reviews: createActiveReviewReader(fastify.db),
    catalog: fastify.catalog,
    log: fastify.log,
  });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(reviewRoutes);
  await fastify.register(healthRoutes, { version: config.APP_VERSION });

  // --------------------------------------------------
  // Shutdown
  // --------------------------------------------------

  const shutdown = (signal: string): void => {
    fastify.log.info({ signal }, 'Shutting down reviews server...');
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

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await fastify.listen({
    host: config.HOST,
    port: config.PORT,
  });
}

runInScope(scope, main).catch((err: unknown) => {
  console.error('Fatal: failed to start reviews server', err);
  process.exit(1);
});

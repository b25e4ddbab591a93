import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { createCatalogClient } from './client.js';
import type { CatalogClientOptions, ProductCollection } from './client.js';

/**
 * Fastify plugin that manages the catalog server's MongoDB connection.
 *
 * - Connects on start (fatal if unreachable: the catalog owns this store).
 * - Decorates `fastify.products` for the product routes.
 * - Closes the client on server shutdown.
 */
async function catalogPlugin(fastify: FastifyInstance, opts: CatalogClientOptions): Promise<void> {
  const { client, products } = createCatalogClient(opts);

  await client.connect();
  await products.createIndex({ category: 1 });
  await products.createIndex({ created_at: -1 });
  fastify.log.info({ database: opts.database, collection: opts.collection }, 'Catalog MongoDB connected');

  fastify.decorate('products', products);

  fastify.addHook('onClose', async () => {
    await client.close();
    fastify.log.info('Catalog MongoDB disconnected');
  });
}

export default fp(catalogPlugin, {
  name: 'catalog',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.products` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    products: ProductCollection;
  }
}

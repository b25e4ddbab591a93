import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { CatalogGateway } from './catalog-gateway.js';
import type { CatalogClientOptions } from './client.js';

/**
 * Fastify plugin for the reviews server's catalog connection.
 *
 * Decorates `fastify.catalog`. A failed connection is logged, not fatal.
 */
async function catalogGatewayPlugin(fastify: FastifyInstance, opts: CatalogClientOptions): Promise<void> {
  const gateway = new CatalogGateway(opts, fastify.log);
  await gateway.connect();

  fastify.decorate('catalog', gateway);

  fastify.addHook('onClose', async () => {
    await gateway.disconnect();
  });
}

export default fp(catalogGatewayPlugin, {
  name: 'catalog-gateway',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    catalog: CatalogGateway;
  }
}

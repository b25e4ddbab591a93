import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { sql } from 'drizzle-orm';

export interface HealthRoutesOptions {
  version: string;
}

/**
 * GET /health - database and catalog status.
 *
 * Always 200; `status` is `healthy` only when the database answers.
 */
async function healthRoutes(fastify: FastifyInstance, opts: HealthRoutesOptions): Promise<void> {
  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    let database: 'connected' | 'disconnected' = 'connected';
    try {
      await fastify.db.execute(sql`select 1`);
    } catch (err) {
      fastify.log.error({ err }, 'Health check: database query failed');
      database = 'disconnected';
    }

    return reply.status(200).send({
      status: database === 'connected' ? 'healthy' : 'unhealthy',
      database,
      catalog: fastify.catalog.isConnected() ? 'connected' : 'disconnected',
      version: opts.version,
    });
  });
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['db', 'catalog-gateway'],
  fastify: '5.x',
});

import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  createProductSchema,
  updateProductSchema,
  listProductsQuerySchema,
  createProduct,
  listProducts,
  getProduct,
  updateProduct,
  removeProduct,
} from '../../application/index.js';

type ProductParams = { Params: { product_id: string } };

/**
 * Catalog routes.
 *
 * GET    /api/v1/products                       - paginated list
 * GET    /api/v1/products/:product_id           - single product
 * POST   /api/v1/admin/products                 - create
 * PUT    /api/v1/admin/products/:product_id     - partial update
 * DELETE /api/v1/admin/products/:product_id     - delete
 */
async function productRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/products',
    async (request: FastifyRequest<{ Querystring: unknown }>, reply: FastifyReply) => {
      const parsed = listProductsQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const page = await listProducts(fastify.products, parsed.data);
      return reply.status(200).send(page);
    },
  );

  fastify.get(
    '/api/v1/products/:product_id',
    async (request: FastifyRequest<ProductParams>, reply: FastifyReply) => {
      const product = await getProduct(fastify.products, request.params.product_id);
      if (product === null) {
        return reply.status(404).send({ error: 'Product not found' });
      }
      return reply.status(200).send(product);
    },
  );

  fastify.post(
    '/api/v1/admin/products',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = createProductSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const product = await createProduct(fastify.products, parsed.data);
      return reply.status(201).send(product);
    },
  );

  fastify.put(
    '/api/v1/admin/products/:product_id',
    async (request: FastifyRequest<ProductParams & { Body: unknown }>, reply: FastifyReply) => {
      const parsed = updateProductSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const product = await updateProduct(fastify.products, request.params.product_id, parsed.data);
      if (product === null) {
        return reply.status(404).send({ error: 'Product not found' });
      }
      return reply.status(200).send(product);
    },
  );

  fastify.delete(
    '/api/v1/admin/products/:product_id',
    async (request: FastifyRequest<ProductParams>, reply: FastifyReply) => {
      const deleted = await removeProduct(fastify.products, request.params.product_id);
      if (!deleted) {
        return reply.status(404).send({ error: 'Product not found' });
      }
      return reply.status(204).send();
    },
  );
}

export default fp(productRoutes, {
  name: 'product-routes',
  dependencies: ['catalog'],
  fastify: '5.x',
});

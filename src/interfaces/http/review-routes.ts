import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  createReviewSchema,
  updateReviewSchema,
  createCommentSchema,
  pageQuerySchema,
  createReview,
  listProductReviews,
  updateReview,
  deleteReview,
  addComment,
  listComments,
  getReviewSummary,
} from '../../application/index.js';
import type { ReviewServiceDeps } from '../../application/index.js';
import { UUID_RE, sendServiceError } from './reply.js';

type ProductParams = { Params: { product_id: string } };
type ReviewParams = { Params: { review_id: string } };

/**
 * Review and comment routes.
 *
 * POST   /api/v1/products/:product_id/reviews          - create review
 * GET    /api/v1/products/:product_id/reviews          - list active reviews
 * GET    /api/v1/products/:product_id/reviews/metrics  - rating summary
 * PUT    /api/v1/reviews/:review_id                    - partial update
 * DELETE /api/v1/reviews/:review_id                    - soft delete
 * POST   /api/v1/reviews/:review_id/comments           - add comment
 * GET    /api/v1/reviews/:review_id/comments           - list comments
 */
async function reviewRoutes(fastify: FastifyInstance): Promise<void> {
  const deps = (): ReviewServiceDeps => ({
    db: fastify.db,
    catalog: fastify.catalog,
    events: fastify.events,
    log: fastify.log,
  });

  // ── POST /api/v1/products/:product_id/reviews ───────────
  fastify.post(
    '/api/v1/products/:product_id/reviews',
    async (request: FastifyRequest<ProductParams & { Body: unknown }>, reply: FastifyReply) => {
      const parsed = createReviewSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const result = await createReview(deps(), request.params.product_id, parsed.data);
      if (!result.ok) {
        return sendServiceError(reply, result.error);
      }
      return reply.status(201).send(result.value);
    },
  );

  // ── GET /api/v1/products/:product_id/reviews ────────────
  fastify.get(
    '/api/v1/products/:product_id/reviews',
    async (request: FastifyRequest<ProductParams & { Querystring: unknown }>, reply: FastifyReply) => {
      const parsed = pageQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const page = await listProductReviews(deps(), request.params.product_id, parsed.data);
      return reply.status(200).send(page);
    },
  );

  // ── GET /api/v1/products/:product_id/reviews/metrics ────
  fastify.get(
    '/api/v1/products/:product_id/reviews/metrics',
    async (request: FastifyRequest<ProductParams>, reply: FastifyReply) => {
      const summary = await getReviewSummary(fastify.db, request.params.product_id);
      return reply.status(200).send(summary);
    },
  );

  // ── PUT /api/v1/reviews/:review_id ──────────────────────
  fastify.put(
    '/api/v1/reviews/:review_id',
    async (request: FastifyRequest<ReviewParams & { Body: unknown }>, reply: FastifyReply) => {
      const { review_id } = request.params;
      if (!UUID_RE.test(review_id)) {
        return reply.status(400).send({ error: 'review_id must be a valid UUID' });
      }

      const parsed = updateReviewSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const result = await updateReview(deps(), review_id, parsed.data);
      if (!result.ok) {
        return sendServiceError(reply, result.error);
      }
      return reply.status(200).send(result.value);
    },
  );

  // ── DELETE /api/v1/reviews/:review_id ───────────────────
  fastify.delete(
    '/api/v1/reviews/:review_id',
    async (request: FastifyRequest<ReviewParams>, reply: FastifyReply) => {
      const { review_id } = request.params;
      if (!UUID_RE.test(review_id)) {
        return reply.status(400).send({ error: 'review_id must be a valid UUID' });
      }

      const result = await deleteReview(deps(), review_id);
      if (!result.ok) {
        return sendServiceError(reply, result.error);
      }
      return reply.status(204).send();
    },
  );

  // ── POST /api/v1/reviews/:review_id/comments ────────────
  fastify.post(
    '/api/v1/reviews/:review_id/comments',
    async (request: FastifyRequest<ReviewParams & { Body: unknown }>, reply: FastifyReply) => {
      const { review_id } = request.params;
      if (!UUID_RE.test(review_id)) {
        return reply.status(400).send({ error: 'review_id must be a valid UUID' });
      }

      const parsed = createCommentSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const result = await addComment(fastify.db, review_id, parsed.data);
      if (!result.ok) {
        return sendServiceError(reply, result.error);
      }
      return reply.status(201).send(result.value);
    },
  );

  // ── GET /api/v1/reviews/:review_id/comments ─────────────
  fastify.get(
    '/api/v1/reviews/:review_id/comments',
    async (request: FastifyRequest<ReviewParams & { Querystring: unknown }>, reply: FastifyReply) => {
      const { review_id } = request.params;
      if (!UUID_RE.test(review_id)) {
        return reply.status(400).send({ error: 'review_id must be a valid UUID' });
      }

      const parsed = pageQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const result = await listComments(fastify.db, review_id, parsed.data);
      if (!result.ok) {
        return sendServiceError(reply, result.error);
      }
      return reply.status(200).send(result.value);
    },
  );
}

export default fp(reviewRoutes, {
  name: 'review-routes',
  dependencies: ['db', 'catalog-gateway', 'events'],
  fastify: '5.x',
});

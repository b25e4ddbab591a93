import type { BaseLogger } from 'pino';
import type { Database, ReviewRow } from '../infrastructure/db/index.js';
import {
  userExists,
  findUserById,
  findReviewByUserAndProduct,
  insertReview,
  insertMetrics,
  findActiveReviewWithUser,
  queryActiveReviewsByProduct,
  updateReview as repoUpdateReview,
  updateVotes,
  softDeleteReview,
} from '../infrastructure/db/index.js';
import type { ReviewEvent, ReviewEventKind, ReviewEventPublisher, ReviewView } from '../domain/index.js';
import type { ProductLookup } from './ports.js';
import type { CreateReviewBody, UpdateReviewBody } from './review-schema.js';
import { reviewCreated, reviewUpdated, reviewDeleted } from './review-events.js';
import { buildReviewView } from './review-views.js';
import { resolvePage } from './pagination.js';
import type { PageParams } from './pagination.js';
import { ok, fail, notFound } from './result.js';
import type { ServiceResult } from './result.js';

export interface ReviewServiceDeps {
  db: Database;
  catalog: ProductLookup;
  /** Null when the event bus is not running; writes still succeed. */
  events: ReviewEventPublisher | null;
  log: BaseLogger;
}

export interface ReviewPage {
  reviews: ReviewView[];
  page: number;
  limit: number;
}

const UNIQUE_VIOLATION = '23505';

function hasCode(value: unknown, code: string): boolean {
  return typeof value === 'object'
    && value !== null
    && 'code' in value
    && value.code === code;
}

/** postgres.js raises the server error directly; drizzle may wrap it in `cause`. */
export function isUniqueViolation(err: unknown): boolean {
  if (hasCode(err, UNIQUE_VIOLATION)) return true;
  return err instanceof Error && hasCode(err.cause, UNIQUE_VIOLATION);
}

function duplicateReview(userId: string, productId: string): ServiceResult<never> {
  return fail('CONFLICT', `User ${userId} has already reviewed product ${productId}`);
}

/**
 * Builds an event and hands it to the bus. The write that produced the
 * event has already committed, so a build or publish failure is logged
 * and never fails the use case.
 */
function emit(
  deps: ReviewServiceDeps,
  kind: ReviewEventKind,
  productId: string,
  build: () => ReviewEvent,
): void {
  if (deps.events === null) {
    deps.log.debug({ kind, product_id: productId }, 'Event bus unavailable, event not published');
    return;
  }
  try {
    deps.events.publish(build());
  } catch (err) {
    deps.log.error({ err, kind, product_id: productId }, 'Failed to publish review event');
  }
}

async function viewOf(deps: ReviewServiceDeps, review: ReviewRow): Promise<ServiceResult<ReviewView>> {
  const user = await findUserById(deps.db, review.user_id);
  if (user === undefined) {
    return notFound('User', review.user_id);
  }
  return ok(await buildReviewView(deps.db, review, user));
}

/**
 * Creates a review and its metrics row, then publishes `ReviewCreated`.
 *
 * Fails with VALIDATION_ERROR for an unknown user or product and CONFLICT when
 * the user already reviewed the product (a soft-deleted review counts).
 */
export async function createReview(
  deps: ReviewServiceDeps,
  productId: string,
  body: CreateReviewBody,
): Promise<ServiceResult<ReviewView>> {
  if (!(await userExists(deps.db, body.user_id))) {
    return fail('VALIDATION_ERROR', `User with ID ${body.user_id} does not exist`);
  }
  if (!(await deps.catalog.productExists(productId))) {
    return fail('VALIDATION_ERROR', `Product with ID ${productId} does not exist`);
  }

  const existing = await findReviewByUserAndProduct(deps.db, body.user_id, productId);
  if (existing !== undefined) {
    return duplicateReview(body.user_id, productId);
  }

  let review: ReviewRow;
  try {
    review = await insertReview(deps.db, {
      product_id: productId,
      user_id: body.user_id,
      rating: body.rating,
      description: body.description,
    });
  } catch (err) {
    if (isUniqueViolation(err)) {
      return duplicateReview(body.user_id, productId);
    }
    throw err;
  }
  await insertMetrics(deps.db, review.id);

  deps.log.info({ review_id: review.id, product_id: productId }, 'Review created');

  emit(deps, 'ReviewCreated', review.product_id, () => reviewCreated({
    product_id: review.product_id,
    review_id: review.id,
    user_id: review.user_id,
    rating: review.rating,
    timestamp: review.created_at,
  }));

  return viewOf(deps, review);
}

/** Active reviews of a product, newest first. */
export async function listProductReviews(
  deps: Pick<ReviewServiceDeps, 'db'>,
  productId: string,
  params: PageParams,
): Promise<ReviewPage> {
  const { page, limit, offset } = resolvePage(params);
  const rows = await queryActiveReviewsByProduct(deps.db, productId, { limit, offset });
  const reviews = await Promise.all(rows.map((row) => buildReviewView(deps.db, row.review, row.user)));
  return { reviews, page, limit };
}

/**
 * Applies a partial update. `ReviewUpdated` is published whenever the body
 * carries a rating; description and vote edits alone publish nothing.
 */
export async function updateReview(
  deps: ReviewServiceDeps,
  reviewId: string,
  body: UpdateReviewBody,
): Promise<ServiceResult<ReviewView>> {
  const current = await findActiveReviewWithUser(deps.db, reviewId);
  if (current === undefined) {
    return notFound('Review', reviewId);
  }

  let review = current.review;
  if (body.rating !== undefined || body.description !== undefined) {
    const updated = await repoUpdateReview(deps.db, reviewId, {
      rating: body.rating,
      description: body.description,
    });
    if (updated === undefined) {
      return notFound('Review', reviewId);
    }
    review = updated;
  }

  if (body.upvotes !== undefined || body.downvotes !== undefined) {
    await updateVotes(deps.db, reviewId, { upvotes: body.upvotes, downvotes: body.downvotes });
  }

  if (body.rating !== undefined) {
    emit(deps, 'ReviewUpdated', review.product_id, () => reviewUpdated({
      product_id: review.product_id,
      review_id: review.id,
      rating: review.rating,
      timestamp: review.updated_at,
    }));
  }

  return ok(await buildReviewView(deps.db, review, current.user));
}

/** Soft-deletes a review and publishes `ReviewDeleted`. */
export async function deleteReview(
  deps: ReviewServiceDeps,
  reviewId: string,
): Promise<ServiceResult<{ id: string }>> {
  const deleted = await softDeleteReview(deps.db, reviewId);
  if (deleted === undefined) {
    return notFound('Review', reviewId);
  }

  deps.log.info({ review_id: reviewId, product_id: deleted.product_id }, 'Review deleted');

  emit(deps, 'ReviewDeleted', deleted.product_id, () => reviewDeleted({
    product_id: deleted.product_id,
    review_id: deleted.id,
    timestamp: deleted.updated_at,
  }));

  return ok({ id: deleted.id });
}

/** Single active review. */
export async function getReview(
  deps: Pick<ReviewServiceDeps, 'db'>,
  reviewId: string,
): Promise<ServiceResult<ReviewView>> {
  const found = await findActiveReviewWithUser(deps.db, reviewId);
  if (found === undefined) {
    return notFound('Review', reviewId);
  }
  return ok(await buildReviewView(deps.db, found.review, found.user));
}

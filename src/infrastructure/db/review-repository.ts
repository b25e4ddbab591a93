import { randomUUID } from 'node:crypto';
import { and, count, desc, eq } from 'drizzle-orm';
import type { Database } from './client.js';
import { reviews, users } from './schema.js';
import type { UserRow } from './user-repository.js';
import type { ActiveReviewReader } from '../../application/ports.js';

/** Row shape returned by review queries. */
export type ReviewRow = typeof reviews.$inferSelect;

export interface ReviewWithUser {
  review: ReviewRow;
  user: UserRow;
}

/** Fields accepted when creating a review (server assigns id, status and timestamps). */
export interface CreateReviewInput {
  product_id: string;
  user_id: string;
  rating: number;
  description: string;
}

/** Fields accepted for a partial update (all optional). */
export interface PatchReviewInput {
  rating?: number;
  description?: string;
}

export interface PaginationParams {
  limit: number;
  offset: number;
}

function isActive() {
  return eq(reviews.status, 'active');
}

export async function insertReview(db: Database, input: CreateReviewInput): Promise<ReviewRow> {
  const now = new Date();
  const [row] = await db.insert(reviews).values({
    id: randomUUID(),
    product_id: input.product_id,
    user_id: input.user_id,
    rating: input.rating,
    description: input.description,
    status: 'active',
    created_at: now,
    updated_at: now,
  }).returning();

  if (row === undefined) {
    throw new Error('Review insert returned no row');
  }
  return row;
}

/** Fetches an active review joined with its author. */
export async function findActiveReviewWithUser(
  db: Database,
  reviewId: string,
): Promise<ReviewWithUser | undefined> {
  const rows = await db
    .select({ review: reviews, user: users })
    .from(reviews)
    .innerJoin(users, eq(reviews.user_id, users.id))
    .where(and(eq(reviews.id, reviewId), isActive()))
    .limit(1);

  return rows[0];
}

/** Any review (active or not) by this user for this product. */
export async function findReviewByUserAndProduct(
  db: Database,
  userId: string,
  productId: string,
): Promise<ReviewRow | undefined> {
  const rows = await db
    .select()
    .from(reviews)
    .where(and(eq(reviews.user_id, userId), eq(reviews.product_id, productId)))
    .limit(1);

  return rows[0];
}

/**
 * Paginated active reviews for a product with their authors.
 * Ordering: newest first (created_at DESC).
 */
export async function queryActiveReviewsByProduct(
  db: Database,
  productId: string,
  pagination: PaginationParams,
): Promise<ReviewWithUser[]> {
  return db
    .select({ review: reviews, user: users })
    .from(reviews)
    .innerJoin(users, eq(reviews.user_id, users.id))
    .where(and(eq(reviews.product_id, productId), isActive()))
    .orderBy(desc(reviews.created_at))
    .limit(pagination.limit)
    .offset(pagination.offset);
}

/**
 * Ratings of every active review for a product.
 *
 * Unpaginated on purpose: the aggregate mean must see the full set.
 */
export async function findActiveRatingsByProduct(
  db: Database,
  productId: string,
): Promise<Array<{ rating: number }>> {
  return db
    .select({ rating: reviews.rating })
    .from(reviews)
    .where(and(eq(reviews.product_id, productId), isActive()));
}

export async function updateReview(
  db: Database,
  reviewId: string,
  input: PatchReviewInput,
): Promise<ReviewRow | undefined> {
  const setFields: Partial<typeof reviews.$inferInsert> = { updated_at: new Date() };
  if (input.rating !== undefined) setFields.rating = input.rating;
  if (input.description !== undefined) setFields.description = input.description;

  const rows = await db
    .update(reviews)
    .set(setFields)
    .where(and(eq(reviews.id, reviewId), isActive()))
    .returning();

  return rows[0];
}

/** Marks an active review inactive. Returns undefined if none matched. */
export async function softDeleteReview(db: Database, reviewId: string): Promise<ReviewRow | undefined> {
  const rows = await db
    .update(reviews)
    .set({ status: 'inactive', updated_at: new Date() })
    .where(and(eq(reviews.id, reviewId), isActive()))
    .returning();

  return rows[0];
}

/** Active review counts per star value for a product. */
export async function countRatingsByProduct(
  db: Database,
  productId: string,
): Promise<Array<{ rating: number; count: number }>> {
  const rows = await db
    .select({ rating: reviews.rating, count: count() })
    .from(reviews)
    .where(and(eq(reviews.product_id, productId), isActive()))
    .groupBy(reviews.rating);

  return rows.map((r) => ({ rating: r.rating, count: Number(r.count) }));
}

/** Adapts the relational store to the rating aggregation's read contract. */
export function createActiveReviewReader(db: Database): ActiveReviewReader {
  return {
    findActiveRatings: (productId) => findActiveRatingsByProduct(db, productId),
  };
}

import { randomUUID } from 'node:crypto';
import { eq, sql } from 'drizzle-orm';
import type { Database } from './client.js';
import { reviewMetrics } from './schema.js';

export type ReviewMetricsRow = typeof reviewMetrics.$inferSelect;

export interface VotesInput {
  upvotes?: number;
  downvotes?: number;
}

export async function insertMetrics(db: Database, reviewId: string): Promise<ReviewMetricsRow> {
  const [row] = await db.insert(reviewMetrics).values({
    id: randomUUID(),
    review_id: reviewId,
    upvotes: 0,
    downvotes: 0,
    comments_count: 0,
  }).returning();

  if (row === undefined) {
    throw new Error('Review metrics insert returned no row');
  }
  return row;
}

export async function findMetricsByReview(
  db: Database,
  reviewId: string,
): Promise<ReviewMetricsRow | undefined> {
  const rows = await db
    .select()
    .from(reviewMetrics)
    .where(eq(reviewMetrics.review_id, reviewId))
    .limit(1);

  return rows[0];
}

/** Overwrites the given vote counters. Returns the current row when nothing is set. */
export async function updateVotes(
  db: Database,
  reviewId: string,
  input: VotesInput,
): Promise<ReviewMetricsRow | undefined> {
  const setFields: Partial<typeof reviewMetrics.$inferInsert> = {};
  if (input.upvotes !== undefined) setFields.upvotes = input.upvotes;
  if (input.downvotes !== undefined) setFields.downvotes = input.downvotes;

  if (Object.keys(setFields).length === 0) {
    return findMetricsByReview(db, reviewId);
  }

  const rows = await db
    .update(reviewMetrics)
    .set(setFields)
    .where(eq(reviewMetrics.review_id, reviewId))
    .returning();

  return rows[0];
}

/** Atomic `comments_count + 1`. */
export async function incrementCommentsCount(
  db: Database,
  reviewId: string,
): Promise<ReviewMetricsRow | undefined> {
  const rows = await db
    .update(reviewMetrics)
    .set({ comments_count: sql`${reviewMetrics.comments_count} + 1` })
    .where(eq(reviewMetrics.review_id, reviewId))
    .returning();

  return rows[0];
}

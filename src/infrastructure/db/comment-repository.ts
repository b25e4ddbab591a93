import { randomUUID } from 'node:crypto';
import { desc, eq } from 'drizzle-orm';
import type { Database } from './client.js';
import { comments, users } from './schema.js';
import type { UserRow } from './user-repository.js';
import type { PaginationParams } from './review-repository.js';

export type CommentRow = typeof comments.$inferSelect;

export interface CommentWithUser {
  comment: CommentRow;
  user: UserRow;
}

export interface CreateCommentInput {
  review_id: string;
  user_id: string;
  description: string;
}

export async function insertComment(db: Database, input: CreateCommentInput): Promise<CommentRow> {
  const [row] = await db.insert(comments).values({
    id: randomUUID(),
    review_id: input.review_id,
    user_id: input.user_id,
    description: input.description,
    created_at: new Date(),
  }).returning();

  if (row === undefined) {
    throw new Error('Comment insert returned no row');
  }
  return row;
}

/** Comments on a review with their authors, newest first. */
export async function queryCommentsByReview(
  db: Database,
  reviewId: string,
  pagination: PaginationParams,
): Promise<CommentWithUser[]> {
  return db
    .select({ comment: comments, user: users })
    .from(comments)
    .innerJoin(users, eq(comments.user_id, users.id))
    .where(eq(comments.review_id, reviewId))
    .orderBy(desc(comments.created_at))
    .limit(pagination.limit)
    .offset(pagination.offset);
}

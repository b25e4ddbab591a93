import type { Database, ReviewRow, UserRow, CommentWithUser } from '../infrastructure/db/index.js';
import { findMetricsByReview, queryCommentsByReview } from '../infrastructure/db/index.js';
import type { CommentView, ReviewView, UserDetails } from '../domain/index.js';

const RECENT_COMMENTS = 5;

export function toUserDetails(user: UserRow): UserDetails {
  return { id: user.id, name: user.name, profile: user.profile };
}

export function toCommentView(row: CommentWithUser): CommentView {
  return {
    id: row.comment.id,
    user_details: toUserDetails(row.user),
    description: row.comment.description,
    created_at: row.comment.created_at,
  };
}

/**
 * Assembles the API view of a review: author, vote counters and the
 * latest comments. A review without a metrics row reports zeros.
 */
export async function buildReviewView(db: Database, review: ReviewRow, user: UserRow): Promise<ReviewView> {
  const [metrics, recent] = await Promise.all([
    findMetricsByReview(db, review.id),
    queryCommentsByReview(db, review.id, { limit: RECENT_COMMENTS, offset: 0 }),
  ]);

  return {
    id: review.id,
    product_id: review.product_id,
    user_details: toUserDetails(user),
    rating: review.rating,
    description: review.description,
    upvotes: metrics?.upvotes ?? 0,
    downvotes: metrics?.downvotes ?? 0,
    comments: {
      total: metrics?.comments_count ?? 0,
      data: recent.map(toCommentView),
    },
    created_at: review.created_at,
    updated_at: review.updated_at,
  };
}

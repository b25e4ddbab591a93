import type { Database } from '../infrastructure/db/index.js';
import {
  findUserById,
  findActiveReviewWithUser,
  insertComment,
  incrementCommentsCount,
  queryCommentsByReview,
} from '../infrastructure/db/index.js';
import type { CommentView } from '../domain/index.js';
import type { CreateCommentBody } from './review-schema.js';
import { toCommentView } from './review-views.js';
import { resolvePage } from './pagination.js';
import type { PageParams } from './pagination.js';
import { ok, notFound } from './result.js';
import type { ServiceResult } from './result.js';

export interface CommentPage {
  comments: CommentView[];
  page: number;
  limit: number;
}

/** Adds a comment to an active review and bumps its `comments_count`. */
export async function addComment(
  db: Database,
  reviewId: string,
  body: CreateCommentBody,
): Promise<ServiceResult<CommentView>> {
  const user = await findUserById(db, body.user_id);
  if (user === undefined) {
    return notFound('User', body.user_id);
  }
  if ((await findActiveReviewWithUser(db, reviewId)) === undefined) {
    return notFound('Review', reviewId);
  }

  const comment = await insertComment(db, {
    review_id: reviewId,
    user_id: body.user_id,
    description: body.description,
  });
  await incrementCommentsCount(db, reviewId);

  return ok(toCommentView({ comment, user }));
}

export async function listComments(
  db: Database,
  reviewId: string,
  params: PageParams,
): Promise<ServiceResult<CommentPage>> {
  if ((await findActiveReviewWithUser(db, reviewId)) === undefined) {
    return notFound('Review', reviewId);
  }
  const { page, limit, offset } = resolvePage(params);
  const rows = await queryCommentsByReview(db, reviewId, { limit, offset });
  return ok({ comments: rows.map(toCommentView), page, limit });
}

export { users, reviews, reviewMetrics, comments } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, Sql } from './client.js';
export { ensureSchema } from './migrate.js';
export { findUserById, userExists } from './user-repository.js';
export type { UserRow } from './user-repository.js';
export {
  insertReview,
  findActiveReviewWithUser,
  findReviewByUserAndProduct,
  queryActiveReviewsByProduct,
  findActiveRatingsByProduct,
  updateReview,
  softDeleteReview,
  countRatingsByProduct,
  createActiveReviewReader,
} from './review-repository.js';
export type {
  ReviewRow,
  ReviewWithUser,
  CreateReviewInput,
  PatchReviewInput,
  PaginationParams,
} from './review-repository.js';
export {
  insertMetrics,
  findMetricsByReview,
  updateVotes,
  incrementCommentsCount,
} from './metrics-repository.js';
export type { ReviewMetricsRow, VotesInput } from './metrics-repository.js';
export { insertComment, queryCommentsByReview } from './comment-repository.js';
export type { CommentRow, CommentWithUser, CreateCommentInput } from './comment-repository.js';
export { default as dbPlugin } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';

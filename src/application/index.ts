export { reviewCreated, reviewUpdated, reviewDeleted, reviewEventSchema } from './review-events.js';
export type { ReviewCreatedInput, ReviewUpdatedInput, ReviewDeletedInput } from './review-events.js';
export type { ActiveReviewReader, ProductRatingWriter, ProductLookup } from './ports.js';
export { ok, fail, notFound } from './result.js';
export type { ServiceResult, ServiceError, ServiceErrorCode } from './result.js';
export { RatingAggregator, averageRating } from './rating-aggregator.js';
export { setupEventHandlers, RATING_HANDLER_NAME } from './event-handlers.js';
export { resolvePage } from './pagination.js';
export type { PageParams, ResolvedPage } from './pagination.js';
export {
  createReviewSchema,
  updateReviewSchema,
  createCommentSchema,
  pageQuerySchema,
} from './review-schema.js';
export type { CreateReviewBody, UpdateReviewBody, CreateCommentBody, PageQuery } from './review-schema.js';
export {
  createReview,
  listProductReviews,
  getReview,
  updateReview,
  deleteReview,
  isUniqueViolation,
} from './review-service.js';
export type { ReviewServiceDeps, ReviewPage } from './review-service.js';
export { addComment, listComments } from './comment-service.js';
export type { CommentPage } from './comment-service.js';
export { getReviewSummary, summarizeRatings } from './review-metrics.js';
export { createProductSchema, updateProductSchema, listProductsQuerySchema } from './product-schema.js';
export type { CreateProductBody, UpdateProductBody, ListProductsQuery } from './product-schema.js';
export { createProduct, listProducts, getProduct, updateProduct, removeProduct } from './product-service.js';

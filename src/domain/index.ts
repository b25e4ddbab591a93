export { REVIEW_EVENT_KINDS } from './review-event.js';
export type {
  ReviewEvent,
  ReviewEventKind,
  ReviewEventOf,
  ReviewEventHandler,
  ReviewEventPublisher,
  ReviewCreated,
  ReviewUpdated,
  ReviewDeleted,
  Rating,
} from './review-event.js';
export { REVIEW_STATUSES } from './review.js';
export type {
  ReviewStatus,
  RatedReview,
  UserDetails,
  CommentView,
  ReviewView,
  RatingDistribution,
  ReviewSummary,
} from './review.js';
export type { Product, ProductPage } from './product.js';

import { z } from 'zod';

/**
 * Schema for POST /api/v1/products/:product_id/reviews.
 */
export const createReviewSchema = z.object({
  user_id: z.string().uuid(),
  rating: z.number().int().min(1).max(5),
  description: z.string().min(1).max(255),
});

export type CreateReviewBody = z.infer<typeof createReviewSchema>;

/**
 * Schema for PUT /api/v1/reviews/:review_id.
 * Every field is optional; vote counters overwrite the stored values.
 */
export const updateReviewSchema = z.object({
  rating: z.number().int().min(1).max(5).optional(),
  description: z.string().min(1).max(255).optional(),
  upvotes: z.number().int().min(0).optional(),
  downvotes: z.number().int().min(0).optional(),
});

export type UpdateReviewBody = z.infer<typeof updateReviewSchema>;

/**
 * Schema for POST /api/v1/reviews/:review_id/comments.
 */
export const createCommentSchema = z.object({
  user_id: z.string().uuid(),
  description: z.string().min(1).max(1000),
});

export type CreateCommentBody = z.infer<typeof createCommentSchema>;

/**
 * Querystring for paginated review and comment lists.
 * Values arrive as strings; both are optional.
 */
export const pageQuerySchema = z.object({
  page: z.coerce.number().int().min(1).optional(),
  limit: z.coerce.number().int().optional(),
});

export type PageQuery = z.infer<typeof pageQuerySchema>;

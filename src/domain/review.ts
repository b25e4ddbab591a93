/**
 * Relational review model as seen by the application layer.
 */

export const REVIEW_STATUSES = ['active', 'inactive'] as const;

/** `inactive` is the soft-deleted state; only `active` reviews count toward ratings. */
export type ReviewStatus = (typeof REVIEW_STATUSES)[number];

/** Minimal projection the rating aggregation needs from a review. */
export interface RatedReview {
  readonly rating: number;
}

export interface UserDetails {
  id: string;
  name: string;
  profile: string | null;
}

export interface CommentView {
  id: string;
  user_details: UserDetails;
  description: string;
  created_at: Date;
}

export interface ReviewView {
  id: string;
  product_id: string;
  user_details: UserDetails;
  rating: number;
  description: string;
  upvotes: number;
  downvotes: number;
  comments: {
    total: number;
    data: CommentView[];
  };
  created_at: Date;
  updated_at: Date;
}

/** Rating histogram keyed by star value. */
export type RatingDistribution = Record<'1' | '2' | '3' | '4' | '5', number>;

export interface ReviewSummary {
  total_reviews: number;
  average_rating: number;
  ratings: RatingDistribution;
}

import type { RatedReview } from '../domain/index.js';

/**
 * Narrow contracts between the rating aggregation and the two stores.
 */

/** Relational side: every active (not soft-deleted) review of a product, unpaginated. */
export interface ActiveReviewReader {
  findActiveRatings(productId: string): Promise<RatedReview[]>;
}

/** Catalog side: overwrite a product's aggregate rating. */
export interface ProductRatingWriter {
  /** False while the catalog store is unreachable or not yet connected. */
  isConnected(): boolean;
  /** True when `productId` has the shape of a catalog key. */
  isValidProductId(productId: string): boolean;
  /** Returns whether a product matched `productId`. */
  setProductRating(productId: string, rating: number | null, updatedAt: Date): Promise<boolean>;
}

/** Catalog side: existence check used when a review is created. */
export interface ProductLookup {
  productExists(productId: string): Promise<boolean>;
}

import type { BaseLogger } from 'pino';
import type { RatedReview, ReviewEvent, ReviewEventKind } from '../domain/index.js';
import type { ActiveReviewReader, ProductRatingWriter } from './ports.js';

/**
 * Mean of the ratings rounded to 2 decimals, or null for an empty set.
 *
 * Rounds the binary mean half to even: 29 / 8 gives 3.62, 11 / 3 gives 3.67.
 * A tie at the third decimal is only exact in binary when `2q + 1` is a
 * multiple of 25 (the mean is then a multiple of 1/8); any other tie in
 * the exact quotient is already off-centre as a double, and `toFixed`
 * rounds the double's exact value.
 */
export function averageRating(reviews: readonly RatedReview[]): number | null {
  if (reviews.length === 0) return null;

  const count = reviews.length;
  const scaled = reviews.reduce((sum, review) => sum + review.rating, 0) * 100;
  const quotient = Math.floor(scaled / count);
  const remainder = scaled % count;

  if (remainder * 2 === count && (quotient * 2 + 1) % 25 === 0) {
    return (quotient % 2 === 0 ? quotient : quotient + 1) / 100;
  }
  return Number((scaled / 100 / count).toFixed(2));
}

export interface RatingAggregatorDeps {
  reviews: ActiveReviewReader;
  catalog: ProductRatingWriter;
  log: BaseLogger;
  now?: () => Date;
}

/**
 * Recomputes a product's aggregate rating from its active reviews and
 * overwrites it in the catalog.
 *
 * Each run does one full read and at most one write, so repeated or
 * reordered runs for a product converge once reviews stop changing.
 * Every failure is logged here; `recompute` never rejects.
 */
export class RatingAggregator {
  private readonly now: () => Date;

  constructor(private readonly deps: RatingAggregatorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /** Event handler entry point. Async so the bus runs it through the bridge. */
  readonly handle = async (event: ReviewEvent): Promise<void> => {
    await this.recompute(event.product_id, event.kind);
  };

  async recompute(productId: string, trigger?: ReviewEventKind): Promise<void> {
    const { reviews, catalog, log } = this.deps;
    const context = { product_id: productId, kind: trigger };

    if (!catalog.isConnected()) {
      log.warn(context, 'Cannot update product rating: catalog store not connected');
      return;
    }

    let active: RatedReview[];
    try {
      active = await reviews.findActiveRatings(productId);
    } catch (err: unknown) {
      log.error({ ...context, err }, 'Failed to read active reviews for product');
      return;
    }

    const rating = averageRating(active);
    if (rating === null) {
      log.info(context, `No active reviews for product ${productId}, clearing rating`);
    } else {
      log.info(
        { ...context, rating, review_count: active.length },
        `Updating product ${productId} rating to ${rating} (from ${active.length} reviews)`,
      );
    }

    if (!catalog.isValidProductId(productId)) {
      log.error(context, `Invalid product id format: ${productId}`);
      return;
    }

    let matched: boolean;
    try {
      matched = await catalog.setProductRating(productId, rating, this.now());
    } catch (err: unknown) {
      log.error({ ...context, err }, 'Failed to write product rating to catalog');
      return;
    }

    if (!matched) {
      log.warn(context, `Product ${productId} not found in catalog, rating not stored`);
      return;
    }

    log.info({ ...context, rating }, `Updated rating for product ${productId}`);
  }
}

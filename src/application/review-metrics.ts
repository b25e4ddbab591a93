import type { Database } from '../infrastructure/db/index.js';
import { countRatingsByProduct } from '../infrastructure/db/index.js';
import type { RatingDistribution, ReviewSummary } from '../domain/index.js';

function emptyDistribution(): RatingDistribution {
  return { '1': 0, '2': 0, '3': 0, '4': 0, '5': 0 };
}

function bucketOf(rating: number): keyof RatingDistribution | null {
  switch (rating) {
    case 1: return '1';
    case 2: return '2';
    case 3: return '3';
    case 4: return '4';
    case 5: return '5';
    default: return null;
  }
}

/**
 * Folds per-star counts into a summary. The average is rounded to two
 * decimals and is 0 for a product with no reviews.
 */
export function summarizeRatings(counts: Array<{ rating: number; count: number }>): ReviewSummary {
  const ratings = emptyDistribution();
  let total = 0;
  let sum = 0;

  for (const { rating, count } of counts) {
    const bucket = bucketOf(rating);
    if (bucket === null) continue;
    ratings[bucket] += count;
    total += count;
    sum += rating * count;
  }

  const average_rating = total === 0 ? 0 : Math.round((sum * 100) / total) / 100;
  return { total_reviews: total, average_rating, ratings };
}

/** Use case: rating histogram over a product's active reviews. */
export async function getReviewSummary(db: Database, productId: string): Promise<ReviewSummary> {
  return summarizeRatings(await countRatingsByProduct(db, productId));
}

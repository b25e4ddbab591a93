import { REVIEW_EVENT_KINDS } from '../domain/index.js';
import type { SubscriptionRegistry } from '../infrastructure/events/index.js';
import { RatingAggregator } from './rating-aggregator.js';
import type { RatingAggregatorDeps } from './rating-aggregator.js';

export const RATING_HANDLER_NAME = 'updateProductRating';

/**
 * Registers the rating aggregation for every review event kind.
 *
 * Call once at startup, before the first publish; publishes made earlier
 * reach no handler. Idempotent: kinds that already carry the handler are
 * skipped. Returns the number of subscriptions added.
 */
export function setupEventHandlers(registry: SubscriptionRegistry, deps: RatingAggregatorDeps): number {
  const missing = REVIEW_EVENT_KINDS.filter((kind) => !registry.has(kind, RATING_HANDLER_NAME));
  if (missing.length === 0) {
    deps.log.debug('Event handlers already registered');
    return 0;
  }

  const aggregator = new RatingAggregator(deps);
  for (const kind of missing) {
    registry.subscribe(kind, aggregator.handle, RATING_HANDLER_NAME);
  }

  deps.log.info({ kinds: missing }, 'Event handlers registered');
  return missing.length;
}

import { describe, it, expect, beforeEach } from 'vitest';
import { setupEventHandlers } from '../../src/application/event-handlers.js';
import { reviewCreated, reviewUpdated, reviewDeleted } from '../../src/application/review-events.js';
import {
  EventBus,
  SubscriptionRegistry,
  DispatchExecutor,
  LoopBridge,
  createMainScope,
  runInScope,
} from '../../src/infrastructure/events/index.js';
import { InMemoryReviews, InMemoryCatalog } from '../fakes.js';
import { fakeLogger, PRODUCT_ID } from '../helpers.js';
import type { FakeLogger } from '../helpers.js';

/**
 * Review mutations go to the in-memory relational fake first, then the
 * event is published from the main scope, as the HTTP handlers do.
 */
describe('rating aggregation through the event bus', () => {
  let reviews: InMemoryReviews;
  let catalog: InMemoryCatalog;
  let log: FakeLogger;
  let bus: EventBus;
  const main = createMainScope();

  beforeEach(() => {
    reviews = new InMemoryReviews();
    catalog = new InMemoryCatalog();
    catalog.addProduct(PRODUCT_ID);
    log = fakeLogger();

    const registry = new SubscriptionRegistry(log);
    bus = new EventBus(registry, new DispatchExecutor(log, 10), new LoopBridge(1_000), log);
    setupEventHandlers(registry, { reviews, catalog, log });
  });

  function publishFromMain(publish: () => void): void {
    runInScope(main, publish);
  }

  it('first review sets the aggregate', async () => {
    reviews.put(PRODUCT_ID, 'a', 4);
    publishFromMain(() => bus.publish(reviewCreated({ product_id: PRODUCT_ID, review_id: 'a', user_id: 'user-a', rating: 4 })));
    await bus.whenIdle();

    expect(catalog.ratings.get(PRODUCT_ID)).toBe(4);
  });

  it('a new review moves the mean to 3.67', async () => {
    reviews.put(PRODUCT_ID, 'a', 4);
    reviews.put(PRODUCT_ID, 'b', 5);
    reviews.put(PRODUCT_ID, 'c', 2);
    publishFromMain(() => bus.publish(reviewCreated({ product_id: PRODUCT_ID, review_id: 'c', user_id: 'user-c', rating: 2 })));
    await bus.whenIdle();

    expect(catalog.ratings.get(PRODUCT_ID)).toBe(3.67);
  });

  it('deleting the only review clears the aggregate', async () => {
    catalog.addProduct(PRODUCT_ID, 5);
    publishFromMain(() => bus.publish(reviewDeleted({ product_id: PRODUCT_ID, review_id: 'a' })));
    await bus.whenIdle();

    expect(catalog.ratings.get(PRODUCT_ID)).toBeNull();
  });

  it('an updated rating is reflected in the mean', async () => {
    reviews.put(PRODUCT_ID, 'a', 3);
    reviews.put(PRODUCT_ID, 'b', 5);
    publishFromMain(() => bus.publish(reviewUpdated({ product_id: PRODUCT_ID, review_id: 'b', rating: 5 })));
    await bus.whenIdle();

    expect(catalog.ratings.get(PRODUCT_ID)).toBe(4);
  });

  it('an unreachable catalog leaves the aggregate untouched and logs it', async () => {
    catalog.addProduct(PRODUCT_ID, 2);
    catalog.connected = false;
    reviews.put(PRODUCT_ID, 'a', 5);

    expect(() => publishFromMain(() => bus.publish(
      reviewCreated({ product_id: PRODUCT_ID, review_id: 'a', user_id: 'user-a', rating: 5 }),
    ))).not.toThrow();
    await bus.whenIdle();

    expect(catalog.ratings.get(PRODUCT_ID)).toBe(2);
    expect(log.warn).toHaveBeenCalledWith(
      { product_id: PRODUCT_ID, kind: 'ReviewCreated' },
      'Cannot update product rating: catalog store not connected',
    );
  });

  it('concurrent dispatches converge on the final review set', async () => {
    reviews.put(PRODUCT_ID, 'a', 4);
    reviews.put(PRODUCT_ID, 'b', 2);
    publishFromMain(() => {
      bus.publish(reviewCreated({ product_id: PRODUCT_ID, review_id: 'a', user_id: 'user-a', rating: 4 }));
      bus.publish(reviewCreated({ product_id: PRODUCT_ID, review_id: 'b', user_id: 'user-b', rating: 2 }));
    });
    await bus.whenIdle();

    expect(catalog.ratings.get(PRODUCT_ID)).toBe(3);
    expect(catalog.writes).toHaveLength(2);
  });

  it('a delete after updates converges to the remaining reviews', async () => {
    reviews.put(PRODUCT_ID, 'a', 1);
    reviews.put(PRODUCT_ID, 'b', 5);
    reviews.put(PRODUCT_ID, 'c', 4);
    reviews.remove(PRODUCT_ID, 'a');
    publishFromMain(() => {
      bus.publish(reviewUpdated({ product_id: PRODUCT_ID, review_id: 'b', rating: 5 }));
      bus.publish(reviewDeleted({ product_id: PRODUCT_ID, review_id: 'a' }));
    });
    await bus.whenIdle();

    expect(catalog.ratings.get(PRODUCT_ID)).toBe(4.5);
  });
});

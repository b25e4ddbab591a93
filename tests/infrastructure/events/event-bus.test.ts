import { describe, it, expect, beforeEach } from 'vitest';
import { EventBus } from '../../../src/infrastructure/events/event-bus.js';
import { SubscriptionRegistry } from '../../../src/infrastructure/events/subscription-registry.js';
import { DispatchExecutor } from '../../../src/infrastructure/events/dispatch-executor.js';
import { LoopBridge } from '../../../src/infrastructure/events/loop-bridge.js';
import { createMainScope, runInScope } from '../../../src/infrastructure/events/execution-scope.js';
import type { ReviewEvent } from '../../../src/domain/index.js';
import {
  fakeLogger,
  makeCreated,
  makeUpdated,
  makeDeleted,
  deferred,
  PRODUCT_ID,
  REVIEW_ID,
} from '../../helpers.js';
import type { FakeLogger } from '../../helpers.js';

interface Harness {
  bus: EventBus;
  registry: SubscriptionRegistry;
  executor: DispatchExecutor;
  bridge: LoopBridge;
  log: FakeLogger;
}

function harness(options: { workers?: number; timeoutMs?: number } = {}): Harness {
  const log = fakeLogger();
  const registry = new SubscriptionRegistry(log);
  const executor = new DispatchExecutor(log, options.workers ?? 10);
  const bridge = new LoopBridge(options.timeoutMs ?? 1_000);
  return { bus: new EventBus(registry, executor, bridge, log), registry, executor, bridge, log };
}

describe('EventBus.publish', () => {
  let h: Harness;

  beforeEach(() => {
    h = harness();
  });

  it('is a logged no-op when nothing is subscribed', async () => {
    h.bus.publish(makeCreated());

    expect(h.log.debug).toHaveBeenCalledWith({ kind: 'ReviewCreated' }, 'No handlers registered for ReviewCreated');
    expect(h.executor.pending).toBe(0);
    await h.bus.whenIdle();
  });

  it('returns before any handler runs', async () => {
    const seen: ReviewEvent[] = [];
    h.bus.subscribe('ReviewCreated', (event) => {
      seen.push(event);
    }, 'recorder');

    const event = makeCreated();
    h.bus.publish(event);
    expect(seen).toEqual([]);

    await h.bus.whenIdle();
    expect(seen).toEqual([event]);
  });

  it('routes only to handlers of the event kind', async () => {
    const calls: string[] = [];
    h.bus.subscribe('ReviewCreated', () => { calls.push('created'); }, 'created');
    h.bus.subscribe('ReviewUpdated', () => { calls.push('updated'); }, 'updated');
    h.bus.subscribe('ReviewDeleted', () => { calls.push('deleted'); }, 'deleted');

    h.bus.publish(makeUpdated());
    await h.bus.whenIdle();

    expect(calls).toEqual(['updated']);
  });

  it('logs the fan-out at info', () => {
    h.bus.subscribe('ReviewDeleted', () => undefined, 'a');
    h.bus.subscribe('ReviewDeleted', () => undefined, 'b');

    h.bus.publish(makeDeleted());

    expect(h.log.info).toHaveBeenCalledWith(
      { kind: 'ReviewDeleted', product_id: PRODUCT_ID, handlers: 2 },
      'Publishing ReviewDeleted to 2 handler(s)',
    );
  });

  it('invokes a handler once per registration', async () => {
    let count = 0;
    const handler = (): void => {
      count++;
    };
    h.bus.subscribe('ReviewCreated', handler, 'twice');
    h.bus.subscribe('ReviewCreated', handler, 'twice');

    h.bus.publish(makeCreated());
    await h.bus.whenIdle();

    expect(count).toBe(2);
  });

  it('isolates a failing handler from the others', async () => {
    let delivered = false;
    h.bus.subscribe('ReviewCreated', async (_event) => {
      throw new Error('catalog exploded');
    }, 'broken');
    h.bus.subscribe('ReviewCreated', async (_event) => {
      delivered = true;
    }, 'healthy');

    expect(() => h.bus.publish(makeCreated())).not.toThrow();
    await h.bus.whenIdle();

    expect(delivered).toBe(true);
    expect(h.log.error).toHaveBeenCalledWith(
      expect.objectContaining({
        handler: 'broken',
        kind: 'ReviewCreated',
        product_id: PRODUCT_ID,
        review_id: REVIEW_ID,
        reason: 'catalog exploded',
      }),
      'Handler broken failed for ReviewCreated',
    );
  });

  it('logs a delivered outcome at debug', async () => {
    h.bus.subscribe('ReviewCreated', async (_event) => undefined, 'quiet');

    h.bus.publish(makeCreated());
    await h.bus.whenIdle();

    expect(h.log.debug).toHaveBeenCalledWith(
      {
        handler: 'quiet',
        kind: 'ReviewCreated',
        product_id: PRODUCT_ID,
        review_id: REVIEW_ID,
        duration_ms: expect.any(Number),
      },
      'Handler quiet delivered ReviewCreated',
    );
  });

  it('does not block on a long-running handler', async () => {
    const gate = deferred();
    let quickRan = false;
    h.bus.subscribe('ReviewCreated', async (_event) => {
      await gate.promise;
    }, 'slow');
    h.bus.subscribe('ReviewUpdated', () => {
      quickRan = true;
    }, 'quick');

    h.bus.publish(makeCreated());
    h.bus.publish(makeUpdated());
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(quickRan).toBe(true);
    expect(h.executor.active).toBe(1);

    gate.resolve();
    await h.bus.whenIdle();
  });

  it('logs a timed-out outcome at warn', async () => {
    h = harness({ timeoutMs: 20 });
    const gate = deferred();
    h.bus.subscribe('ReviewCreated', async (_event) => {
      await gate.promise;
    }, 'stuck');

    runInScope(createMainScope(), () => h.bus.publish(makeCreated()));
    await h.bus.whenIdle();

    expect(h.log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ handler: 'stuck', kind: 'ReviewCreated', timeout_ms: 20 }),
      'Handler stuck timed out for ReviewCreated',
    );
    gate.resolve();
  });

  it('captures the main scope on publish', () => {
    const main = createMainScope();
    runInScope(main, () => h.bus.publish(makeCreated()));
    expect(h.bridge.mainScope).toBe(main);
  });

  it('delivers every event under concurrent publishes with a small pool', async () => {
    h = harness({ workers: 2 });
    const seen: string[] = [];
    h.bus.subscribe('ReviewCreated', async (event) => {
      await new Promise((resolve) => setImmediate(resolve));
      seen.push(event.review_id);
    }, 'collector');

    const ids = Array.from({ length: 20 }, (_, i) => `review-${i}`);
    for (const id of ids) {
      h.bus.publish(makeCreated({ review_id: id }));
    }
    await h.bus.whenIdle();

    expect([...seen].sort()).toEqual([...ids].sort());
  });
});

describe('EventBus.shutdown', () => {
  it('drains in-flight dispatches', async () => {
    const h = harness();
    const gate = deferred();
    let finished = false;
    h.bus.subscribe('ReviewCreated', async (_event) => {
      await gate.promise;
      finished = true;
    }, 'pending');

    h.bus.publish(makeCreated());
    await new Promise((resolve) => setImmediate(resolve));

    const closing = h.bus.shutdown(1_000);
    gate.resolve();
    await closing;

    expect(finished).toBe(true);
    expect(h.log.info).toHaveBeenCalledWith('Event bus shut down');
  });

  it('warns when the drain times out', async () => {
    const h = harness();
    const gate = deferred();
    h.bus.subscribe('ReviewCreated', async (_event) => {
      await gate.promise;
    }, 'forever');

    h.bus.publish(makeCreated());
    await new Promise((resolve) => setImmediate(resolve));
    await h.bus.shutdown(10);

    expect(h.log.warn).toHaveBeenCalledWith(
      { pending: 0, running: 1, drainTimeoutMs: 10 },
      'Event bus shut down before in-flight dispatches drained',
    );
    gate.resolve();
    await h.bus.whenIdle();
  });

  it('drops publishes after shutdown', async () => {
    const h = harness();
    h.bus.subscribe('ReviewCreated', () => undefined, 'late');
    await h.bus.shutdown(10);

    h.bus.publish(makeCreated());

    expect(h.log.warn).toHaveBeenCalledWith(
      { kind: 'ReviewCreated', handler: 'late', product_id: PRODUCT_ID },
      'Event bus is shut down, dispatch dropped',
    );
  });

  it('releases the main scope', async () => {
    const h = harness();
    runInScope(createMainScope(), () => h.bus.publish(makeCreated()));
    await h.bus.shutdown(10);
    expect(h.bridge.mainScope).toBeNull();
  });
});

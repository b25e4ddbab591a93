import type { BaseLogger } from 'pino';
import type {
  ReviewEvent,
  ReviewEventKind,
  ReviewEventOf,
  ReviewEventHandler,
  ReviewEventPublisher,
} from '../../domain/index.js';
import type { SubscriptionRegistry, DispatchUnit } from './subscription-registry.js';
import type { DispatchExecutor } from './dispatch-executor.js';
import { HandlerTimeoutError, type LoopBridge } from './loop-bridge.js';
import { logDispatchOutcome, type DispatchOutcome } from './dispatch-outcome.js';

export const DEFAULT_DRAIN_TIMEOUT_MS = 30_000;

/**
 * In-process publish/subscribe for review lifecycle events.
 *
 * `publish()` is synchronous and fire-and-forget: it hands one dispatch
 * per subscribed handler to the executor and returns. Handler failures and
 * timeouts end at the log; they never reach the publisher.
 */
export class EventBus implements ReviewEventPublisher {
  constructor(
    private readonly registry: SubscriptionRegistry,
    private readonly executor: DispatchExecutor,
    private readonly bridge: LoopBridge,
    private readonly log: BaseLogger,
  ) {}

  subscribe<K extends ReviewEventKind>(
    kind: K,
    handler: ReviewEventHandler<ReviewEventOf<K>>,
    name?: string,
  ): void {
    this.registry.subscribe(kind, handler, name);
  }

  publish(event: ReviewEvent): void {
    this.bridge.capture();

    const units = this.registry.dispatchUnits(event);
    if (units.length === 0) {
      this.log.debug({ kind: event.kind }, `No handlers registered for ${event.kind}`);
      return;
    }

    this.log.info(
      { kind: event.kind, product_id: event.product_id, handlers: units.length },
      `Publishing ${event.kind} to ${units.length} handler(s)`,
    );

    for (const unit of units) {
      const accepted = this.executor.submit(() => this.dispatch(unit));
      if (!accepted) {
        this.log.warn(
          { kind: event.kind, handler: unit.handlerName, product_id: event.product_id },
          'Event bus is shut down, dispatch dropped',
        );
      }
    }
  }

  /** Resolves when every dispatch submitted so far has finished. */
  whenIdle(): Promise<void> {
    return this.executor.whenIdle();
  }

  /**
   * Stops accepting dispatches and waits for in-flight ones, up to
   * `drainTimeoutMs`. Call once during process teardown.
   */
  async shutdown(drainTimeoutMs: number = DEFAULT_DRAIN_TIMEOUT_MS): Promise<void> {
    this.log.info('Shutting down event bus...');

    const drained = await this.executor.shutdown(drainTimeoutMs);
    this.bridge.release();

    if (drained) {
      this.log.info('Event bus shut down');
    } else {
      this.log.warn(
        { pending: this.executor.pending, running: this.executor.active, drainTimeoutMs },
        'Event bus shut down before in-flight dispatches drained',
      );
    }
  }

  private async dispatch(unit: DispatchUnit): Promise<void> {
    const started = Date.now();
    let outcome: DispatchOutcome;

    try {
      await unit.execute(this.bridge);
      outcome = { status: 'delivered', duration_ms: Date.now() - started };
    } catch (err: unknown) {
      const duration_ms = Date.now() - started;
      outcome = err instanceof HandlerTimeoutError
        ? { status: 'timed_out', duration_ms, timeout_ms: err.timeoutMs }
        : {
          status: 'handler_failed',
          duration_ms,
          reason: err instanceof Error ? err.message : String(err),
          err,
        };
    }

    logDispatchOutcome(this.log, unit.handlerName, unit.event, outcome);
  }
}

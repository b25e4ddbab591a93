import type { BaseLogger } from 'pino';
import type {
  ReviewEvent,
  ReviewEventKind,
  ReviewEventOf,
  ReviewEventHandler,
} from '../../domain/index.js';

interface Subscription<E extends ReviewEvent> {
  readonly name: string;
  readonly handler: ReviewEventHandler<E>;
}

type HandlerLists = {
  [K in ReviewEventKind]: Array<Subscription<ReviewEventOf<K>>>;
};

/** Runs a handler against its event. Implemented by the loop bridge. */
export interface HandlerRunner {
  run<E extends ReviewEvent>(handler: ReviewEventHandler<E>, event: E): Promise<void>;
}

/** One (handler, event) pair ready to hand to the executor. */
export interface DispatchUnit {
  readonly handlerName: string;
  readonly event: ReviewEvent;
  execute(runner: HandlerRunner): Promise<void>;
}

function bind<E extends ReviewEvent>(
  subscriptions: ReadonlyArray<Subscription<E>>,
  event: E,
): DispatchUnit[] {
  return subscriptions.map((subscription) => ({
    handlerName: subscription.name,
    event,
    execute: (runner: HandlerRunner) => runner.run(subscription.handler, event),
  }));
}

/**
 * Event kind -> ordered handler list.
 *
 * Built once by the composition root and populated by `setupEventHandlers`
 * at startup; read-only during steady-state dispatch. Duplicate
 * registrations are kept and each one is invoked.
 */
export class SubscriptionRegistry {
  private readonly lists: HandlerLists = {
    ReviewCreated: [],
    ReviewUpdated: [],
    ReviewDeleted: [],
  };

  constructor(private readonly log: BaseLogger) {}

  subscribe<K extends ReviewEventKind>(
    kind: K,
    handler: ReviewEventHandler<ReviewEventOf<K>>,
    name: string = handler.name || 'anonymous',
  ): void {
    this.lists[kind].push({ name, handler });
    this.log.info({ kind, handler: name }, `Subscribed handler ${name} to ${kind}`);
  }

  /** True if a handler registered under `name` exists for `kind`. */
  has(kind: ReviewEventKind, name: string): boolean {
    return this.lists[kind].some((subscription) => subscription.name === name);
  }

  handlerCount(kind: ReviewEventKind): number {
    return this.lists[kind].length;
  }

  /** Resolves the handlers subscribed to the event's kind, in registration order. */
  dispatchUnits(event: ReviewEvent): DispatchUnit[] {
    switch (event.kind) {
      case 'ReviewCreated':
        return bind(this.lists.ReviewCreated, event);
      case 'ReviewUpdated':
        return bind(this.lists.ReviewUpdated, event);
      case 'ReviewDeleted':
        return bind(this.lists.ReviewDeleted, event);
    }
  }

  /** Test instrumentation: drops every subscription. */
  clear(): void {
    this.lists.ReviewCreated = [];
    this.lists.ReviewUpdated = [];
    this.lists.ReviewDeleted = [];
  }
}

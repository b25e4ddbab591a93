import { AsyncResource } from 'node:async_hooks';
import { types } from 'node:util';
import type { ReviewEvent, ReviewEventHandler } from '../../domain/index.js';
import { ExecutionScope, currentScope, runInScope } from './execution-scope.js';
import type { HandlerRunner } from './subscription-registry.js';

export const DEFAULT_HANDLER_TIMEOUT_MS = 30_000;

export class HandlerTimeoutError extends Error {
  readonly name = 'HandlerTimeoutError';

  constructor(readonly timeoutMs: number) {
    super(`Handler did not settle within ${timeoutMs}ms`);
  }
}

interface MainContext {
  readonly scope: ExecutionScope;
  readonly resource: AsyncResource;
}

/**
 * Runs event handlers from executor slots inside the right execution scope.
 *
 * The first publish made from a live main scope is captured as the main
 * context. Async handlers then run inside that context and the slot waits
 * at most `timeoutMs` for them. Without a live main context an async
 * handler runs to completion in a throwaway detached scope.
 * Synchronous handlers run directly in the slot.
 */
export class LoopBridge implements HandlerRunner {
  private main: MainContext | null = null;

  constructor(readonly timeoutMs: number = DEFAULT_HANDLER_TIMEOUT_MS) {}

  /**
   * Records the caller's scope as the main context when the caller runs in
   * a live main scope and no live one is known yet. Racing captures are
   * harmless: the last one wins and both refer to the same scope.
   */
  capture(): void {
    const scope = currentScope();
    if (scope === undefined || scope.kind !== 'main' || !scope.active) return;
    if (this.main !== null && this.main.scope.active) return;

    this.main = { scope, resource: new AsyncResource('ReviewEventBridge') };
  }

  /** Forgets the main context; later async handlers run detached. */
  release(): void {
    if (this.main === null) return;
    this.main.resource.emitDestroy();
    this.main = null;
  }

  get mainScope(): ExecutionScope | null {
    return this.main?.scope ?? null;
  }

  async run<E extends ReviewEvent>(handler: ReviewEventHandler<E>, event: E): Promise<void> {
    if (!types.isAsyncFunction(handler)) {
      await handler(event);
      return;
    }

    const main = this.main;
    if (main !== null && main.scope.active) {
      const work = main.resource.runInAsyncScope(() => handler(event));
      await withTimeout(Promise.resolve(work), this.timeoutMs);
      return;
    }

    const detached = new ExecutionScope('detached');
    try {
      await runInScope(detached, () => handler(event));
    } finally {
      detached.close();
    }
  }
}

/**
 * Waits for `work` up to `timeoutMs`. On timeout the work keeps running;
 * `Promise.race` still observes its eventual rejection.
 */
function withTimeout(work: Promise<void>, timeoutMs: number): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new HandlerTimeoutError(timeoutMs)), timeoutMs);
  });

  return Promise.race([work, timeout]).finally(() => {
    clearTimeout(timer);
  });
}

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

/**
 * Execution scopes carried through the async chain via AsyncLocalStorage.
 *
 * The HTTP process bootstraps inside a single `main` scope, so every
 * request, and every callback scheduled from one, observes it. Event
 * handlers that run without a live main scope get a throwaway
 * `detached` scope instead.
 */

export type ScopeKind = 'main' | 'detached';

export class ExecutionScope {
  readonly id: string = randomUUID();
  private open = true;

  constructor(readonly kind: ScopeKind) {}

  /** False once the owner has shut down. */
  get active(): boolean {
    return this.open;
  }

  close(): void {
    this.open = false;
  }
}

const storage = new AsyncLocalStorage<ExecutionScope>();

export function createMainScope(): ExecutionScope {
  return new ExecutionScope('main');
}

/** Runs `fn` with `scope` as the current scope for it and all its continuations. */
export function runInScope<T>(scope: ExecutionScope, fn: () => T): T {
  return storage.run(scope, fn);
}

/** The scope of the current async execution, if any. */
export function currentScope(): ExecutionScope | undefined {
  return storage.getStore();
}

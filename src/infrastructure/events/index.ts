export { EventBus, DEFAULT_DRAIN_TIMEOUT_MS } from './event-bus.js';
export { SubscriptionRegistry } from './subscription-registry.js';
export type { DispatchUnit, HandlerRunner } from './subscription-registry.js';
export { DispatchExecutor, DEFAULT_WORKERS } from './dispatch-executor.js';
export type { DispatchTask } from './dispatch-executor.js';
export { LoopBridge, HandlerTimeoutError, DEFAULT_HANDLER_TIMEOUT_MS } from './loop-bridge.js';
export { logDispatchOutcome } from './dispatch-outcome.js';
export type { DispatchOutcome } from './dispatch-outcome.js';
export {
  ExecutionScope,
  createMainScope,
  runInScope,
  currentScope,
} from './execution-scope.js';
export type { ScopeKind } from './execution-scope.js';
export { default as eventsPlugin } from './events-plugin.js';
export type { EventsPluginOptions } from './events-plugin.js';

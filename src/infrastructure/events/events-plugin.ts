import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { EventBus } from './event-bus.js';
import { DispatchExecutor } from './dispatch-executor.js';
import { LoopBridge } from './loop-bridge.js';
import type { SubscriptionRegistry } from './subscription-registry.js';
import type { ExecutionScope } from './execution-scope.js';

export interface EventsPluginOptions {
  /** Registry owned by the composition root; `setupEventHandlers` fills it. */
  registry: SubscriptionRegistry;
  /** Main scope the server was bootstrapped in. Closed after the bus drains. */
  scope: ExecutionScope;
  workers: number;
  handlerTimeoutMs: number;
  drainTimeoutMs: number;
}

/**
 * Fastify plugin that owns the review event bus lifecycle.
 *
 * Decorates `fastify.events`. On close, drains in-flight dispatches before
 * the main scope is marked inactive. Register it after the plugins whose
 * clients handlers use: onClose hooks run in reverse registration order,
 * so the bus drains before those clients disconnect.
 */
async function eventsPlugin(fastify: FastifyInstance, opts: EventsPluginOptions): Promise<void> {
  const executor = new DispatchExecutor(fastify.log, opts.workers);
  const bridge = new LoopBridge(opts.handlerTimeoutMs);
  const bus = new EventBus(opts.registry, executor, bridge, fastify.log);

  fastify.decorate('events', bus);

  fastify.addHook('onClose', async () => {
    await bus.shutdown(opts.drainTimeoutMs);
    opts.scope.close();
  });
}

export default fp(eventsPlugin, {
  name: 'events',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.events` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    events: EventBus;
  }
}

import type { BaseLogger } from 'pino';
import type { ReviewEvent } from '../../domain/index.js';

/**
 * Result of running one handler for one event.
 *
 * Outcomes go to the log only; the publisher never sees them.
 */
export type DispatchOutcome =
  | { status: 'delivered'; duration_ms: number }
  | { status: 'handler_failed'; duration_ms: number; reason: string; err: unknown }
  | { status: 'timed_out'; duration_ms: number; timeout_ms: number };

export function logDispatchOutcome(
  log: BaseLogger,
  handlerName: string,
  event: ReviewEvent,
  outcome: DispatchOutcome,
): void {
  const context = {
    handler: handlerName,
    kind: event.kind,
    product_id: event.product_id,
    review_id: event.review_id,
    duration_ms: outcome.duration_ms,
  };

  switch (outcome.status) {
    case 'delivered':
      log.debug(context, `Handler ${handlerName} delivered ${event.kind}`);
      return;
    case 'handler_failed':
      log.error(
        { ...context, err: outcome.err, reason: outcome.reason },
        `Handler ${handlerName} failed for ${event.kind}`,
      );
      return;
    case 'timed_out':
      log.warn(
        { ...context, timeout_ms: outcome.timeout_ms },
        `Handler ${handlerName} timed out for ${event.kind}`,
      );
      return;
  }
}

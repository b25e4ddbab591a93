/**
 * Review lifecycle events.
 *
 * Emitted by the review write path after a mutation commits and consumed
 * by in-process subscribers. The set of kinds is closed: adding a kind
 * means extending `ReviewEventKind` and every exhaustive switch over it.
 */

export const REVIEW_EVENT_KINDS = ['ReviewCreated', 'ReviewUpdated', 'ReviewDeleted'] as const;

export type ReviewEventKind = (typeof REVIEW_EVENT_KINDS)[number];

/** Integer star rating, 1..5. */
export type Rating = 1 | 2 | 3 | 4 | 5;

export interface ReviewCreated {
  readonly kind: 'ReviewCreated';
  readonly product_id: string;
  readonly review_id: string;
  readonly user_id: string;
  readonly rating: Rating;
  readonly timestamp: string; // ISO-8601
}

export interface ReviewUpdated {
  readonly kind: 'ReviewUpdated';
  readonly product_id: string;
  readonly review_id: string;
  readonly rating: Rating;
  readonly timestamp: string; // ISO-8601
}

export interface ReviewDeleted {
  readonly kind: 'ReviewDeleted';
  readonly product_id: string;
  readonly review_id: string;
  readonly timestamp: string; // ISO-8601
}

export type ReviewEvent = ReviewCreated | ReviewUpdated | ReviewDeleted;

/** Narrows the union to the variant carrying `kind`. */
export type ReviewEventOf<K extends ReviewEventKind> = Extract<ReviewEvent, { kind: K }>;

/**
 * A subscriber callback. May be synchronous or `async`; the bus decides
 * how to run it from that.
 */
export type ReviewEventHandler<E extends ReviewEvent = ReviewEvent> =
  (event: E) => void | Promise<void>;

/** Inbound contract of the review write path: fire-and-forget, never throws. */
export interface ReviewEventPublisher {
  publish(event: ReviewEvent): void;
}

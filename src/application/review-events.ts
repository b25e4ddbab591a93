import { z } from 'zod';
import type { ReviewCreated, ReviewUpdated, ReviewDeleted } from '../domain/index.js';

/**
 * Zod schemas and factories for review lifecycle events.
 *
 * Factories are the only way the write path builds events: they validate
 * the invariants (integer rating in 1..5, non-empty ids, ISO-8601
 * timestamp) and hand back a frozen object.
 */

const ratingSchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
]);

const idSchema = z.string().min(1).max(255);

const timestampSchema = z.string().datetime({ offset: true, message: 'Must be a valid ISO-8601 datetime' });

export const reviewCreatedSchema = z.object({
  kind: z.literal('ReviewCreated'),
  product_id: idSchema,
  review_id: idSchema,
  user_id: idSchema,
  rating: ratingSchema,
  timestamp: timestampSchema,
});

export const reviewUpdatedSchema = z.object({
  kind: z.literal('ReviewUpdated'),
  product_id: idSchema,
  review_id: idSchema,
  rating: ratingSchema,
  timestamp: timestampSchema,
});

export const reviewDeletedSchema = z.object({
  kind: z.literal('ReviewDeleted'),
  product_id: idSchema,
  review_id: idSchema,
  timestamp: timestampSchema,
});

export const reviewEventSchema = z.discriminatedUnion('kind', [
  reviewCreatedSchema,
  reviewUpdatedSchema,
  reviewDeletedSchema,
]);

type Timestamp = string | Date | undefined;

function toIso(timestamp: Timestamp): string {
  if (timestamp === undefined) return new Date().toISOString();
  return typeof timestamp === 'string' ? timestamp : timestamp.toISOString();
}

export interface ReviewCreatedInput {
  product_id: string;
  review_id: string;
  user_id: string;
  rating: number;
  timestamp?: string | Date;
}

export interface ReviewUpdatedInput {
  product_id: string;
  review_id: string;
  rating: number;
  timestamp?: string | Date;
}

export interface ReviewDeletedInput {
  product_id: string;
  review_id: string;
  timestamp?: string | Date;
}

/** Builds a ReviewCreated event. Throws a ZodError on invalid input. */
export function reviewCreated(input: ReviewCreatedInput): ReviewCreated {
  const event: ReviewCreated = reviewCreatedSchema.parse({
    kind: 'ReviewCreated',
    product_id: input.product_id,
    review_id: input.review_id,
    user_id: input.user_id,
    rating: input.rating,
    timestamp: toIso(input.timestamp),
  });
  return Object.freeze(event);
}

/** Builds a ReviewUpdated event. Throws a ZodError on invalid input. */
export function reviewUpdated(input: ReviewUpdatedInput): ReviewUpdated {
  const event: ReviewUpdated = reviewUpdatedSchema.parse({
    kind: 'ReviewUpdated',
    product_id: input.product_id,
    review_id: input.review_id,
    rating: input.rating,
    timestamp: toIso(input.timestamp),
  });
  return Object.freeze(event);
}

/** Builds a ReviewDeleted event. Throws a ZodError on invalid input. */
export function reviewDeleted(input: ReviewDeletedInput): ReviewDeleted {
  const event: ReviewDeleted = reviewDeletedSchema.parse({
    kind: 'ReviewDeleted',
    product_id: input.product_id,
    review_id: input.review_id,
    timestamp: toIso(input.timestamp),
  });
  return Object.freeze(event);
}

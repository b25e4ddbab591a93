import { vi } from 'vitest';
import type { ReviewCreated, ReviewUpdated, ReviewDeleted } from '../src/domain/index.js';

/** Fake pino logger; structurally a `BaseLogger`. */
export function fakeLogger() {
  return {
    level: 'debug',
    fatal: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    silent: vi.fn(),
  };
}

export type FakeLogger = ReturnType<typeof fakeLogger>;

export const PRODUCT_ID = '65a1f0c2e4b0a1b2c3d4e5f6';
export const OTHER_PRODUCT_ID = '65a1f0c2e4b0a1b2c3d4e5f7';
export const REVIEW_ID = '11111111-2222-3333-4444-555555555555';
export const USER_ID = 'aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee';
export const FIXED_TIMESTAMP = '2026-02-18T12:00:00.000Z';

export function makeCreated(overrides: Partial<ReviewCreated> = {}): ReviewCreated {
  return {
    kind: 'ReviewCreated',
    product_id: PRODUCT_ID,
    review_id: REVIEW_ID,
    user_id: USER_ID,
    rating: 4,
    timestamp: FIXED_TIMESTAMP,
    ...overrides,
  };
}

export function makeUpdated(overrides: Partial<ReviewUpdated> = {}): ReviewUpdated {
  return {
    kind: 'ReviewUpdated',
    product_id: PRODUCT_ID,
    review_id: REVIEW_ID,
    rating: 3,
    timestamp: FIXED_TIMESTAMP,
    ...overrides,
  };
}

export function makeDeleted(overrides: Partial<ReviewDeleted> = {}): ReviewDeleted {
  return {
    kind: 'ReviewDeleted',
    product_id: PRODUCT_ID,
    review_id: REVIEW_ID,
    timestamp: FIXED_TIMESTAMP,
    ...overrides,
  };
}

/** Resolves after pending setImmediate callbacks have run. */
export function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/** Promise with its resolver exposed, for holding handlers open. */
export function deferred<T = void>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

import { describe, it, expect } from 'vitest';
import { getTableConfig, PgDialect } from 'drizzle-orm/pg-core';
import { reviews } from '../../../src/infrastructure/db/schema.js';

describe('reviews table', () => {
  it('constrains rating to 1..5', () => {
    const { checks } = getTableConfig(reviews);
    const dialect = new PgDialect();

    expect(checks.map((c) => c.name)).toEqual(['reviews_rating_range']);
    expect(checks.map((c) => dialect.sqlToQuery(c.value).sql)).toEqual([
      '"reviews"."rating" BETWEEN 1 AND 5',
    ]);
  });
});

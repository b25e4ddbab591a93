import type { Sql } from './client.js';

/**
 * Creates the review tables and indexes if they are missing.
 *
 * Mirrors `schema.ts`. In production drizzle-kit migrations own the
 * schema; this keeps a fresh local database usable on first boot.
 */
export async function ensureSchema(sql: Sql): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS users (
      id          UUID PRIMARY KEY,
      name        VARCHAR(255) NOT NULL,
      email       VARCHAR(255) NOT NULL,
      profile     TEXT,
      created_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS reviews (
      id           UUID PRIMARY KEY,
      product_id   VARCHAR(255) NOT NULL,
      user_id      UUID         NOT NULL REFERENCES users (id),
      rating       INTEGER      NOT NULL,
      description  VARCHAR(255) NOT NULL,
      status       VARCHAR(20)  NOT NULL DEFAULT 'active',
      created_at   TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      updated_at   TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      CONSTRAINT reviews_rating_range CHECK (rating BETWEEN 1 AND 5)
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS review_metrics (
      id              UUID PRIMARY KEY,
      review_id       UUID    NOT NULL REFERENCES reviews (id),
      upvotes         INTEGER NOT NULL DEFAULT 0,
      downvotes       INTEGER NOT NULL DEFAULT 0,
      comments_count  INTEGER NOT NULL DEFAULT 0
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS comments (
      id           UUID PRIMARY KEY,
      review_id    UUID        NOT NULL REFERENCES reviews (id),
      user_id      UUID        NOT NULL REFERENCES users (id),
      description  TEXT        NOT NULL,
      created_at   TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`CREATE UNIQUE INDEX IF NOT EXISTS idx_users_email ON users (email)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_reviews_product_id ON reviews (product_id)`);
  await sql.unsafe(`CREATE UNIQUE INDEX IF NOT EXISTS idx_reviews_user_product ON reviews (user_id, product_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_reviews_created_at ON reviews (created_at)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_reviews_rating ON reviews (rating)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_reviews_status ON reviews (status)`);
  await sql.unsafe(`CREATE UNIQUE INDEX IF NOT EXISTS idx_review_metrics_review_id ON review_metrics (review_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_comments_review_id ON comments (review_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_comments_user_id ON comments (user_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_comments_created_at ON comments (created_at)`);
}

import {
  pgTable,
  uuid,
  varchar,
  text,
  integer,
  timestamp,
  index,
  uniqueIndex,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { REVIEW_STATUSES } from '../../domain/index.js';

/**
 * Drizzle schema for the `users` table.
 *
 * Users are provisioned out of band; the reviews API only reads them.
 */
export const users = pgTable('users', {
  id: uuid('id').primaryKey(),
  name: varchar('name', { length: 255 }).notNull(),
  email: varchar('email', { length: 255 }).notNull(),
  profile: text('profile'),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  uniqueIndex('idx_users_email').on(table.email),
]);

/**
 * Drizzle schema for the `reviews` table.
 *
 * `product_id` references a catalog document (24-hex ObjectId) in another
 * store, so it is a plain string with no FK. Deletion is soft:
 * `status = 'inactive'`. The (user_id, product_id) unique index spans both
 * statuses, so a user reviews a product at most once.
 */
export const reviews = pgTable('reviews', {
  id: uuid('id').primaryKey(),
  product_id: varchar('product_id', { length: 255 }).notNull(),
  user_id: uuid('user_id').notNull().references(() => users.id),
  rating: integer('rating').notNull(),
  description: varchar('description', { length: 255 }).notNull(),
  status: varchar('status', { length: 20, enum: REVIEW_STATUSES }).notNull().default('active'),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_reviews_product_id').on(table.product_id),
  uniqueIndex('idx_reviews_user_product').on(table.user_id, table.product_id),
  index('idx_reviews_created_at').on(table.created_at),
  index('idx_reviews_rating').on(table.rating),
  index('idx_reviews_status').on(table.status),
  check('reviews_rating_range', sql`${table.rating} BETWEEN 1 AND 5`),
]);

/** One counters row per review. */
export const reviewMetrics = pgTable('review_metrics', {
  id: uuid('id').primaryKey(),
  review_id: uuid('review_id').notNull().references(() => reviews.id),
  upvotes: integer('upvotes').notNull().default(0),
  downvotes: integer('downvotes').notNull().default(0),
  comments_count: integer('comments_count').notNull().default(0),
}, (table) => [
  uniqueIndex('idx_review_metrics_review_id').on(table.review_id),
]);

export const comments = pgTable('comments', {
  id: uuid('id').primaryKey(),
  review_id: uuid('review_id').notNull().references(() => reviews.id),
  user_id: uuid('user_id').notNull().references(() => users.id),
  description: text('description').notNull(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_comments_review_id').on(table.review_id),
  index('idx_comments_user_id').on(table.user_id),
  index('idx_comments_created_at').on(table.created_at),
]);

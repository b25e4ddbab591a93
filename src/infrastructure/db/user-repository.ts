import { eq } from 'drizzle-orm';
import type { Database } from './client.js';
import { users } from './schema.js';

export type UserRow = typeof users.$inferSelect;

export async function findUserById(db: Database, userId: string): Promise<UserRow | undefined> {
  const rows = await db.select().from(users).where(eq(users.id, userId)).limit(1);
  return rows[0];
}

export async function userExists(db: Database, userId: string): Promise<boolean> {
  const rows = await db.select({ id: users.id }).from(users).where(eq(users.id, userId)).limit(1);
  return rows.length > 0;
}

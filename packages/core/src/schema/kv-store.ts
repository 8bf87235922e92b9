import { sqliteTable, text } from 'drizzle-orm/sqlite-core';

/** One blob per key; the task list is a single row */
export const kvStore = sqliteTable('kv_store', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
  /** ISO string of the last write */
  updatedAt: text('updated_at').notNull(),
});

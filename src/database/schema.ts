import { sqliteTable, text, integer, index, uniqueIndex } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';

// Accounts are created lazily on first admission check or usage commit
export const users = sqliteTable('users', {
  userId: integer('user_id').primaryKey(),
  isPro: integer('is_pro', { mode: 'boolean' }).notNull().default(false),
  createdAt: text('created_at').notNull().default(sql`CURRENT_TIMESTAMP`),
});

// One row per user per calendar day
export const usageLogs = sqliteTable('usage_logs', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  userId: integer('user_id').notNull().references(() => users.userId),
  usageDate: text('usage_date').notNull(),
  secondsUsed: integer('seconds_used').notNull().default(0),
}, (table) => {
  return {
    userDateIdx: uniqueIndex('idx_usage_logs_user_date').on(table.userId, table.usageDate),
    usageDateIdx: index('idx_usage_logs_usage_date').on(table.usageDate),
  };
});

export type UserRow = typeof users.$inferSelect;
export type UsageLogRow = typeof usageLogs.$inferSelect;

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS users (
    user_id INTEGER PRIMARY KEY,
    is_pro INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS usage_logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL REFERENCES users (user_id),
    usage_date TEXT NOT NULL,
    seconds_used INTEGER NOT NULL DEFAULT 0 CHECK (seconds_used >= 0)
  );
  CREATE UNIQUE INDEX IF NOT EXISTS idx_usage_logs_user_date ON usage_logs (user_id, usage_date);
  CREATE INDEX IF NOT EXISTS idx_usage_logs_usage_date ON usage_logs (usage_date);
`;

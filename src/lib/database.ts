import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { drizzle, BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from '../database/schema';
import { logger } from './logger';

export type LedgerDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  sqlite: Database.Database;
  db: LedgerDatabase;
  close(): void;
}

/**
 * Custom error class for database errors
 */
export class DatabaseError extends Error {
  public readonly originalError: Error;
  public readonly context: Record<string, unknown>;

  constructor(message: string, originalError: Error, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'DatabaseError';
    this.originalError = originalError;
    this.context = context;
  }
}

/**
 * Check if an error came from the storage layer
 */
export function isDatabaseError(error: unknown): boolean {
  if (error instanceof DatabaseError) return true;
  if (error instanceof Database.SqliteError) return true;

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return message.includes('database') || message.includes('sqlite');
  }

  return false;
}

/**
 * Log database error with full context
 */
export function logDatabaseError(
  error: unknown,
  operation: string,
  context: Record<string, unknown> = {}
): void {
  const errorDetails: Record<string, unknown> = {
    operation,
    context,
    errorName: error instanceof Error ? error.name : 'Unknown',
    errorMessage: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  };

  if (error instanceof Database.SqliteError) {
    errorDetails.sqliteCode = error.code;
  }

  logger.error(errorDetails, `Database error during ${operation}`);
}

/**
 * Open the SQLite file (or `:memory:`) and create the schema.
 * Any failure here is fatal for the caller.
 */
export function openDatabase(filename: string): DatabaseHandle {
  try {
    if (filename !== ':memory:') {
      fs.mkdirSync(path.dirname(filename), { recursive: true });
    }

    const sqlite = new Database(filename);
    sqlite.pragma('journal_mode = WAL');
    sqlite.pragma('foreign_keys = ON');
    sqlite.exec(schema.SCHEMA_SQL);

    const db = drizzle(sqlite, { schema });

    logger.info({ filename }, '✅ Database initialized');

    return {
      sqlite,
      db,
      close: () => {
        if (sqlite.open) {
          sqlite.close();
          logger.info({ filename }, 'Database connection closed');
        }
      },
    };
  } catch (error) {
    logDatabaseError(error, 'initialize', { filename });
    throw new DatabaseError(
      'Database initialization failed',
      error instanceof Error ? error : new Error(String(error)),
      { filename }
    );
  }
}

import fs from 'fs/promises';
import path from 'path';
import Database from 'better-sqlite3';
import { logger } from './logger';

export interface BackupStats {
  totalUsers: number;
  proUsers: number;
  usageLogs: number;
}

export interface BackupResult {
  file: string;
  sizeBytes: number;
  stats: BackupStats;
  pruned: string[];
}

/**
 * `backup_YYYYMMDD_HHMMSS.db` in local time
 */
export function backupFileName(date: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `backup_${day}_${time}.db`;
}

/**
 * Open a backup read-only, run the integrity check and count rows.
 * Throws when the file is not a healthy ledger database.
 */
export function inspectBackup(file: string): BackupStats {
  const db = new Database(file, { readonly: true, fileMustExist: true });
  try {
    const integrity = db.pragma('integrity_check', { simple: true });
    if (integrity !== 'ok') {
      throw new Error(`Integrity check failed: ${String(integrity)}`);
    }

    const countOf = (query: string): number => {
      const row: unknown = db.prepare(query).pluck().get();
      return typeof row === 'number' ? row : 0;
    };

    return {
      totalUsers: countOf('SELECT COUNT(*) FROM users'),
      proUsers: countOf('SELECT COUNT(*) FROM users WHERE is_pro = 1'),
      usageLogs: countOf('SELECT COUNT(*) FROM usage_logs'),
    };
  } finally {
    db.close();
  }
}

/**
 * Keep the newest `retention` backups (by file name) and delete the rest.
 */
export async function pruneBackups(backupDir: string, retention: number): Promise<string[]> {
  const entries = await fs.readdir(backupDir);
  const backups = entries.filter(name => /^backup_.*\.db$/.test(name)).sort().reverse();
  const stale = backups.slice(retention);

  for (const name of stale) {
    await fs.rm(path.join(backupDir, name), { force: true });
    logger.info({ file: name }, '🗑️  Old backup removed');
  }

  return stale;
}

/**
 * Online backup of the ledger database, safe while the bot is running.
 */
export async function createBackup(options: {
  sourceFile: string;
  backupDir: string;
  retention: number;
  name?: string;
}): Promise<BackupResult> {
  await fs.mkdir(options.backupDir, { recursive: true });
  const file = path.join(options.backupDir, options.name ?? backupFileName());

  const source = new Database(options.sourceFile, { fileMustExist: true });
  try {
    await source.backup(file);
  } finally {
    source.close();
  }

  const stats = inspectBackup(file);
  const { size } = await fs.stat(file);
  const pruned = await pruneBackups(options.backupDir, options.retention);

  logger.info({ file, sizeBytes: size, ...stats }, '✅ Backup created');
  return { file, sizeBytes: size, stats, pruned };
}

import fs from 'fs/promises';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { backupFileName, createBackup, inspectBackup, pruneBackups } from '../../src/lib/backup';
import { openDatabase } from '../../src/lib/database';
import { UsageLedger } from '../../src/services/ledger.service';
import { createTempRoot, TEST_DAY } from '../helpers/test-utils';

describe('Database backup', () => {
    let root: string;
    let sourceFile: string;
    let backupDir: string;

    beforeEach(async () => {
        root = await createTempRoot();
        sourceFile = path.join(root, 'data', 'bot_users.db');
        backupDir = path.join(root, 'backups');
    });

    afterEach(async () => {
        await fs.rm(root, { recursive: true, force: true });
    });

    it('names backups by local timestamp', () => {
        expect(backupFileName(new Date(2024, 2, 5, 9, 7, 3))).toBe('backup_20240305_090703.db');
    });

    it('copies a live database and reports its contents', async () => {
        const handle = openDatabase(sourceFile);
        const ledger = new UsageLedger(handle.db);
        await ledger.setTier(1, true);
        await ledger.commitUsage(2, TEST_DAY, 40);
        await ledger.commitUsage(2, '2024-03-14', 10);

        try {
            const result = await createBackup({ sourceFile, backupDir, retention: 5, name: 'backup_manual.db' });

            expect(result.file).toBe(path.join(backupDir, 'backup_manual.db'));
            expect(result.sizeBytes).toBeGreaterThan(0);
            expect(result.stats).toEqual({ totalUsers: 2, proUsers: 1, usageLogs: 2 });
            expect(result.pruned).toEqual([]);
        } finally {
            handle.close();
        }
    });

    it('fails for a missing source database', async () => {
        await expect(createBackup({ sourceFile, backupDir, retention: 5 })).rejects.toThrow();
    });

    it('refuses to inspect a file that is not a database', async () => {
        const bogus = path.join(root, 'bogus.db');
        await fs.writeFile(bogus, 'definitely not sqlite');

        expect(() => inspectBackup(bogus)).toThrow();
    });

    it('prunes the oldest backups beyond the retention count', async () => {
        await fs.mkdir(backupDir, { recursive: true });
        const names = ['backup_20240101_000000.db', 'backup_20240102_000000.db', 'backup_20240103_000000.db'];
        for (const name of [...names, 'notes.txt']) {
            await fs.writeFile(path.join(backupDir, name), 'x');
        }

        const pruned = await pruneBackups(backupDir, 1);

        expect(pruned).toEqual(['backup_20240102_000000.db', 'backup_20240101_000000.db']);
        expect((await fs.readdir(backupDir)).sort()).toEqual(['backup_20240103_000000.db', 'notes.txt']);
    });
});

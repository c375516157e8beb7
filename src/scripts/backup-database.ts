/**
 * Database Backup Script
 *
 * Usage: npm run db:backup [-- backup_name]
 *
 * Copies the ledger database into BACKUP_DIR, verifies the copy and keeps
 * the newest BACKUP_RETENTION backups.
 */

import { DATABASE_FILE, env } from '../config/env';
import { createBackup } from '../lib/backup';

async function main() {
    const customName = process.argv[2];

    console.log('🗄️  Voice Memo Bot - Database Backup');
    console.log('='.repeat(40));
    console.log(`  Source: ${DATABASE_FILE}`);
    console.log(`  Backup dir: ${env.BACKUP_DIR}`);

    const result = await createBackup({
        sourceFile: DATABASE_FILE,
        backupDir: env.BACKUP_DIR,
        retention: env.BACKUP_RETENTION,
        name: customName ? `${customName}.db` : undefined,
    });

    console.log('\n✅ Backup created successfully!');
    console.log(`  File: ${result.file}`);
    console.log(`  Size: ${(result.sizeBytes / 1024).toFixed(1)} KB`);

    console.log('\n📊 Database Statistics:');
    console.log(`  Total users: ${result.stats.totalUsers}`);
    console.log(`  PRO users: ${result.stats.proUsers}`);
    console.log(`  Usage logs: ${result.stats.usageLogs}`);

    if (result.pruned.length > 0) {
        console.log(`\n🗑️  Removed ${result.pruned.length} old backup(s)`);
    }

    console.log('\n💡 Restore: stop the bot, copy the backup over the database file, start the bot.');
}

main().catch((e) => {
    console.error('❌ Backup failed:', e);
    process.exit(1);
});

/**
 * Usage Ledger
 *
 * Durable per-user accounting: account tier plus one usage record per user
 * per calendar day. Reads never throw (they log and fall back to a safe
 * default); writes report success as a boolean.
 */

import { and, asc, count, desc, eq, gte, lte, sql } from 'drizzle-orm';
import { users, usageLogs } from '../database/schema';
import type { LedgerDatabase } from '../lib/database';
import { logDatabaseError } from '../lib/database';
import { logger } from '../lib/logger';
import { addDays } from '../utils/calendar-day';

/** Day value used in exports for accounts without any usage record */
export const NO_USAGE_DATE = 'N/A';

export const RECENT_USAGE_DAYS = 7;

export interface UserStats {
    isPro: boolean;
    dailyUsage: number;
    totalUsage: number;
}

export interface TopUserEntry {
    userId: number;
    isPro: boolean;
    totalSeconds: number;
}

export interface DailyAggregate {
    day: string;
    activeUsers: number;
    totalSeconds: number;
    recordsWithUsage: number;
}

export interface DailyUsageEntry {
    day: string;
    seconds: number;
}

export interface UserDetail {
    userId: number;
    isPro: boolean;
    createdAt: string;
    todaySeconds: number;
    totalSeconds: number;
    recentUsage: DailyUsageEntry[];
}

export interface UsageExportRow {
    userId: number;
    isPro: boolean;
    createdAt: string;
    usageDate: string;
    secondsUsed: number;
}

export interface LedgerStore {
    ensureAccount(userId: number): Promise<boolean>;
    getDailyUsage(userId: number, day: string): Promise<number>;
    commitUsage(userId: number, day: string, seconds: number): Promise<boolean>;
    setTier(userId: number, isPro: boolean): Promise<boolean>;
    totalUsage(userId: number): Promise<number>;
    getUserStats(userId: number, day: string): Promise<UserStats>;
    countAccounts(): Promise<number>;
    countProAccounts(): Promise<number>;
    topUsers(limit: number): Promise<TopUserEntry[]>;
    dailyAggregate(day: string): Promise<DailyAggregate>;
    userDetail(userId: number, day: string): Promise<UserDetail | null>;
    exportRows(): Promise<UsageExportRow[]>;
    ping(): Promise<boolean>;
}

const totalSecondsExpr = sql<number>`coalesce(sum(${usageLogs.secondsUsed}), 0)`.mapWith(Number);

export class UsageLedger implements LedgerStore {
    constructor(private readonly db: LedgerDatabase) {}

    /**
     * Return the account's tier, creating the account with the default tier
     * when it does not exist yet.
     */
    async ensureAccount(userId: number): Promise<boolean> {
        return this.read('ensureAccount', false, { userId }, () => {
            const inserted = this.db.insert(users).values({ userId }).onConflictDoNothing().run();
            if (inserted.changes > 0) {
                logger.info({ userId }, 'Created new user');
            }

            const row = this.db
                .select({ isPro: users.isPro })
                .from(users)
                .where(eq(users.userId, userId))
                .get();
            return row?.isPro ?? false;
        });
    }

    async getDailyUsage(userId: number, day: string): Promise<number> {
        return this.read('getDailyUsage', 0, { userId, day }, () => {
            const row = this.db
                .select({ secondsUsed: usageLogs.secondsUsed })
                .from(usageLogs)
                .where(and(eq(usageLogs.userId, userId), eq(usageLogs.usageDate, day)))
                .get();
            return row?.secondsUsed ?? 0;
        });
    }

    /**
     * Add `seconds` to the user's record for `day`.
     * A single upsert keyed by the (user, day) unique index, so concurrent
     * commits for the same key accumulate instead of overwriting.
     */
    async commitUsage(userId: number, day: string, seconds: number): Promise<boolean> {
        if (!Number.isInteger(seconds) || seconds < 0) {
            logger.warn({ userId, day, seconds }, 'Rejected usage commit with invalid seconds');
            return false;
        }

        const committed = this.write('commitUsage', { userId, day, seconds }, () => {
            this.db.transaction((tx) => {
                tx.insert(users).values({ userId }).onConflictDoNothing().run();
                tx.insert(usageLogs)
                    .values({ userId, usageDate: day, secondsUsed: seconds })
                    .onConflictDoUpdate({
                        target: [usageLogs.userId, usageLogs.usageDate],
                        set: { secondsUsed: sql`seconds_used + excluded.seconds_used` },
                    })
                    .run();
            });
        });

        if (committed) {
            logger.info({ userId, day, seconds }, 'Usage committed');
        }
        return committed;
    }

    async setTier(userId: number, isPro: boolean): Promise<boolean> {
        const updated = this.write('setTier', { userId, isPro }, () => {
            this.db.transaction((tx) => {
                tx.insert(users).values({ userId }).onConflictDoNothing().run();
                tx.update(users).set({ isPro }).where(eq(users.userId, userId)).run();
            });
        });

        if (updated) {
            logger.info({ userId, tier: isPro ? 'pro' : 'standard' }, 'User tier updated');
        }
        return updated;
    }

    async totalUsage(userId: number): Promise<number> {
        return this.read('totalUsage', 0, { userId }, () => {
            const row = this.db
                .select({ total: totalSecondsExpr })
                .from(usageLogs)
                .where(eq(usageLogs.userId, userId))
                .get();
            return row?.total ?? 0;
        });
    }

    async getUserStats(userId: number, day: string): Promise<UserStats> {
        const isPro = await this.ensureAccount(userId);
        const [dailyUsage, totalUsage] = await Promise.all([
            this.getDailyUsage(userId, day),
            this.totalUsage(userId),
        ]);
        return { isPro, dailyUsage, totalUsage };
    }

    async countAccounts(): Promise<number> {
        return this.read('countAccounts', 0, {}, () => {
            const row = this.db.select({ value: count() }).from(users).get();
            return row?.value ?? 0;
        });
    }

    async countProAccounts(): Promise<number> {
        return this.read('countProAccounts', 0, {}, () => {
            const row = this.db
                .select({ value: count() })
                .from(users)
                .where(eq(users.isPro, true))
                .get();
            return row?.value ?? 0;
        });
    }

    /**
     * Accounts ordered by all-time usage, highest first; ties by ascending id.
     */
    async topUsers(limit: number): Promise<TopUserEntry[]> {
        return this.read<TopUserEntry[]>('topUsers', [], { limit }, () => {
            return this.db
                .select({
                    userId: users.userId,
                    isPro: users.isPro,
                    totalSeconds: totalSecondsExpr,
                })
                .from(users)
                .leftJoin(usageLogs, eq(usageLogs.userId, users.userId))
                .groupBy(users.userId)
                .orderBy(desc(totalSecondsExpr), asc(users.userId))
                .limit(limit)
                .all();
        });
    }

    async dailyAggregate(day: string): Promise<DailyAggregate> {
        const empty: DailyAggregate = { day, activeUsers: 0, totalSeconds: 0, recordsWithUsage: 0 };

        return this.read<DailyAggregate>('dailyAggregate', empty, { day }, () => {
            const row = this.db
                .select({
                    activeUsers: sql<number>`count(distinct ${usageLogs.userId})`.mapWith(Number),
                    totalSeconds: totalSecondsExpr,
                    recordsWithUsage: sql<number>`coalesce(sum(case when ${usageLogs.secondsUsed} > 0 then 1 else 0 end), 0)`.mapWith(Number),
                })
                .from(usageLogs)
                .where(eq(usageLogs.usageDate, day))
                .get();

            return row ? { day, ...row } : empty;
        });
    }

    async userDetail(userId: number, day: string): Promise<UserDetail | null> {
        return this.read<UserDetail | null>('userDetail', null, { userId }, () => {
            const account = this.db.select().from(users).where(eq(users.userId, userId)).get();
            if (!account) {
                return null;
            }

            const recent = this.db
                .select({ day: usageLogs.usageDate, seconds: usageLogs.secondsUsed })
                .from(usageLogs)
                .where(and(
                    eq(usageLogs.userId, userId),
                    gte(usageLogs.usageDate, addDays(day, 1 - RECENT_USAGE_DAYS)),
                    lte(usageLogs.usageDate, day)
                ))
                .orderBy(desc(usageLogs.usageDate))
                .all();

            const total = this.db
                .select({ total: totalSecondsExpr })
                .from(usageLogs)
                .where(eq(usageLogs.userId, userId))
                .get();

            const today = recent.find(entry => entry.day === day);

            return {
                userId: account.userId,
                isPro: account.isPro,
                createdAt: account.createdAt,
                todaySeconds: today?.seconds ?? 0,
                totalSeconds: total?.total ?? 0,
                recentUsage: recent,
            };
        });
    }

    /**
     * Every (user, day, seconds) record with account metadata; accounts with
     * no records appear once with NO_USAGE_DATE and zero seconds.
     */
    async exportRows(): Promise<UsageExportRow[]> {
        return this.read<UsageExportRow[]>('exportRows', [], {}, () => {
            const rows = this.db
                .select({
                    userId: users.userId,
                    isPro: users.isPro,
                    createdAt: users.createdAt,
                    usageDate: usageLogs.usageDate,
                    secondsUsed: usageLogs.secondsUsed,
                })
                .from(users)
                .leftJoin(usageLogs, eq(usageLogs.userId, users.userId))
                .orderBy(asc(users.userId), asc(usageLogs.usageDate))
                .all();

            return rows.map(row => ({
                userId: row.userId,
                isPro: row.isPro,
                createdAt: row.createdAt,
                usageDate: row.usageDate ?? NO_USAGE_DATE,
                secondsUsed: row.secondsUsed ?? 0,
            }));
        });
    }

    async ping(): Promise<boolean> {
        return this.read('ping', false, {}, () => {
            this.db.get(sql`select 1`);
            return true;
        });
    }

    private read<T>(operation: string, fallback: T, context: Record<string, unknown>, fn: () => T): T {
        try {
            return fn();
        } catch (error) {
            logDatabaseError(error, operation, context);
            return fallback;
        }
    }

    private write(operation: string, context: Record<string, unknown>, fn: () => void): boolean {
        try {
            fn();
            return true;
        } catch (error) {
            logDatabaseError(error, operation, context);
            return false;
        }
    }
}

/**
 * Admin Service
 *
 * Administrative reports over the usage ledger, shared by the chat
 * commands and the HTTP admin API.
 */

import { env } from '../config/env';
import { logger } from '../lib/logger';
import { maskUserId } from '../utils/audio-logger';
import type { DailyAggregate, LedgerStore, TopUserEntry, UsageExportRow, UserDetail } from './ledger.service';
import type { QuotaPolicy } from './quota-policy';

export const EXPORT_HEADER = 'user_id,is_pro,created_at,usage_date,seconds_used';

export const DEFAULT_TOP_LIMIT = 10;
export const MAX_TOP_LIMIT = 50;

export interface OverallStats {
    totalUsers: number;
    proUsers: number;
    freeUsers: number;
    today: DailyAggregate;
}

export interface AdminServiceOptions {
    adminUserId?: number;
}

function csvField(value: string | number): string {
    const text = String(value);
    if (/[",\n\r]/.test(text)) {
        return `"${text.replace(/"/g, '""')}"`;
    }
    return text;
}

export function toCsvLine(row: UsageExportRow): string {
    return [row.userId, row.isPro ? 1 : 0, row.createdAt, row.usageDate, row.secondsUsed]
        .map(csvField)
        .join(',');
}

export function clampTopLimit(limit: number | undefined): number {
    if (limit === undefined || !Number.isFinite(limit)) {
        return DEFAULT_TOP_LIMIT;
    }
    return Math.min(MAX_TOP_LIMIT, Math.max(1, Math.floor(limit)));
}

export class AdminService {
    private readonly adminUserId: number | undefined;

    constructor(
        private readonly ledger: LedgerStore,
        private readonly quota: QuotaPolicy,
        options: AdminServiceOptions = {}
    ) {
        this.adminUserId = 'adminUserId' in options ? options.adminUserId : env.ADMIN_USER_ID;
        if (this.adminUserId === undefined) {
            logger.warn('⚠️  ADMIN_USER_ID not configured - admin commands are disabled');
        }
    }

    isAdmin(userId: number): boolean {
        return this.adminUserId !== undefined && userId === this.adminUserId;
    }

    async setTier(userId: number, isPro: boolean): Promise<boolean> {
        const updated = await this.ledger.setTier(userId, isPro);
        logger.info({ user: maskUserId(userId), isPro, updated }, 'Admin tier change');
        return updated;
    }

    async overallStats(): Promise<OverallStats> {
        const [totalUsers, proUsers, today] = await Promise.all([
            this.ledger.countAccounts(),
            this.ledger.countProAccounts(),
            this.ledger.dailyAggregate(this.quota.today()),
        ]);

        return { totalUsers, proUsers, freeUsers: totalUsers - proUsers, today };
    }

    async topUsers(limit?: number): Promise<TopUserEntry[]> {
        return this.ledger.topUsers(clampTopLimit(limit));
    }

    async dailyStats(day?: string): Promise<DailyAggregate> {
        return this.ledger.dailyAggregate(day ?? this.quota.today());
    }

    async userDetail(userId: number): Promise<UserDetail | null> {
        return this.ledger.userDetail(userId, this.quota.today());
    }

    /**
     * Full usage export as CSV text, header row first.
     */
    async exportCsv(): Promise<string> {
        const rows = await this.ledger.exportRows();
        return [EXPORT_HEADER, ...rows.map(toCsvLine)].join('\n') + '\n';
    }
}

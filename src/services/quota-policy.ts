/**
 * Quota Policy
 *
 * `evaluateQuota` is the pure admit/deny decision; `QuotaPolicy` feeds it
 * from the ledger for a given user and day.
 */

import { env } from '../config/env';
import { formatBudget, formatMinutesSeconds } from '../config/user-messages';
import type { ProcessingMode } from '../config/processing-modes';
import { calendarDay, Clock, systemClock } from '../utils/calendar-day';
import type { LedgerStore } from './ledger.service';

/** Free daily allowance for standard accounts, in seconds */
export const DAILY_LIMIT_SECONDS = env.DAILY_LIMIT_SECONDS;

export type RemainingBudget = number | 'unlimited';

export interface QuotaDecision {
    admitted: boolean;
    reason: string;
    remainingSeconds: RemainingBudget;
}

export interface QuotaInput {
    isPro: boolean;
    dailyUsage: number;
    requestedSeconds: number;
    dailyLimitSeconds: number;
}

export function evaluateQuota({ isPro, dailyUsage, requestedSeconds, dailyLimitSeconds }: QuotaInput): QuotaDecision {
    if (isPro) {
        return {
            admitted: true,
            reason: 'PRO user - unlimited access',
            remainingSeconds: 'unlimited',
        };
    }

    // May go negative after an administrative correction or a limit change
    const remaining = dailyLimitSeconds - dailyUsage;

    if (remaining <= 0) {
        return {
            admitted: false,
            reason: `Daily limit exceeded (${formatBudget(dailyLimitSeconds)}). Upgrade to PRO for unlimited access.`,
            remainingSeconds: 0,
        };
    }

    if (requestedSeconds > remaining) {
        return {
            admitted: false,
            reason: `Voice message too long. You have ${formatMinutesSeconds(remaining)} remaining today.`,
            remainingSeconds: remaining,
        };
    }

    const after = remaining - requestedSeconds;
    return {
        admitted: true,
        reason: `Processing allowed. ${after}s remaining today.`,
        remainingSeconds: after,
    };
}

/**
 * Seconds to charge once a job's transcription has succeeded.
 */
export type ChargingPolicy = (job: { durationSeconds: number }, mode: ProcessingMode) => number;

export const chargeByDuration: ChargingPolicy = (job) => Math.max(0, Math.round(job.durationSeconds));

export interface QuotaPolicyOptions {
    dailyLimitSeconds?: number;
    clock?: Clock;
}

export class QuotaPolicy {
    readonly dailyLimitSeconds: number;
    private readonly clock: Clock;

    constructor(private readonly ledger: LedgerStore, options: QuotaPolicyOptions = {}) {
        this.dailyLimitSeconds = options.dailyLimitSeconds ?? DAILY_LIMIT_SECONDS;
        this.clock = options.clock ?? systemClock;
    }

    today(): string {
        return calendarDay(this.clock());
    }

    async evaluate(userId: number, requestedSeconds: number): Promise<QuotaDecision> {
        const isPro = await this.ledger.ensureAccount(userId);
        const dailyUsage = isPro ? 0 : await this.ledger.getDailyUsage(userId, this.today());

        return evaluateQuota({
            isPro,
            dailyUsage,
            requestedSeconds,
            dailyLimitSeconds: this.dailyLimitSeconds,
        });
    }

    /**
     * Remaining budget for the self-check command
     */
    remainingFor(isPro: boolean, dailyUsage: number): RemainingBudget {
        if (isPro) return 'unlimited';
        return Math.max(0, this.dailyLimitSeconds - dailyUsage);
    }
}

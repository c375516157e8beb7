/**
 * Message Formatter Service
 *
 * Formats processing results, mode keyboards and admin reports for Telegram,
 * and splits text that exceeds the message length limit.
 */

import {
    PROCESSING_MODE_KEYS,
    PROCESSING_MODES,
    ProcessingMode,
    isProcessingMode,
} from '../config/processing-modes';
import { formatMinutesSeconds, PROCESSING_ERROR_MESSAGES } from '../config/user-messages';
import type { RemainingBudget } from './quota-policy';
import type { DailyAggregate, TopUserEntry, UserDetail, UserStats } from './ledger.service';
import type { InlineKeyboardMarkup } from '../types/telegram.types';

/**
 * Telegram message limit
 */
export const TELEGRAM_MAX_MESSAGE_LENGTH = 4096;

const RESULT_HEADERS: Record<ProcessingMode, string> = {
    basic: "✅ Here's your structured text:",
    summary: "✅ Here's your summary:",
    translate: "✅ Here's your translated text:",
};

export interface ModeSelection {
    mode: ProcessingMode;
    token: string;
}

/**
 * Callback payload for a mode button: `<mode>:<token>`
 */
export function formatCallbackData(mode: ProcessingMode, token: string): string {
    return `${mode}:${token}`;
}

/**
 * Parse a callback payload. Unknown modes and malformed payloads yield null.
 */
export function parseCallbackData(data: string | undefined): ModeSelection | null {
    if (!data) return null;

    const separator = data.indexOf(':');
    if (separator <= 0 || separator === data.length - 1) {
        return null;
    }

    const mode = data.substring(0, separator);
    const token = data.substring(separator + 1);
    if (!isProcessingMode(mode)) {
        return null;
    }
    return { mode, token };
}

export function buildModeKeyboard(token: string): InlineKeyboardMarkup {
    return {
        inline_keyboard: [
            PROCESSING_MODE_KEYS.map(mode => ({
                text: PROCESSING_MODES[mode].label,
                callback_data: formatCallbackData(mode, token),
            })),
        ],
    };
}

/**
 * Result text for a finished job. Degraded results carry the raw
 * transcript behind a notice that generation was unavailable.
 */
export function formatProcessingResult(mode: ProcessingMode, text: string, degraded: boolean): string {
    if (degraded) {
        return `${PROCESSING_ERROR_MESSAGES.GENERATION_FAILED}\n\n${text}`;
    }
    return `${RESULT_HEADERS[mode]}\n\n${text}`;
}

export function formatRemaining(remaining: RemainingBudget): string {
    return remaining === 'unlimited' ? 'Unlimited' : formatMinutesSeconds(remaining);
}

export function formatUsageReport(stats: UserStats, remaining: RemainingBudget): string {
    return [
        '📊 Your usage',
        '',
        `Plan: ${stats.isPro ? 'PRO ⭐' : 'Free'}`,
        `Today: ${formatMinutesSeconds(stats.dailyUsage)}`,
        `Total: ${formatMinutesSeconds(stats.totalUsage)}`,
        `Remaining today: ${formatRemaining(remaining)}`,
    ].join('\n');
}

export function formatOverallStats(totalUsers: number, proUsers: number, today: DailyAggregate): string {
    return [
        '📈 Bot statistics',
        '',
        `Total users: ${totalUsers}`,
        `PRO users: ${proUsers}`,
        `Free users: ${totalUsers - proUsers}`,
        '',
        `Today (${today.day}):`,
        `Active users: ${today.activeUsers}`,
        `Audio processed: ${formatMinutesSeconds(today.totalSeconds)}`,
    ].join('\n');
}

export function formatTopUsers(entries: TopUserEntry[]): string {
    if (entries.length === 0) {
        return '🏆 No users yet.';
    }

    const lines = [`🏆 Top ${entries.length} users by total usage`, ''];
    entries.forEach((entry, index) => {
        const badge = entry.isPro ? ' ⭐' : '';
        lines.push(`${index + 1}. ${entry.userId}${badge}: ${formatMinutesSeconds(entry.totalSeconds)}`);
    });
    return lines.join('\n');
}

export function formatDailyAggregate(aggregate: DailyAggregate): string {
    return [
        `📅 Usage for ${aggregate.day}`,
        '',
        `Active users: ${aggregate.activeUsers}`,
        `Records with usage: ${aggregate.recordsWithUsage}`,
        `Audio processed: ${formatMinutesSeconds(aggregate.totalSeconds)}`,
    ].join('\n');
}

export function formatUserDetail(detail: UserDetail): string {
    const lines = [
        `👤 User ${detail.userId}`,
        '',
        `Plan: ${detail.isPro ? 'PRO ⭐' : 'Free'}`,
        `Created: ${detail.createdAt}`,
        `Today: ${formatMinutesSeconds(detail.todaySeconds)}`,
        `Total: ${formatMinutesSeconds(detail.totalSeconds)}`,
    ];

    if (detail.recentUsage.length > 0) {
        lines.push('', 'Recent usage:');
        for (const entry of detail.recentUsage) {
            lines.push(`• ${entry.day}: ${formatMinutesSeconds(entry.seconds)}`);
        }
    }

    return lines.join('\n');
}

/**
 * Split a long message into multiple messages
 *
 * Strategy:
 * 1. Try to split at paragraph boundaries (double newlines)
 * 2. If not possible, split at single newlines
 * 3. If still too long, split at word boundaries
 * 4. Hard split as a last resort
 */
export function splitLongMessage(
    message: string,
    maxLength: number = TELEGRAM_MAX_MESSAGE_LENGTH
): string[] {
    if (message.length <= maxLength) {
        return [message];
    }

    const parts: string[] = [];
    let remaining = message;

    while (remaining.length > 0) {
        if (remaining.length <= maxLength) {
            parts.push(remaining);
            break;
        }

        const splitIndex = findBestSplitPoint(remaining, maxLength);

        const part = remaining.substring(0, splitIndex).trim();
        if (part.length > 0) {
            parts.push(part);
        }

        remaining = remaining.substring(splitIndex).trim();
    }

    return parts;
}

function findBestSplitPoint(text: string, maxLength: number): number {
    // Search windows end at maxLength - 1 so the kept part never exceeds the limit
    const paragraphBreak = text.lastIndexOf('\n\n', maxLength - 1);
    if (paragraphBreak > maxLength * 0.5) {
        return paragraphBreak + 2;
    }

    const lineBreak = text.lastIndexOf('\n', maxLength - 1);
    if (lineBreak > maxLength * 0.5) {
        return lineBreak + 1;
    }

    const wordBreak = text.lastIndexOf(' ', maxLength - 1);
    if (wordBreak > maxLength * 0.5) {
        return wordBreak + 1;
    }

    return maxLength;
}

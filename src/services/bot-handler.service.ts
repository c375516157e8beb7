/**
 * Bot Handler
 *
 * Routes Telegram updates: voice messages and mode selections go to the
 * dispatcher, text commands to the usage and admin reports.
 */

import { z } from 'zod';
import { BOT_MESSAGES, getProcessingErrorMessage } from '../config/user-messages';
import { logger } from '../lib/logger';
import { maskUserId } from '../utils/audio-logger';
import type { TelegramCallbackQuery, TelegramMessage, TelegramUpdate } from '../types/telegram.types';
import type { AdminService } from './admin.service';
import type { SelectionOutcome, VoiceDispatcher } from './dispatch.service';
import type { LedgerStore } from './ledger.service';
import {
    formatDailyAggregate,
    formatOverallStats,
    formatTopUsers,
    formatUsageReport,
    formatUserDetail,
    parseCallbackData,
} from './message-formatter.service';
import type { QuotaPolicy } from './quota-policy';
import type { BotTransport } from './telegram-client.service';

const userIdArg = z.coerce.number().int().positive();
const dayArg = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

const setProArgs = z.tuple([userIdArg, z.enum(['on', 'off'])]);
const topArg = z.coerce.number().int().optional();
const dailyArg = dayArg.optional();
const userArgs = z.tuple([userIdArg]);

const ADMIN_COMMANDS = new Set(['setpro', 'stats', 'top', 'daily', 'user', 'export']);

export interface ParsedCommand {
    name: string;
    args: string[];
}

/**
 * Parse `/name@bot arg1 arg2`. Returns null for non-command text.
 */
export function parseCommand(text: string | undefined): ParsedCommand | null {
    if (!text || !text.startsWith('/')) return null;

    const [head, ...args] = text.trim().split(/\s+/);
    const name = head.substring(1).split('@')[0].toLowerCase();
    if (!name) return null;

    return { name, args };
}

export interface BotHandlerDeps {
    dispatcher: VoiceDispatcher;
    ledger: LedgerStore;
    quota: QuotaPolicy;
    admin: AdminService;
    transport: BotTransport;
}

export class BotHandler {
    constructor(private readonly deps: BotHandlerDeps) {}

    async handleUpdate(update: TelegramUpdate): Promise<void> {
        try {
            if (update.callback_query) {
                await this.handleCallback(update.callback_query);
                return;
            }

            if (update.message) {
                await this.handleMessage(update.message);
                return;
            }

            logger.debug({ updateId: update.update_id }, 'Ignoring unsupported update type');
        } catch (error) {
            logger.error({
                updateId: update.update_id,
                error: error instanceof Error ? error.message : String(error),
                stack: error instanceof Error ? error.stack : undefined,
            }, '❌ Error handling update');
            throw error;
        }
    }

    private async handleMessage(message: TelegramMessage): Promise<void> {
        const userId = message.from?.id;
        if (userId === undefined) {
            return;
        }

        if (message.voice) {
            await this.deps.dispatcher.handleVoice({
                userId,
                chatId: message.chat.id,
                sourceId: message.voice.file_unique_id,
                fileId: message.voice.file_id,
                durationSeconds: message.voice.duration,
            });
            return;
        }

        const command = parseCommand(message.text);
        if (command) {
            await this.handleCommand(userId, message.chat.id, command);
        }
    }

    private async handleCallback(query: TelegramCallbackQuery): Promise<void> {
        const chatId = query.message?.chat.id ?? query.from.id;
        const selection = parseCallbackData(query.data);

        if (!selection) {
            await this.deps.transport.answerCallback(query.id, BOT_MESSAGES.unknownSelection);
            return;
        }

        await this.deps.transport.answerCallback(query.id);

        const outcome = await this.deps.dispatcher.handleModeSelection({
            userId: query.from.id,
            token: selection.token,
            mode: selection.mode,
        });

        const reply = this.selectionReply(outcome);
        if (reply) {
            await this.deps.transport.sendMessage(chatId, reply);
        }
    }

    /**
     * Outcomes the dispatcher does not report on the job's status message
     */
    private selectionReply(outcome: SelectionOutcome): string | null {
        switch (outcome.state) {
            case 'Expired':
                return getProcessingErrorMessage('CACHE_EXPIRED');
            case 'Rejected':
                return outcome.reason === 'NOT_OWNER' ? BOT_MESSAGES.notYourMessage : BOT_MESSAGES.alreadyProcessing;
            case 'Completed':
            case 'ProcessingFailed':
                return null;
        }
    }

    private async handleCommand(userId: number, chatId: number, command: ParsedCommand): Promise<void> {
        if (ADMIN_COMMANDS.has(command.name) && !this.deps.admin.isAdmin(userId)) {
            logger.warn({ user: maskUserId(userId), command: command.name }, 'Unauthorized admin command');
            await this.deps.transport.sendMessage(chatId, getProcessingErrorMessage('UNAUTHORIZED'));
            return;
        }

        const reply = await this.runCommand(userId, chatId, command);
        if (reply) {
            await this.deps.transport.sendMessage(chatId, reply);
        }
    }

    private async runCommand(userId: number, chatId: number, { name, args }: ParsedCommand): Promise<string | null> {
        switch (name) {
            case 'start':
                return BOT_MESSAGES.start;

            case 'help':
                return BOT_MESSAGES.help(this.deps.quota.dailyLimitSeconds);

            case 'usage': {
                const stats = await this.deps.ledger.getUserStats(userId, this.deps.quota.today());
                return formatUsageReport(stats, this.deps.quota.remainingFor(stats.isPro, stats.dailyUsage));
            }

            case 'setpro': {
                const parsed = setProArgs.safeParse(args);
                if (!parsed.success) return 'Usage: /setpro <user_id> <on|off>';

                const [targetId, flag] = parsed.data;
                const isPro = flag === 'on';
                const updated = await this.deps.admin.setTier(targetId, isPro);
                return updated
                    ? `✅ User ${targetId} is now ${isPro ? 'PRO' : 'Free'}.`
                    : `❌ Could not update user ${targetId}.`;
            }

            case 'stats': {
                const stats = await this.deps.admin.overallStats();
                return formatOverallStats(stats.totalUsers, stats.proUsers, stats.today);
            }

            case 'top': {
                const parsed = topArg.safeParse(args[0]);
                if (!parsed.success || args.length > 1) return 'Usage: /top [limit]';
                return formatTopUsers(await this.deps.admin.topUsers(parsed.data));
            }

            case 'daily': {
                const parsed = dailyArg.safeParse(args[0]);
                if (!parsed.success || args.length > 1) return 'Usage: /daily [YYYY-MM-DD]';
                return formatDailyAggregate(await this.deps.admin.dailyStats(parsed.data));
            }

            case 'user': {
                const parsed = userArgs.safeParse(args);
                if (!parsed.success) return 'Usage: /user <user_id>';

                const detail = await this.deps.admin.userDetail(parsed.data[0]);
                return detail ? formatUserDetail(detail) : `User ${parsed.data[0]} not found.`;
            }

            case 'export': {
                const csv = await this.deps.admin.exportCsv();
                const fileName = `usage_export_${this.deps.quota.today()}.csv`;
                await this.deps.transport.sendDocument(chatId, fileName, csv, '📊 Usage export');
                return null;
            }

            default:
                return BOT_MESSAGES.unknownCommand;
        }
    }
}

import fs from 'fs/promises';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { BOT_MESSAGES, PROCESSING_ERROR_MESSAGES } from '../../src/config/user-messages';
import type { DatabaseHandle } from '../../src/lib/database';
import { AdminService, EXPORT_HEADER } from '../../src/services/admin.service';
import { BotHandler, parseCommand } from '../../src/services/bot-handler.service';
import { VoiceDispatcher } from '../../src/services/dispatch.service';
import type { UsageLedger } from '../../src/services/ledger.service';
import { PendingJobCache } from '../../src/services/pending-job-cache.service';
import { QuotaPolicy } from '../../src/services/quota-policy';
import {
    callbackUpdate,
    createTempRoot,
    createTestLedger,
    FakeConverter,
    FakeGenerator,
    FakeTranscriber,
    FakeTransport,
    fixedClock,
    TEST_DAY,
    textUpdate,
    voiceUpdate,
} from '../helpers/test-utils';

const ADMIN_ID = 1000;

describe('parseCommand', () => {
    it('splits the command name from its arguments', () => {
        expect(parseCommand('/setpro 12345 on')).toEqual({ name: 'setpro', args: ['12345', 'on'] });
    });

    it('lowercases the name and drops the bot mention', () => {
        expect(parseCommand('/Usage@VoiceNotesBot')).toEqual({ name: 'usage', args: [] });
    });

    it('ignores plain text and a bare slash', () => {
        expect(parseCommand('hello there')).toBeNull();
        expect(parseCommand('/')).toBeNull();
        expect(parseCommand(undefined)).toBeNull();
    });
});

describe('BotHandler', () => {
    let root: string;
    let handle: DatabaseHandle;
    let ledger: UsageLedger;
    let cache: PendingJobCache;
    let transport: FakeTransport;
    let handler: BotHandler;

    function lastSent(): string | undefined {
        return transport.sent[transport.sent.length - 1]?.text;
    }

    beforeEach(async () => {
        root = await createTempRoot();
        ({ handle, ledger } = createTestLedger());
        const quota = new QuotaPolicy(ledger, { clock: fixedClock });
        cache = new PendingJobCache({ ttlMs: 60_000, secret: 'test-secret' });
        transport = new FakeTransport();

        const dispatcher = new VoiceDispatcher({
            quota,
            ledger,
            cache,
            transport,
            converter: new FakeConverter(),
            transcriber: new FakeTranscriber(),
            generator: new FakeGenerator(),
            tempDir: root,
        });
        const admin = new AdminService(ledger, quota, { adminUserId: ADMIN_ID });

        handler = new BotHandler({ dispatcher, ledger, quota, admin, transport });
    });

    afterEach(async () => {
        await cache.dispose();
        handle.close();
        await fs.rm(root, { recursive: true, force: true });
    });

    describe('user commands', () => {
        it('greets on /start', async () => {
            await handler.handleUpdate(textUpdate(42, '/start'));

            expect(transport.sent).toEqual([{ chatId: 42, text: BOT_MESSAGES.start, keyboard: undefined }]);
        });

        it('explains the daily allowance on /help', async () => {
            await handler.handleUpdate(textUpdate(42, '/help'));

            expect(lastSent()).toContain('Free accounts can process 5 minutes of audio per day.');
        });

        it('reports usage and remaining budget', async () => {
            await ledger.commitUsage(42, TEST_DAY, 100);

            await handler.handleUpdate(textUpdate(42, '/usage'));

            expect(lastSent()).toBe([
                '📊 Your usage',
                '',
                'Plan: Free',
                'Today: 1m 40s',
                'Total: 1m 40s',
                'Remaining today: 3m 20s',
            ].join('\n'));
        });

        it('reports unlimited budget for PRO accounts', async () => {
            await ledger.setTier(42, true);

            await handler.handleUpdate(textUpdate(42, '/usage'));

            expect(lastSent()).toContain('Remaining today: Unlimited');
        });

        it('answers unknown commands', async () => {
            await handler.handleUpdate(textUpdate(42, '/dance'));

            expect(lastSent()).toBe(BOT_MESSAGES.unknownCommand);
        });

        it('stays quiet on plain text', async () => {
            await handler.handleUpdate(textUpdate(42, 'just chatting'));

            expect(transport.sent).toHaveLength(0);
        });
    });

    describe('admin commands', () => {
        it('refuses admin commands from other users', async () => {
            await handler.handleUpdate(textUpdate(42, '/setpro 42 on'));

            expect(lastSent()).toBe(PROCESSING_ERROR_MESSAGES.UNAUTHORIZED);
            expect(await ledger.ensureAccount(42)).toBe(false);
        });

        it('grants and revokes PRO', async () => {
            await handler.handleUpdate(textUpdate(ADMIN_ID, '/setpro 12345 on'));
            expect(lastSent()).toBe('✅ User 12345 is now PRO.');
            expect(await ledger.ensureAccount(12345)).toBe(true);

            await handler.handleUpdate(textUpdate(ADMIN_ID, '/setpro 12345 off'));
            expect(lastSent()).toBe('✅ User 12345 is now Free.');
            expect(await ledger.ensureAccount(12345)).toBe(false);
        });

        it('shows usage for malformed arguments', async () => {
            await handler.handleUpdate(textUpdate(ADMIN_ID, '/setpro 12345 maybe'));
            expect(lastSent()).toBe('Usage: /setpro <user_id> <on|off>');

            await handler.handleUpdate(textUpdate(ADMIN_ID, '/top many'));
            expect(lastSent()).toBe('Usage: /top [limit]');

            await handler.handleUpdate(textUpdate(ADMIN_ID, '/daily 2024-13'));
            expect(lastSent()).toBe('Usage: /daily [YYYY-MM-DD]');

            await handler.handleUpdate(textUpdate(ADMIN_ID, '/user'));
            expect(lastSent()).toBe('Usage: /user <user_id>');
        });

        it('lists top users', async () => {
            await ledger.commitUsage(1, TEST_DAY, 30);
            await ledger.commitUsage(2, TEST_DAY, 90);
            await ledger.setTier(2, true);

            await handler.handleUpdate(textUpdate(ADMIN_ID, '/top 2'));

            expect(lastSent()).toBe([
                '🏆 Top 2 users by total usage',
                '',
                '1. 2 ⭐: 1m 30s',
                '2. 1: 0m 30s',
            ].join('\n'));
        });

        it('reports one day', async () => {
            await ledger.commitUsage(1, '2024-03-10', 75);

            await handler.handleUpdate(textUpdate(ADMIN_ID, '/daily 2024-03-10'));

            expect(lastSent()).toBe([
                '📅 Usage for 2024-03-10',
                '',
                'Active users: 1',
                'Records with usage: 1',
                'Audio processed: 1m 15s',
            ].join('\n'));
        });

        it('reports an unknown user', async () => {
            await handler.handleUpdate(textUpdate(ADMIN_ID, '/user 77'));

            expect(lastSent()).toBe('User 77 not found.');
        });

        it('sends the export as a document', async () => {
            await ledger.ensureAccount(5);

            await handler.handleUpdate(textUpdate(ADMIN_ID, '/export'));

            expect(transport.documents).toHaveLength(1);
            const [document] = transport.documents;
            expect(document.chatId).toBe(ADMIN_ID);
            expect(document.fileName).toBe(`usage_export_${TEST_DAY}.csv`);
            expect(document.caption).toBe('📊 Usage export');
            expect(document.content.split('\n')[0]).toBe(EXPORT_HEADER);
            expect(transport.sent).toHaveLength(0);
        });
    });

    describe('voice flow', () => {
        it('stages a voice message and completes it on selection', async () => {
            await handler.handleUpdate(voiceUpdate(42, 20));
            const token = cache.tokenFor(42, 'unique-1');
            expect(cache.size).toBe(1);

            await handler.handleUpdate(callbackUpdate(42, `summary:${token}`));

            expect(transport.answers).toEqual([{ id: 'callback-1', text: undefined }]);
            expect(transport.edits[transport.edits.length - 1].text)
                .toBe("✅ Here's your summary:\n\nHello from the voice note.");
            expect(await ledger.getDailyUsage(42, TEST_DAY)).toBe(20);
            expect(cache.size).toBe(0);
        });

        it('tells the user when a selection has expired', async () => {
            await handler.handleUpdate(callbackUpdate(42, 'basic:AAAAAAAAAAAAAAAA'));

            expect(lastSent()).toBe(PROCESSING_ERROR_MESSAGES.CACHE_EXPIRED);
        });

        it('rejects a selection from someone else', async () => {
            await handler.handleUpdate(voiceUpdate(42, 20));
            const token = cache.tokenFor(42, 'unique-1');

            await handler.handleUpdate(callbackUpdate(43, `basic:${token}`));

            expect(lastSent()).toBe(BOT_MESSAGES.notYourMessage);
            expect(cache.size).toBe(1);
        });

        it('answers unparseable callback data without dispatching', async () => {
            await handler.handleUpdate(callbackUpdate(42, 'shout:abc'));

            expect(transport.answers).toEqual([{ id: 'callback-1', text: BOT_MESSAGES.unknownSelection }]);
            expect(transport.sent).toHaveLength(0);
        });
    });

    it('rethrows transport failures after logging', async () => {
        vi.spyOn(transport, 'sendMessage').mockRejectedValue(new Error('telegram down'));

        await expect(handler.handleUpdate(textUpdate(42, '/start'))).rejects.toThrow('telegram down');
    });
});

/**
 * Voice Dispatcher
 *
 * Drives one voice submission through its states:
 *
 *   Received -> Denied | ConversionFailed | Staged
 *   Staged --(mode selected)--> Expired | Completed | ProcessingFailed
 *
 * The job's work directory belongs to the submission until it is staged and
 * to the cache afterwards; a selection leases the staged job and completes
 * the lease on every terminal state.
 */

import fs from 'fs/promises';
import { env } from '../config/env';
import type { ProcessingMode } from '../config/processing-modes';
import { BOT_MESSAGES, getProcessingErrorMessage, ProcessingErrorCode } from '../config/user-messages';
import { logger } from '../lib/logger';
import {
    logResultSent,
    logTranscriptionSuccess,
    logVoiceDenied,
    logVoiceDownloaded,
    logVoiceReceived,
    logVoiceStaged,
    logVoiceStageError,
} from '../utils/audio-logger';
import { withWorkspace } from '../utils/workspace';
import type { AudioConverter } from './audio-converter.service';
import type { LedgerStore } from './ledger.service';
import { buildModeKeyboard, formatProcessingResult, splitLongMessage } from './message-formatter.service';
import type { PendingJob, PendingJobCache } from './pending-job-cache.service';
import { chargeByDuration, ChargingPolicy, QuotaDecision, QuotaPolicy } from './quota-policy';
import type { BotTransport } from './telegram-client.service';
import type { TextGenerationService } from './text-generation.service';
import type { TranscriptionService } from './transcription.service';
import type { InlineKeyboardMarkup } from '../types/telegram.types';

export interface VoiceSubmission {
    userId: number;
    chatId: number;
    /** Stable id of the recording; with userId it determines the job token */
    sourceId: string;
    /** Id used to download the recording */
    fileId: string;
    durationSeconds: number;
}

export interface ModeSelectionEvent {
    userId: number;
    token: string;
    mode: ProcessingMode;
}

export type VoiceOutcome =
    | { state: 'Denied'; decision: QuotaDecision }
    | { state: 'ConversionFailed'; errorCode: ProcessingErrorCode }
    | { state: 'Staged'; token: string; decision: QuotaDecision };

export type SelectionOutcome =
    | { state: 'Expired' }
    | { state: 'Rejected'; reason: 'NOT_OWNER' | 'ALREADY_PROCESSING' }
    | { state: 'ProcessingFailed'; errorCode: ProcessingErrorCode }
    | {
        state: 'Completed';
        text: string;
        degraded: boolean;
        chargedSeconds: number;
        /** False when the ledger write failed */
        committed: boolean;
    };

export interface VoiceDispatcherDeps {
    quota: QuotaPolicy;
    ledger: LedgerStore;
    cache: PendingJobCache;
    transport: BotTransport;
    converter: AudioConverter;
    transcriber: TranscriptionService;
    generator: TextGenerationService;
    chargingPolicy?: ChargingPolicy;
    tempDir?: string;
}

const ORIGINAL_FILE = 'voice.ogg';
const CONVERTED_FILE = 'voice.mp3';

export class VoiceDispatcher {
    private readonly chargingPolicy: ChargingPolicy;
    private readonly tempDir: string;

    constructor(private readonly deps: VoiceDispatcherDeps) {
        this.chargingPolicy = deps.chargingPolicy ?? chargeByDuration;
        this.tempDir = deps.tempDir ?? env.TEMP_DIR;
    }

    async handleVoice(submission: VoiceSubmission): Promise<VoiceOutcome> {
        const { userId, chatId, sourceId, durationSeconds } = submission;
        logVoiceReceived({ userId, sourceId, durationSeconds });

        const decision = await this.deps.quota.evaluate(userId, durationSeconds);
        if (!decision.admitted) {
            logVoiceDenied({ userId, sourceId, durationSeconds }, decision.reason);
            await this.notify(chatId, `❌ ${decision.reason}`);
            return { state: 'Denied', decision };
        }

        const statusMessageId = await this.notify(chatId, BOT_MESSAGES.receiving);

        return withWorkspace(this.tempDir, async (workspace, handOff): Promise<VoiceOutcome> => {
            const originalPath = workspace.file(ORIGINAL_FILE);
            const convertedPath = workspace.file(CONVERTED_FILE);

            try {
                const fileSize = await this.deps.transport.downloadFile(submission.fileId, originalPath);
                logVoiceDownloaded({ userId, sourceId, fileSize, durationSeconds });
            } catch (error) {
                logVoiceStageError('download', {
                    userId,
                    sourceId,
                    error: { code: 'DOWNLOAD_FAILED', message: error instanceof Error ? error.message : String(error) },
                });
                await this.report(chatId, statusMessageId, getProcessingErrorMessage('DOWNLOAD_FAILED'));
                return { state: 'ConversionFailed', errorCode: 'DOWNLOAD_FAILED' };
            }

            const conversion = await this.deps.converter.convert(originalPath, convertedPath);
            if (!conversion.success) {
                const errorCode = conversion.error?.code ?? 'CONVERSION_FAILED';
                logVoiceStageError('conversion', {
                    userId,
                    sourceId,
                    error: { code: errorCode, message: conversion.error?.message ?? 'unknown' },
                });
                await this.report(chatId, statusMessageId, getProcessingErrorMessage(errorCode));
                return { state: 'ConversionFailed', errorCode };
            }

            const token = await this.deps.cache.stage({
                userId,
                chatId,
                sourceId,
                durationSeconds,
                workDir: workspace.dir,
                originalPath,
                convertedPath,
                statusMessageId,
            });
            handOff();
            logVoiceStaged({ userId, sourceId, token, durationSeconds });

            await this.report(chatId, statusMessageId, BOT_MESSAGES.chooseMode, buildModeKeyboard(token));
            return { state: 'Staged', token, decision };
        });
    }

    async handleModeSelection(selection: ModeSelectionEvent): Promise<SelectionOutcome> {
        const job = await this.deps.cache.take(selection.token);
        if (!job) {
            return { state: 'Expired' };
        }

        if (job.userId !== selection.userId) {
            logger.warn({ token: selection.token }, 'Mode selection from a user who does not own the job');
            return { state: 'Rejected', reason: 'NOT_OWNER' };
        }

        if (!this.deps.cache.acquire(job)) {
            return { state: 'Rejected', reason: 'ALREADY_PROCESSING' };
        }

        try {
            return await this.process(job, selection.mode);
        } finally {
            await this.deps.cache.complete(job);
        }
    }

    private async process(job: PendingJob, mode: ProcessingMode): Promise<SelectionOutcome> {
        const { userId, chatId, token, statusMessageId } = job;

        await this.report(chatId, statusMessageId, BOT_MESSAGES.transcribing);

        let audio: Buffer;
        try {
            audio = await fs.readFile(job.convertedPath);
        } catch (error) {
            logVoiceStageError('file lookup', {
                userId,
                token,
                error: { code: 'FILE_MISSING', message: error instanceof Error ? error.message : String(error) },
            });
            await this.report(chatId, statusMessageId, getProcessingErrorMessage('FILE_MISSING'));
            return { state: 'ProcessingFailed', errorCode: 'FILE_MISSING' };
        }

        const transcription = await this.deps.transcriber.transcribe(audio, {
            jobId: token,
            fileName: CONVERTED_FILE,
            mimeType: 'audio/mpeg',
            durationSeconds: job.durationSeconds,
        });

        if (!transcription.success || !transcription.text) {
            const errorCode = transcription.error?.code ?? 'TRANSCRIPTION_FAILED';
            logVoiceStageError('transcription', {
                userId,
                token,
                mode,
                error: { code: errorCode, message: transcription.error?.message ?? 'empty transcript' },
            });
            await this.report(chatId, statusMessageId, getProcessingErrorMessage(errorCode));
            return { state: 'ProcessingFailed', errorCode };
        }

        logTranscriptionSuccess({ userId, token, mode, textLength: transcription.text.length });

        // Usage is charged once speech-to-text has succeeded, whatever happens next
        const chargedSeconds = this.chargingPolicy(job, mode);
        let committed = true;
        if (chargedSeconds > 0) {
            committed = await this.deps.ledger.commitUsage(userId, this.deps.quota.today(), chargedSeconds);
            if (!committed) {
                logger.error({ token, chargedSeconds }, 'Usage could not be recorded for a completed transcription');
            }
        }

        await this.report(chatId, statusMessageId, BOT_MESSAGES.generating);

        const generation = await this.deps.generator.generate(mode, transcription.text, { jobId: token });
        const degraded = !generation.success || !generation.text;
        const text = generation.success && generation.text ? generation.text : transcription.text;

        const parts = splitLongMessage(formatProcessingResult(mode, text, degraded));
        await this.deliver(chatId, statusMessageId, parts);
        logResultSent({ userId, token, mode, textLength: text.length }, parts.length, degraded);

        return { state: 'Completed', text, degraded, chargedSeconds, committed };
    }

    /**
     * First part replaces the status message; the rest follow as new messages.
     */
    private async deliver(chatId: number, statusMessageId: number | undefined, parts: string[]): Promise<void> {
        const [first, ...rest] = parts;
        await this.report(chatId, statusMessageId, first);
        for (const part of rest) {
            await this.notify(chatId, part);
        }
    }

    /**
     * Send a message. Transport failures are logged, never raised.
     */
    private async notify(chatId: number, text: string, keyboard?: InlineKeyboardMarkup): Promise<number | undefined> {
        try {
            return await this.deps.transport.sendMessage(chatId, text, keyboard);
        } catch (error) {
            logger.error({ chatId, error: error instanceof Error ? error.message : String(error) }, 'Failed to send message');
            return undefined;
        }
    }

    /**
     * Update the status message in place, or send a new one when there is none.
     */
    private async report(
        chatId: number,
        statusMessageId: number | undefined,
        text: string,
        keyboard?: InlineKeyboardMarkup
    ): Promise<void> {
        if (statusMessageId === undefined) {
            await this.notify(chatId, text, keyboard);
            return;
        }

        try {
            await this.deps.transport.editMessage(chatId, statusMessageId, text, keyboard);
        } catch (error) {
            logger.warn({ chatId, statusMessageId, error: error instanceof Error ? error.message : String(error) },
                'Failed to edit status message, sending a new one');
            await this.notify(chatId, text, keyboard);
        }
    }
}

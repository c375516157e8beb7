/**
 * Voice Logger Utility
 *
 * Structured log lines for each stage of a voice submission, with user
 * identities masked.
 */

import { logger } from '../lib/logger';

/**
 * Mask a Telegram user id for logs: keeps the last 3 digits
 */
export function maskUserId(userId: number | string): string {
    const value = String(userId);
    if (value.length <= 3) {
        return '***';
    }
    return '***' + value.slice(-3);
}

export interface VoiceLogEntry {
    userId: number;
    sourceId?: string;
    token?: string;
    durationSeconds?: number;
    fileSize?: number;
    mode?: string;
    error?: {
        code: string;
        message: string;
    };
    textLength?: number;
}

function createLogEntry(entry: VoiceLogEntry): Record<string, unknown> {
    const logEntry: Record<string, unknown> = {
        user: maskUserId(entry.userId),
    };

    if (entry.sourceId) logEntry.sourceId = entry.sourceId;
    if (entry.token) logEntry.token = entry.token;
    if (entry.durationSeconds !== undefined) logEntry.durationSeconds = entry.durationSeconds;

    if (entry.fileSize !== undefined) {
        logEntry.fileSize = entry.fileSize;
        logEntry.fileSizeMB = (entry.fileSize / (1024 * 1024)).toFixed(2);
    }

    if (entry.mode) logEntry.mode = entry.mode;

    if (entry.error) {
        logEntry.error = entry.error.code;
        logEntry.errorMessage = entry.error.message;
    }

    if (entry.textLength !== undefined) logEntry.textLength = entry.textLength;

    return logEntry;
}

export function logVoiceReceived(entry: VoiceLogEntry): void {
    logger.info(createLogEntry(entry), '🎤 Voice message received');
}

export function logVoiceDenied(entry: VoiceLogEntry, reason: string): void {
    logger.info({ ...createLogEntry(entry), reason }, '🚫 Voice message denied by quota');
}

export function logVoiceDownloaded(entry: VoiceLogEntry): void {
    logger.info(createLogEntry(entry), '📥 Voice downloaded');
}

export function logVoiceStaged(entry: VoiceLogEntry): void {
    logger.info(createLogEntry(entry), '📦 Voice converted and staged');
}

export function logTranscriptionSuccess(entry: VoiceLogEntry): void {
    logger.info(createLogEntry(entry), '✅ Voice transcribed successfully');
}

export function logVoiceStageError(stage: string, entry: VoiceLogEntry, stack?: string): void {
    const logEntry = createLogEntry(entry);
    logEntry.stage = stage;
    if (stack) {
        logEntry.stack = stack;
    }
    logger.error(logEntry, `❌ Voice ${stage} failed`);
}

export function logResultSent(entry: VoiceLogEntry, parts: number, degraded: boolean): void {
    logger.info({ ...createLogEntry(entry), parts, degraded }, '✅ Voice result sent');
}

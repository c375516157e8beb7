/**
 * User-facing messages for voice processing outcomes.
 *
 * Every processing error code maps to exactly one message so that no
 * provider or transport error text ever reaches the chat.
 */

export type ProcessingErrorCode =
    | 'DOWNLOAD_FAILED'
    | 'CONVERSION_FAILED'
    | 'TRANSCRIPTION_FAILED'
    | 'POOR_QUALITY'
    | 'TIMEOUT'
    | 'GENERATION_FAILED'
    | 'CACHE_EXPIRED'
    | 'FILE_MISSING'
    | 'STORAGE_FAILED'
    | 'UNAUTHORIZED';

export const PROCESSING_ERROR_MESSAGES: Record<ProcessingErrorCode | 'DEFAULT', string> = {
    DOWNLOAD_FAILED: '❌ Sorry, I could not download your voice message. Please try sending it again.',
    CONVERSION_FAILED: '❌ Sorry, I could not read this audio file. Please record the voice message again.',
    TRANSCRIPTION_FAILED: '❌ Sorry, transcription failed. You were not charged, please try again later.',
    POOR_QUALITY: '🔇 I could not make out any speech. Please record again in a quieter place.',
    TIMEOUT: '⏳ Processing took too long. You were not charged, please try again.',
    GENERATION_FAILED: '⚠️ Text processing is unavailable right now, here is the raw transcript instead.',
    CACHE_EXPIRED: '⌛ This voice message has expired. Please send it again.',
    FILE_MISSING: '❌ The audio file for this message is no longer available. Please send it again.',
    STORAGE_FAILED: '❌ Sorry, something went wrong on our side. Please try again later.',
    UNAUTHORIZED: '⛔ This command is available to administrators only.',
    DEFAULT: '❌ Sorry, something went wrong. Please try again later.',
};

/**
 * Get the user-facing message for an error code
 */
export function getProcessingErrorMessage(errorCode: string | undefined): string {
    if (!errorCode || !isKnownProcessingError(errorCode)) {
        return PROCESSING_ERROR_MESSAGES.DEFAULT;
    }
    return PROCESSING_ERROR_MESSAGES[errorCode];
}

export function isKnownProcessingError(errorCode: string | undefined): errorCode is ProcessingErrorCode {
    if (!errorCode) return false;
    return errorCode in PROCESSING_ERROR_MESSAGES && errorCode !== 'DEFAULT';
}

export const BOT_MESSAGES = {
    start:
        "👋 Hello! I'm your voice-to-text bot. Send me a voice message and I'll transcribe it, " +
        'then reformat, summarize or translate it for you.',
    help: (dailyLimitSeconds: number): string =>
        [
            '🤖 How to use this bot:',
            '',
            '1. Send me a voice message',
            '2. Choose how to process it:',
            '   📝 Basic: clean up and format the text',
            '   📋 Summary: structured notes with the key points',
            '   🌐 Translate: translate to English and clean up',
            '3. Receive the processed text',
            '',
            `Free accounts can process ${formatBudget(dailyLimitSeconds)} of audio per day.`,
            'Use /usage to check your remaining time.',
        ].join('\n'),
    receiving: '🎤 Processing your voice message...',
    chooseMode: '✅ Voice message received! Choose how to process it:',
    transcribing: '🎤 Transcribing your voice message...',
    generating: '🤖 Processing the text...',
    alreadyProcessing: '⏳ This voice message is already being processed.',
    notYourMessage: '⛔ This voice message belongs to another user.',
    unknownSelection: '❓ Unknown option. Please send your voice message again.',
    unknownCommand: '❓ Unknown command. Use /help to see what I can do.',
} as const;

/**
 * Human-readable budget such as `5 minutes` or `1m 30s`
 */
export function formatBudget(seconds: number): string {
    if (seconds % 60 === 0) {
        const minutes = seconds / 60;
        return `${minutes} minute${minutes === 1 ? '' : 's'}`;
    }
    return formatMinutesSeconds(seconds);
}

/**
 * `Xm Ys` formatting used in quota messages
 */
export function formatMinutesSeconds(seconds: number): string {
    const safe = Math.max(0, Math.floor(seconds));
    return `${Math.floor(safe / 60)}m ${safe % 60}s`;
}

/**
 * TranscriptionService Interface and Types
 *
 * Contract for speech-to-text providers, so the backend (OpenAI Whisper,
 * Groq Whisper, ...) can be swapped through configuration.
 */

export type TranscriptionErrorCode =
    | 'TRANSCRIPTION_FAILED'
    | 'POOR_QUALITY'
    | 'TIMEOUT';

export interface TranscriptionError {
    code: TranscriptionErrorCode;
    message: string;
}

export interface TranscriptionResult {
    success: boolean;
    text?: string;
    language?: string;
    error?: TranscriptionError;
}

export interface AudioMetadata {
    /** Job token or source id, for log correlation */
    jobId: string;
    fileName: string;
    mimeType: string;
    durationSeconds?: number;
}

export interface TranscriptionService {
    readonly name: string;

    /**
     * Transcribe an audio buffer. Never throws: failures come back as
     * `{ success: false, error }`.
     */
    transcribe(audioBuffer: Buffer, metadata: AudioMetadata): Promise<TranscriptionResult>;
}

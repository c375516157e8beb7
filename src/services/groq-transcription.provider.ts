/**
 * GroqTranscriptionProvider
 *
 * TranscriptionService backed by the Groq Whisper API.
 * Uses whisper-large-v3-turbo for speed; selected with TRANSCRIPTION_PROVIDER=groq.
 */

import Groq, { toFile } from 'groq-sdk';
import { env } from '../config/env';
import { logger } from '../lib/logger';
import { createGroqClient } from '../lib/openai';
import { isTimeoutError, withTimeout } from '../utils/timeout';
import type { AudioMetadata, TranscriptionResult, TranscriptionService } from './transcription.service';

export interface GroqTranscriptionOptions {
    client?: Groq;
    timeoutMs?: number;
}

export class GroqTranscriptionProvider implements TranscriptionService {
    readonly name = 'groq';
    private readonly MODEL = 'whisper-large-v3-turbo';
    private readonly groqClient: Groq;
    private readonly timeoutMs: number;

    constructor(options: GroqTranscriptionOptions = {}) {
        this.groqClient = options.client ?? createGroqClient();
        this.timeoutMs = options.timeoutMs ?? env.EXTERNAL_CALL_TIMEOUT_MS;
    }

    /**
     * Transcribe audio buffer to text using Groq Whisper API
     */
    async transcribe(audioBuffer: Buffer, metadata: AudioMetadata): Promise<TranscriptionResult> {
        try {
            const audioFile = await toFile(audioBuffer, metadata.fileName, { type: metadata.mimeType });

            const transcription = await withTimeout('Groq transcription', this.timeoutMs, signal =>
                this.groqClient.audio.transcriptions.create(
                    {
                        file: audioFile,
                        model: this.MODEL,
                    },
                    { signal }
                )
            );

            // Check for empty or low-quality transcription
            const text = transcription.text?.trim() ?? '';
            if (text.length === 0) {
                return {
                    success: false,
                    error: {
                        code: 'POOR_QUALITY',
                        message: 'Could not extract text from audio - audio may be too quiet or unclear',
                    },
                };
            }

            logger.info({
                jobId: metadata.jobId,
                durationSeconds: metadata.durationSeconds,
                textLength: text.length,
            }, 'Groq transcription successful');

            return { success: true, text };
        } catch (error: unknown) {
            if (isTimeoutError(error)) {
                logger.error({ jobId: metadata.jobId, timeoutMs: this.timeoutMs }, 'Groq transcription timed out');
                return {
                    success: false,
                    error: {
                        code: 'TIMEOUT',
                        message: `Transcription timed out after ${this.timeoutMs}ms`,
                    },
                };
            }

            logger.error({
                jobId: metadata.jobId,
                error: error instanceof Error ? error.message : 'Unknown error',
                stack: error instanceof Error ? error.stack : undefined,
            }, 'Groq transcription failed');

            return {
                success: false,
                error: {
                    code: 'TRANSCRIPTION_FAILED',
                    message: error instanceof Error ? error.message : 'Unknown transcription error',
                },
            };
        }
    }
}

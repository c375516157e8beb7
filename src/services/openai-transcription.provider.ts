/**
 * OpenAITranscriptionProvider
 *
 * TranscriptionService backed by the OpenAI Whisper API (`whisper-1`).
 */

import OpenAI, { toFile } from 'openai';
import { env } from '../config/env';
import { logger } from '../lib/logger';
import { createOpenAIClient } from '../lib/openai';
import { isTimeoutError, withTimeout } from '../utils/timeout';
import type { AudioMetadata, TranscriptionResult, TranscriptionService } from './transcription.service';

export interface OpenAITranscriptionOptions {
    client?: OpenAI;
    timeoutMs?: number;
    model?: string;
}

export class OpenAITranscriptionProvider implements TranscriptionService {
    readonly name = 'openai';
    private readonly client: OpenAI;
    private readonly timeoutMs: number;
    private readonly model: string;

    constructor(options: OpenAITranscriptionOptions = {}) {
        this.client = options.client ?? createOpenAIClient();
        this.timeoutMs = options.timeoutMs ?? env.EXTERNAL_CALL_TIMEOUT_MS;
        this.model = options.model ?? 'whisper-1';
    }

    async transcribe(audioBuffer: Buffer, metadata: AudioMetadata): Promise<TranscriptionResult> {
        try {
            const file = await toFile(audioBuffer, metadata.fileName, { type: metadata.mimeType });

            const transcription = await withTimeout('OpenAI transcription', this.timeoutMs, signal =>
                this.client.audio.transcriptions.create(
                    { file, model: this.model },
                    { signal }
                )
            );

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
            }, 'OpenAI transcription successful');

            return { success: true, text };
        } catch (error: unknown) {
            if (isTimeoutError(error)) {
                logger.error({ jobId: metadata.jobId, timeoutMs: this.timeoutMs }, 'OpenAI transcription timed out');
                return {
                    success: false,
                    error: { code: 'TIMEOUT', message: `Transcription timed out after ${this.timeoutMs}ms` },
                };
            }

            logger.error({
                jobId: metadata.jobId,
                error: error instanceof Error ? error.message : 'Unknown error',
                stack: error instanceof Error ? error.stack : undefined,
            }, 'OpenAI transcription failed');

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

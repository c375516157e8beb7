/**
 * Text generation for the post-processing modes (reformat, summarize, translate).
 */

import OpenAI from 'openai';
import { env } from '../config/env';
import { getProcessingMode, ProcessingMode } from '../config/processing-modes';
import { logger } from '../lib/logger';
import { createOpenAIClient } from '../lib/openai';
import { isTimeoutError, withTimeout } from '../utils/timeout';

export interface GenerationResult {
    success: boolean;
    text?: string;
    model?: string;
    error?: {
        code: 'GENERATION_FAILED' | 'TIMEOUT';
        message: string;
    };
}

export interface TextGenerationService {
    generate(mode: ProcessingMode, transcription: string, context?: { jobId: string }): Promise<GenerationResult>;
}

export interface OpenAITextGeneratorOptions {
    client?: OpenAI;
    timeoutMs?: number;
}

export class OpenAITextGenerator implements TextGenerationService {
    private readonly client: OpenAI;
    private readonly timeoutMs: number;

    constructor(options: OpenAITextGeneratorOptions = {}) {
        this.client = options.client ?? createOpenAIClient();
        this.timeoutMs = options.timeoutMs ?? env.EXTERNAL_CALL_TIMEOUT_MS;
    }

    async generate(mode: ProcessingMode, transcription: string, context?: { jobId: string }): Promise<GenerationResult> {
        const config = getProcessingMode(mode);
        const startTime = Date.now();

        try {
            const completion = await withTimeout(`${mode} generation`, this.timeoutMs, signal =>
                this.client.chat.completions.create(
                    {
                        model: config.model,
                        messages: [
                            { role: 'system', content: config.systemPrompt },
                            { role: 'user', content: config.buildPrompt(transcription) },
                        ],
                    },
                    { signal }
                )
            );

            const content = completion.choices[0]?.message?.content?.trim();
            if (!content) {
                logger.warn({ jobId: context?.jobId, mode, model: config.model }, 'Generation returned no content');
                return {
                    success: false,
                    model: config.model,
                    error: { code: 'GENERATION_FAILED', message: 'Model response contained no text' },
                };
            }

            logger.info({
                jobId: context?.jobId,
                mode,
                model: config.model,
                latencyMs: Date.now() - startTime,
                outputLength: content.length,
            }, 'Text generation successful');

            return { success: true, text: content, model: config.model };
        } catch (error: unknown) {
            const timedOut = isTimeoutError(error);

            logger.error({
                jobId: context?.jobId,
                mode,
                model: config.model,
                error: error instanceof Error ? error.message : String(error),
            }, timedOut ? 'Text generation timed out' : 'Text generation failed');

            return {
                success: false,
                model: config.model,
                error: {
                    code: timedOut ? 'TIMEOUT' : 'GENERATION_FAILED',
                    message: error instanceof Error ? error.message : 'Unknown generation error',
                },
            };
        }
    }
}

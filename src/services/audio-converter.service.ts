/**
 * Audio Converter
 *
 * Converts Telegram voice notes (OGG/Opus) to MP3 with the system ffmpeg
 * binary. The converter never throws; partial output is deleted on failure.
 */

import { spawn } from 'child_process';
import fs from 'fs/promises';
import { env } from '../config/env';
import { logger } from '../lib/logger';

export interface ConversionResult {
    success: boolean;
    outputPath?: string;
    error?: {
        code: 'CONVERSION_FAILED' | 'TIMEOUT';
        message: string;
    };
}

export interface AudioConverter {
    convert(inputPath: string, outputPath: string): Promise<ConversionResult>;
}

export interface FfmpegAudioConverterOptions {
    ffmpegPath?: string;
    timeoutMs?: number;
}

export function buildFfmpegArgs(inputPath: string, outputPath: string): string[] {
    return [
        '-i', inputPath,
        '-f', 'mp3',
        '-acodec', 'libmp3lame',
        '-ab', '192k',
        '-ar', '44100',
        '-y',
        outputPath,
    ];
}

export class FfmpegAudioConverter implements AudioConverter {
    private readonly ffmpegPath: string;
    private readonly timeoutMs: number;

    constructor(options: FfmpegAudioConverterOptions = {}) {
        this.ffmpegPath = options.ffmpegPath ?? env.FFMPEG_PATH;
        this.timeoutMs = options.timeoutMs ?? env.EXTERNAL_CALL_TIMEOUT_MS;
    }

    async convert(inputPath: string, outputPath: string): Promise<ConversionResult> {
        const startTime = Date.now();
        const outcome = await this.run(buildFfmpegArgs(inputPath, outputPath));

        if (outcome.ok) {
            logger.debug({ inputPath, outputPath, latencyMs: Date.now() - startTime }, 'Audio converted to MP3');
            return { success: true, outputPath };
        }

        await fs.rm(outputPath, { force: true }).catch((error: unknown) => {
            logger.warn({ outputPath, error: error instanceof Error ? error.message : String(error) },
                'Failed to remove partial conversion output');
        });

        logger.error({ inputPath, reason: outcome.message }, 'Audio conversion failed');
        return {
            success: false,
            error: {
                code: outcome.timedOut ? 'TIMEOUT' : 'CONVERSION_FAILED',
                message: outcome.message,
            },
        };
    }

    private run(args: string[]): Promise<{ ok: true } | { ok: false; timedOut: boolean; message: string }> {
        return new Promise(resolve => {
            const proc = spawn(this.ffmpegPath, args, { stdio: ['ignore', 'ignore', 'pipe'] });
            let stderr = '';
            let timedOut = false;
            let settled = false;

            const finish = (result: { ok: true } | { ok: false; timedOut: boolean; message: string }) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                resolve(result);
            };

            const timer = setTimeout(() => {
                timedOut = true;
                proc.kill('SIGKILL');
            }, this.timeoutMs);

            proc.stderr?.on('data', (chunk: Buffer) => {
                // Keep the tail only; ffmpeg is chatty
                stderr = (stderr + chunk.toString()).slice(-2000);
            });

            proc.on('error', (error) => {
                finish({ ok: false, timedOut: false, message: `ffmpeg could not be started: ${error.message}` });
            });

            proc.on('close', (code) => {
                if (timedOut) {
                    finish({ ok: false, timedOut: true, message: `ffmpeg timed out after ${this.timeoutMs}ms` });
                } else if (code === 0) {
                    finish({ ok: true });
                } else {
                    finish({ ok: false, timedOut: false, message: `ffmpeg exited with code ${code}: ${stderr.slice(-200)}` });
                }
            });
        });
    }
}

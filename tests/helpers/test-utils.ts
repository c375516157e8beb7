import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { faker } from '@faker-js/faker';
import { openDatabase, DatabaseHandle } from '../../src/lib/database';
import type { ProcessingMode } from '../../src/config/processing-modes';
import type { AudioConverter, ConversionResult } from '../../src/services/audio-converter.service';
import type { VoiceSubmission } from '../../src/services/dispatch.service';
import { UsageLedger } from '../../src/services/ledger.service';
import type { BotTransport } from '../../src/services/telegram-client.service';
import type { GenerationResult, TextGenerationService } from '../../src/services/text-generation.service';
import type { AudioMetadata, TranscriptionResult, TranscriptionService } from '../../src/services/transcription.service';
import type { InlineKeyboardMarkup, TelegramUpdate } from '../../src/types/telegram.types';

export const TEST_DAY = '2024-03-15';

/**
 * Clock pinned to midday of TEST_DAY in local time
 */
export const fixedClock = () => new Date(2024, 2, 15, 12, 0, 0);

export function createTestLedger(): { handle: DatabaseHandle; ledger: UsageLedger } {
  const handle = openDatabase(':memory:');
  return { handle, ledger: new UsageLedger(handle.db) };
}

export async function createTempRoot(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'voice-bot-test-'));
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

export function createMockVoice(overrides: Partial<VoiceSubmission> = {}): VoiceSubmission {
  return {
    userId: faker.number.int({ min: 10_000, max: 9_999_999 }),
    chatId: faker.number.int({ min: 10_000, max: 9_999_999 }),
    sourceId: faker.string.alphanumeric(16),
    fileId: faker.string.alphanumeric(32),
    durationSeconds: faker.number.int({ min: 1, max: 60 }),
    ...overrides,
  };
}

export function voiceUpdate(userId: number, duration: number, sourceId = 'unique-1'): TelegramUpdate {
  return {
    update_id: faker.number.int({ min: 1, max: 1_000_000 }),
    message: {
      message_id: 1,
      date: 1710000000,
      chat: { id: userId, type: 'private' },
      from: { id: userId, is_bot: false, first_name: 'Test' },
      voice: { file_id: `file-${sourceId}`, file_unique_id: sourceId, duration },
    },
  };
}

export function textUpdate(userId: number, text: string): TelegramUpdate {
  return {
    update_id: faker.number.int({ min: 1, max: 1_000_000 }),
    message: {
      message_id: 2,
      date: 1710000000,
      chat: { id: userId, type: 'private' },
      from: { id: userId, is_bot: false, first_name: 'Test' },
      text,
    },
  };
}

export function callbackUpdate(userId: number, data: string): TelegramUpdate {
  return {
    update_id: faker.number.int({ min: 1, max: 1_000_000 }),
    callback_query: {
      id: 'callback-1',
      from: { id: userId, is_bot: false, first_name: 'Test' },
      message: { message_id: 3, date: 1710000000, chat: { id: userId, type: 'private' } },
      data,
    },
  };
}

interface SentMessage {
  chatId: number;
  text: string;
  keyboard?: InlineKeyboardMarkup;
}

/**
 * Records every outbound call. Message ids are assigned sequentially from 100.
 */
export class FakeTransport implements BotTransport {
  sent: SentMessage[] = [];
  edits: Array<SentMessage & { messageId: number }> = [];
  answers: Array<{ id: string; text?: string }> = [];
  documents: Array<{ chatId: number; fileName: string; content: string; caption?: string }> = [];
  downloadFails = false;
  private nextMessageId = 100;

  async sendMessage(chatId: number, text: string, keyboard?: InlineKeyboardMarkup): Promise<number> {
    this.sent.push({ chatId, text, keyboard });
    return this.nextMessageId++;
  }

  async editMessage(chatId: number, messageId: number, text: string, keyboard?: InlineKeyboardMarkup): Promise<void> {
    this.edits.push({ chatId, messageId, text, keyboard });
  }

  async answerCallback(id: string, text?: string): Promise<void> {
    this.answers.push({ id, text });
  }

  async downloadFile(fileId: string, destinationPath: string): Promise<number> {
    if (this.downloadFails) {
      throw new Error('network unreachable');
    }
    const content = Buffer.from(`ogg-data-${fileId}`);
    await fs.writeFile(destinationPath, content);
    return content.length;
  }

  async sendDocument(chatId: number, fileName: string, content: string, caption?: string): Promise<void> {
    this.documents.push({ chatId, fileName, content, caption });
  }

  /** Every text shown to the user, sent or edited, in order of arrival per kind */
  allTexts(): string[] {
    return [...this.sent.map(m => m.text), ...this.edits.map(m => m.text)];
  }
}

export class FakeConverter implements AudioConverter {
  calls = 0;
  result: ConversionResult | null = null;

  async convert(inputPath: string, outputPath: string): Promise<ConversionResult> {
    this.calls++;
    if (this.result) {
      return this.result;
    }
    await fs.copyFile(inputPath, outputPath);
    return { success: true, outputPath };
  }
}

export class FakeTranscriber implements TranscriptionService {
  readonly name = 'fake';
  calls: AudioMetadata[] = [];
  result: TranscriptionResult = { success: true, text: 'hello from the voice note' };

  async transcribe(_buffer: Buffer, metadata: AudioMetadata): Promise<TranscriptionResult> {
    this.calls.push(metadata);
    return this.result;
  }
}

export class FakeGenerator implements TextGenerationService {
  calls: Array<{ mode: ProcessingMode; transcription: string }> = [];
  result: GenerationResult = { success: true, text: 'Hello from the voice note.' };

  async generate(mode: ProcessingMode, transcription: string): Promise<GenerationResult> {
    this.calls.push({ mode, transcription });
    return this.result;
  }
}

import axios, { AxiosInstance } from 'axios';
import crypto from 'crypto';
import fs from 'fs/promises';
import { logger } from '../lib/logger';
import type {
  InlineKeyboardMarkup,
  TelegramApiResponse,
  TelegramFile,
  TelegramMessage,
  TelegramUpdate,
} from '../types/telegram.types';

// Constants for retry logic
const MAX_RETRIES = 3;
const INITIAL_BACKOFF_MS = 1000;
const REQUEST_TIMEOUT_MS = 15000;
const DOWNLOAD_TIMEOUT_MS = 30000;

const TELEGRAM_API_BASE = 'https://api.telegram.org';

/**
 * Outbound chat operations the bot needs. The dispatcher and the command
 * handler only see this interface, so tests can record calls instead of
 * talking to Telegram.
 */
export interface BotTransport {
  sendMessage(chatId: number, text: string, keyboard?: InlineKeyboardMarkup): Promise<number>;
  editMessage(chatId: number, messageId: number, text: string, keyboard?: InlineKeyboardMarkup): Promise<void>;
  answerCallback(callbackQueryId: string, text?: string): Promise<void>;
  downloadFile(fileId: string, destinationPath: string): Promise<number>;
  sendDocument(chatId: number, fileName: string, content: string, caption?: string): Promise<void>;
}

export class TelegramApiError extends Error {
  constructor(
    public readonly method: string,
    message: string,
    public readonly errorCode?: number,
    public readonly retryAfterSeconds?: number
  ) {
    super(`Telegram ${method} failed: ${message}`);
    this.name = 'TelegramApiError';
  }
}

/**
 * Compare the X-Telegram-Bot-Api-Secret-Token header with the configured
 * secret. Without a configured secret every request is accepted.
 */
export function validateWebhookSecret(expected: string | undefined, received: string | undefined): boolean {
  if (!expected) {
    logger.warn('⚠️  Skipping webhook secret validation - TELEGRAM_WEBHOOK_SECRET not configured');
    return true;
  }

  if (!received) {
    logger.warn('❌ Missing X-Telegram-Bot-Api-Secret-Token header');
    return false;
  }

  const expectedBuffer = Buffer.from(expected);
  const receivedBuffer = Buffer.from(received);
  if (expectedBuffer.length !== receivedBuffer.length) {
    logger.warn('❌ Webhook secret validation failed');
    return false;
  }

  const isValid = crypto.timingSafeEqual(expectedBuffer, receivedBuffer);
  if (!isValid) {
    logger.warn('❌ Webhook secret validation failed');
  }
  return isValid;
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof TelegramApiError) {
    return error.errorCode === 429 || (error.errorCode !== undefined && error.errorCode >= 500);
  }

  if (!axios.isAxiosError(error)) {
    return false;
  }

  // Network errors
  if (error.code === 'ECONNRESET' || error.code === 'ETIMEDOUT' || error.code === 'ENOTFOUND' || error.code === 'ECONNABORTED') {
    return true;
  }

  const status = error.response?.status;
  if (status) {
    // 429 = Rate limited, 500-599 = Server errors
    return status === 429 || (status >= 500 && status < 600);
  }

  return false;
}

export interface TelegramClientOptions {
  token: string;
  /** Preconfigured HTTP client; defaults to one rooted at the bot's API URL */
  http?: AxiosInstance;
  maxRetries?: number;
  initialBackoffMs?: number;
}

export class TelegramClient implements BotTransport {
  private readonly http: AxiosInstance;
  private readonly token: string;
  private readonly maxRetries: number;
  private readonly initialBackoffMs: number;

  constructor(options: TelegramClientOptions) {
    this.token = options.token;
    this.maxRetries = options.maxRetries ?? MAX_RETRIES;
    this.initialBackoffMs = options.initialBackoffMs ?? INITIAL_BACKOFF_MS;
    this.http = options.http ?? axios.create({
      baseURL: `${TELEGRAM_API_BASE}/bot${options.token}`,
      timeout: REQUEST_TIMEOUT_MS,
    });
  }

  async sendMessage(chatId: number, text: string, keyboard?: InlineKeyboardMarkup): Promise<number> {
    const message = await this.call<TelegramMessage>('sendMessage', {
      chat_id: chatId,
      text,
      ...(keyboard ? { reply_markup: keyboard } : {}),
    });

    logger.debug({ chatId, messageId: message.message_id, length: text.length }, '✅ Message sent');
    return message.message_id;
  }

  async editMessage(chatId: number, messageId: number, text: string, keyboard?: InlineKeyboardMarkup): Promise<void> {
    await this.call<TelegramMessage | boolean>('editMessageText', {
      chat_id: chatId,
      message_id: messageId,
      text,
      ...(keyboard ? { reply_markup: keyboard } : {}),
    });
  }

  async answerCallback(callbackQueryId: string, text?: string): Promise<void> {
    await this.call<boolean>('answerCallbackQuery', {
      callback_query_id: callbackQueryId,
      ...(text ? { text } : {}),
    });
  }

  /**
   * Download a file by id into `destinationPath`; returns the byte count.
   */
  async downloadFile(fileId: string, destinationPath: string): Promise<number> {
    const file = await this.call<TelegramFile>('getFile', { file_id: fileId });
    if (!file.file_path) {
      throw new TelegramApiError('getFile', 'file has no download path');
    }

    const response = await this.http.get<ArrayBuffer>(
      `${TELEGRAM_API_BASE}/file/bot${this.token}/${file.file_path}`,
      { responseType: 'arraybuffer', timeout: DOWNLOAD_TIMEOUT_MS }
    );

    const buffer = Buffer.from(response.data);
    await fs.writeFile(destinationPath, buffer);

    logger.debug({ fileId, fileSize: buffer.length }, '📥 File downloaded');
    return buffer.length;
  }

  async sendDocument(chatId: number, fileName: string, content: string, caption?: string): Promise<void> {
    const form = new FormData();
    form.append('chat_id', String(chatId));
    form.append('document', new Blob([content], { type: 'text/csv' }), fileName);
    if (caption) {
      form.append('caption', caption);
    }

    await this.call<TelegramMessage>('sendDocument', form);
    logger.info({ chatId, fileName, size: content.length }, '📎 Document sent');
  }

  async setWebhook(url: string, secretToken?: string): Promise<void> {
    await this.call<boolean>('setWebhook', {
      url,
      allowed_updates: ['message', 'callback_query'],
      ...(secretToken ? { secret_token: secretToken } : {}),
    });
    logger.info({ url }, '✅ Telegram webhook registered');
  }

  async deleteWebhook(): Promise<void> {
    await this.call<boolean>('deleteWebhook', {});
  }

  /**
   * Long-poll for updates. Not retried here; the poller owns its backoff.
   */
  async getUpdates(offset: number, timeoutSeconds: number, signal?: AbortSignal): Promise<TelegramUpdate[]> {
    const response = await this.http.post<TelegramApiResponse<TelegramUpdate[]>>(
      '/getUpdates',
      { offset, timeout: timeoutSeconds, allowed_updates: ['message', 'callback_query'] },
      { timeout: (timeoutSeconds + 10) * 1000, signal }
    );
    return this.unwrap('getUpdates', response.data);
  }

  /**
   * POST a Bot API method with retry and exponential backoff.
   * Retries up to maxRetries times on network errors, 429 and 5xx.
   */
  private async call<T>(method: string, payload: object): Promise<T> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        if (attempt > 0) {
          const backoffMs = this.backoffFor(attempt, lastError);
          logger.info({ method, attempt, backoffMs }, `🔄 Retry attempt ${attempt}/${this.maxRetries}`);
          await this.sleep(backoffMs);
        }

        const response = await this.http.post<TelegramApiResponse<T>>(`/${method}`, payload, {
          validateStatus: status => status < 500,
        });
        return this.unwrap(method, response.data);
      } catch (error: unknown) {
        lastError = error;

        logger.warn({
          method,
          error: error instanceof Error ? error.message : String(error),
          attempt: attempt + 1,
          maxRetries: this.maxRetries,
        }, `⚠️ Telegram ${method} attempt ${attempt + 1} failed`);

        if (!isRetryableError(error)) {
          throw error;
        }
      }
    }

    logger.error({
      method,
      error: lastError instanceof Error ? lastError.message : String(lastError),
      attempts: this.maxRetries + 1,
    }, `❌ Telegram ${method} failed after all retries`);
    throw lastError;
  }

  private unwrap<T>(method: string, body: TelegramApiResponse<T>): T {
    if (!body.ok || body.result === undefined) {
      throw new TelegramApiError(
        method,
        body.description ?? 'unknown error',
        body.error_code,
        body.parameters?.retry_after
      );
    }
    return body.result;
  }

  private backoffFor(attempt: number, lastError: unknown): number {
    if (lastError instanceof TelegramApiError && lastError.retryAfterSeconds) {
      return lastError.retryAfterSeconds * 1000;
    }
    return this.initialBackoffMs * Math.pow(2, attempt - 1);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}

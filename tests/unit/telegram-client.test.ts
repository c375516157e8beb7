import axios, { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { describe, it, expect } from 'vitest';
import {
    isRetryableError,
    TelegramApiError,
    TelegramClient,
    validateWebhookSecret,
} from '../../src/services/telegram-client.service';

interface ScriptedReply {
    status: number;
    body: unknown;
}

interface RecordedRequest {
    url: string | undefined;
    payload: unknown;
}

/**
 * Axios instance whose adapter replays `replies` in order, repeating the last one.
 */
function scriptedHttp(replies: ScriptedReply[]) {
    const requests: RecordedRequest[] = [];

    const http = axios.create({
        adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
            const reply = replies[Math.min(requests.length, replies.length - 1)];
            requests.push({
                url: config.url,
                payload: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
            });

            const response: AxiosResponse = {
                data: reply.body,
                status: reply.status,
                statusText: String(reply.status),
                headers: {},
                config,
            };

            if (config.validateStatus && !config.validateStatus(reply.status)) {
                throw new AxiosError(`Request failed with status code ${reply.status}`, 'ERR_BAD_RESPONSE', config, null, response);
            }
            return response;
        },
    });

    return { http, requests };
}

function clientFor(replies: ScriptedReply[]) {
    const { http, requests } = scriptedHttp(replies);
    const client = new TelegramClient({ token: 'test-token', http, maxRetries: 2, initialBackoffMs: 1 });
    return { client, requests };
}

const okMessage = { status: 200, body: { ok: true, result: { message_id: 77, date: 0, chat: { id: 5, type: 'private' } } } };

describe('TelegramClient', () => {
    it('sends a message with its keyboard and returns the message id', async () => {
        const { client, requests } = clientFor([okMessage]);
        const keyboard = { inline_keyboard: [[{ text: '📝 Basic', callback_data: 'basic:tok' }]] };

        const messageId = await client.sendMessage(5, 'hello', keyboard);

        expect(messageId).toBe(77);
        expect(requests).toEqual([
            { url: '/sendMessage', payload: { chat_id: 5, text: 'hello', reply_markup: keyboard } },
        ]);
    });

    it('omits an empty callback answer text', async () => {
        const { client, requests } = clientFor([{ status: 200, body: { ok: true, result: true } }]);

        await client.answerCallback('callback-1');

        expect(requests[0]).toEqual({ url: '/answerCallbackQuery', payload: { callback_query_id: 'callback-1' } });
    });

    it('retries server errors and returns the eventual result', async () => {
        const { client, requests } = clientFor([
            { status: 502, body: 'Bad Gateway' },
            okMessage,
        ]);

        await expect(client.sendMessage(5, 'hello')).resolves.toBe(77);
        expect(requests).toHaveLength(2);
    });

    it('retries rate limiting', async () => {
        const { client, requests } = clientFor([
            { status: 429, body: { ok: false, error_code: 429, description: 'Too Many Requests' } },
            okMessage,
        ]);

        await expect(client.sendMessage(5, 'hello')).resolves.toBe(77);
        expect(requests).toHaveLength(2);
    });

    it('does not retry client errors', async () => {
        const { client, requests } = clientFor([
            { status: 400, body: { ok: false, error_code: 400, description: 'Bad Request: message is not modified' } },
        ]);

        const error = await client.editMessage(5, 10, 'same').catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(TelegramApiError);
        expect(error).toMatchObject({ method: 'editMessageText', errorCode: 400 });
        expect(requests).toHaveLength(1);
    });

    it('gives up after the configured retries', async () => {
        const { client, requests } = clientFor([{ status: 503, body: 'Service Unavailable' }]);

        await expect(client.sendMessage(5, 'hello')).rejects.toThrow('status code 503');
        expect(requests).toHaveLength(3);
    });
});

describe('isRetryableError', () => {
    it('retries rate limits and server errors only', () => {
        expect(isRetryableError(new TelegramApiError('sendMessage', 'slow down', 429, 3))).toBe(true);
        expect(isRetryableError(new TelegramApiError('sendMessage', 'oops', 500))).toBe(true);
        expect(isRetryableError(new TelegramApiError('sendMessage', 'bad request', 400))).toBe(false);
        expect(isRetryableError(new Error('boom'))).toBe(false);
    });

    it('retries dropped connections', () => {
        expect(isRetryableError(new AxiosError('socket hang up', 'ECONNRESET'))).toBe(true);
    });
});

describe('validateWebhookSecret', () => {
    it('accepts the configured secret', () => {
        expect(validateWebhookSecret('test-secret', 'test-secret')).toBe(true);
    });

    it('rejects a missing or different secret', () => {
        expect(validateWebhookSecret('test-secret', undefined)).toBe(false);
        expect(validateWebhookSecret('test-secret', 'test-secreT')).toBe(false);
        expect(validateWebhookSecret('test-secret', 'short')).toBe(false);
    });

    it('accepts everything when no secret is configured', () => {
        expect(validateWebhookSecret(undefined, undefined)).toBe(true);
    });
});

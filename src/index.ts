import { Server } from 'http';
import { createApp } from './app';
import { DATABASE_FILE, env } from './config/env';
import { DatabaseHandle, openDatabase } from './lib/database';
import { logger } from './lib/logger';
import { AdminService } from './services/admin.service';
import { FfmpegAudioConverter } from './services/audio-converter.service';
import { BotHandler } from './services/bot-handler.service';
import { VoiceDispatcher } from './services/dispatch.service';
import { GroqTranscriptionProvider } from './services/groq-transcription.provider';
import { UsageLedger } from './services/ledger.service';
import { OpenAITranscriptionProvider } from './services/openai-transcription.provider';
import { PendingJobCache } from './services/pending-job-cache.service';
import { QuotaPolicy } from './services/quota-policy';
import { TelegramClient } from './services/telegram-client.service';
import { TelegramPoller } from './services/telegram-poller.service';
import { OpenAITextGenerator } from './services/text-generation.service';
import type { TranscriptionService } from './services/transcription.service';
import type { TelegramUpdate } from './types/telegram.types';

const SWEEP_INTERVAL_MS = 5 * 60 * 1000;

/**
 * Log startup configuration and connection status
 */
function logStartupConfiguration(): void {
  logger.info('='.repeat(60));
  logger.info('🚀 Voice Memo Bot Starting...');
  logger.info('='.repeat(60));

  logger.info({
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
  }, '📋 Environment Configuration');

  logger.info({ databaseFile: DATABASE_FILE }, '🗄️  Database Configuration');

  logger.info({
    transcriptionProvider: env.TRANSCRIPTION_PROVIDER,
    openai: env.OPENAI_API_KEY ? 'SET' : 'NOT SET',
    groq: env.GROQ_API_KEY ? 'SET' : 'NOT SET',
    timeoutMs: env.EXTERNAL_CALL_TIMEOUT_MS,
  }, '🤖 AI Providers Configuration');

  logger.info({
    configured: Boolean(env.TELEGRAM_BOT_TOKEN),
    mode: env.TELEGRAM_MODE,
    webhookSecret: env.TELEGRAM_WEBHOOK_SECRET ? 'SET' : 'NOT SET',
  }, '📱 Telegram Configuration');

  logger.info({
    dailyLimitSeconds: env.DAILY_LIMIT_SECONDS,
    pendingJobTtlSeconds: env.PENDING_JOB_TTL_SECONDS,
    adminUser: env.ADMIN_USER_ID !== undefined ? 'SET' : 'NOT SET',
    adminApi: env.ADMIN_API_TOKEN ? 'SET' : 'NOT SET',
  }, '🚦 Quota Configuration');

  logger.info('='.repeat(60));
}

function createTranscriptionService(): TranscriptionService {
  return env.TRANSCRIPTION_PROVIDER === 'groq'
    ? new GroqTranscriptionProvider()
    : new OpenAITranscriptionProvider();
}

async function start(): Promise<void> {
  logStartupConfiguration();

  if (!env.TELEGRAM_BOT_TOKEN) {
    throw new Error('TELEGRAM_BOT_TOKEN is required');
  }

  // Schema setup failures are fatal
  const database: DatabaseHandle = openDatabase(DATABASE_FILE);

  const ledger = new UsageLedger(database.db);
  const quota = new QuotaPolicy(ledger);
  const cache = new PendingJobCache({ ttlMs: env.PENDING_JOB_TTL_SECONDS * 1000 });
  const telegram = new TelegramClient({ token: env.TELEGRAM_BOT_TOKEN });
  const transcriber = createTranscriptionService();
  const admin = new AdminService(ledger, quota);

  const dispatcher = new VoiceDispatcher({
    quota,
    ledger,
    cache,
    transport: telegram,
    converter: new FfmpegAudioConverter(),
    transcriber,
    generator: new OpenAITextGenerator(),
  });

  const handler = new BotHandler({ dispatcher, ledger, quota, admin, transport: telegram });
  const processUpdate = (update: TelegramUpdate) => handler.handleUpdate(update);

  cache.startSweeper(SWEEP_INTERVAL_MS);

  const app = createApp({
    processUpdate,
    admin,
    ledger,
    cache,
    transcriptionProvider: transcriber.name,
    webhookSecret: env.TELEGRAM_WEBHOOK_SECRET,
    adminApiToken: env.ADMIN_API_TOKEN,
  });

  const server: Server = app.listen(env.PORT, () => {
    logger.info(`🚀 Server running on port ${env.PORT}`);
    logger.info(`📊 Health: http://localhost:${env.PORT}/health`);
    logger.info(`📊 Health (detailed): http://localhost:${env.PORT}/health/detailed`);
    logger.info(`🔧 Admin API: http://localhost:${env.PORT}/api/admin/stats`);
  });

  let poller: TelegramPoller | null = null;

  if (env.TELEGRAM_MODE === 'webhook') {
    if (!env.PUBLIC_URL) {
      throw new Error('PUBLIC_URL is required when TELEGRAM_MODE=webhook');
    }
    await telegram.setWebhook(`${env.PUBLIC_URL.replace(/\/$/, '')}/webhooks/telegram`, env.TELEGRAM_WEBHOOK_SECRET);
  } else {
    await telegram.deleteWebhook();
    poller = new TelegramPoller(telegram, processUpdate);
    poller.start();
  }

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, '🛑 Shutting down...');

    try {
      await poller?.stop();
      await new Promise<void>(resolve => server.close(() => resolve()));
      await cache.dispose();
      database.close();
      logger.info('✅ Shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error({ error }, '❌ Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

start().catch((error: unknown) => {
  logger.fatal({
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  }, '❌ Failed to start server');
  process.exit(1);
});

import express, { Express } from 'express';
import { env } from './config/env';
import { logger } from './lib/logger';
import { createAdminRouter } from './routes/admin.routes';
import { createWebhookRouter, UpdateProcessor } from './routes/webhook.routes';
import type { AdminService } from './services/admin.service';
import type { LedgerStore } from './services/ledger.service';
import type { PendingJobCache } from './services/pending-job-cache.service';

export interface AppDependencies {
  processUpdate: UpdateProcessor;
  admin: AdminService;
  ledger: LedgerStore;
  cache: PendingJobCache;
  transcriptionProvider: string;
  webhookSecret?: string;
  adminApiToken?: string;
}

type CheckStatus = 'healthy' | 'degraded' | 'unhealthy';

interface HealthReport {
  status: CheckStatus;
  timestamp: string;
  uptime: number;
  checks: {
    database: { status: CheckStatus; latencyMs?: number };
    transcription: { status: CheckStatus; provider: string; configured: boolean };
    generation: { status: CheckStatus; configured: boolean };
    telegram: { status: CheckStatus; configured: boolean; mode: string };
    pendingJobs: { status: CheckStatus; count: number };
  };
  version: string;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(express.json());

  app.use('/webhooks', createWebhookRouter(deps.processUpdate, deps.webhookSecret));
  app.use('/api/admin', createAdminRouter(deps.admin, deps.adminApiToken));

  // Health check - Basic (for load balancers)
  app.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /**
   * Status of every dependency: database, speech-to-text, text generation,
   * Telegram and the pending-job cache
   */
  app.get('/health/detailed', async (req, res) => {
    const startTime = Date.now();

    const dbStart = Date.now();
    const databaseUp = await deps.ledger.ping();

    const transcriptionConfigured = deps.transcriptionProvider === 'groq'
      ? Boolean(env.GROQ_API_KEY)
      : Boolean(env.OPENAI_API_KEY);
    const generationConfigured = Boolean(env.OPENAI_API_KEY);
    const telegramConfigured = Boolean(env.TELEGRAM_BOT_TOKEN);

    const health: HealthReport = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      checks: {
        database: databaseUp
          ? { status: 'healthy', latencyMs: Date.now() - dbStart }
          : { status: 'unhealthy' },
        transcription: {
          status: transcriptionConfigured ? 'healthy' : 'degraded',
          provider: deps.transcriptionProvider,
          configured: transcriptionConfigured,
        },
        generation: {
          status: generationConfigured ? 'healthy' : 'degraded',
          configured: generationConfigured,
        },
        telegram: {
          status: telegramConfigured ? 'healthy' : 'degraded',
          configured: telegramConfigured,
          mode: env.TELEGRAM_MODE,
        },
        pendingJobs: { status: 'healthy', count: deps.cache.size },
      },
      version: process.env.npm_package_version || '1.0.0',
    };

    const statuses = Object.values(health.checks).map(check => check.status);
    if (statuses.includes('unhealthy')) {
      health.status = 'unhealthy';
    } else if (statuses.includes('degraded')) {
      health.status = 'degraded';
    }

    logger.info({
      status: health.status,
      latencyMs: Date.now() - startTime,
    }, '🏥 Health check completed');

    res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
  });

  return app;
}

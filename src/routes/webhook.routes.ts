/**
 * Telegram webhook
 *
 * POST /webhooks/telegram - acknowledged immediately, processed afterwards
 */

import { Router, Request, Response } from 'express';
import { logger } from '../lib/logger';
import { validateWebhookSecret } from '../services/telegram-client.service';
import type { TelegramUpdate } from '../types/telegram.types';

export type UpdateProcessor = (update: TelegramUpdate) => Promise<void>;

function isTelegramUpdate(body: unknown): body is TelegramUpdate {
  return typeof body === 'object' && body !== null && 'update_id' in body && typeof body.update_id === 'number';
}

export function createWebhookRouter(processUpdate: UpdateProcessor, secret: string | undefined): Router {
  const router = Router();

  router.post('/telegram', (req: Request, res: Response) => {
    const received = req.header('X-Telegram-Bot-Api-Secret-Token');
    if (!validateWebhookSecret(secret, received)) {
      res.sendStatus(403);
      return;
    }

    if (!isTelegramUpdate(req.body)) {
      logger.warn('Webhook body is not a Telegram update');
      res.sendStatus(400);
      return;
    }

    const update = req.body;

    // Telegram retries unacknowledged updates, so reply before the pipeline runs
    res.sendStatus(200);

    processUpdate(update).catch((error: unknown) => {
      logger.error({
        updateId: update.update_id,
        error: error instanceof Error ? error.message : String(error),
      }, '❌ Error processing webhook update');
    });
  });

  return router;
}

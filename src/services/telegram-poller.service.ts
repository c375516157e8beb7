/**
 * Long-polling loop for environments without a public webhook URL.
 */

import { logger } from '../lib/logger';
import type { TelegramUpdate } from '../types/telegram.types';

const POLL_TIMEOUT_SECONDS = 30;
const MAX_BACKOFF_MS = 30000;

export interface UpdateSource {
  getUpdates(offset: number, timeoutSeconds: number, signal?: AbortSignal): Promise<TelegramUpdate[]>;
}

export type UpdateHandler = (update: TelegramUpdate) => Promise<void>;

export class TelegramPoller {
  private running = false;
  private offset = 0;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(
    private readonly source: UpdateSource,
    private readonly handler: UpdateHandler,
    private readonly pollTimeoutSeconds: number = POLL_TIMEOUT_SECONDS
  ) {}

  start(): void {
    if (this.running) return;
    this.running = true;
    this.loop = this.run();
    logger.info('📡 Telegram long polling started');
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.controller?.abort();
    await this.loop;
    this.loop = null;
    logger.info('📡 Telegram long polling stopped');
  }

  private async run(): Promise<void> {
    let failures = 0;

    while (this.running) {
      this.controller = new AbortController();
      try {
        const updates = await this.source.getUpdates(this.offset, this.pollTimeoutSeconds, this.controller.signal);
        failures = 0;

        for (const update of updates) {
          this.offset = Math.max(this.offset, update.update_id + 1);
          // Not awaited: updates from different users are handled concurrently
          this.handler(update).catch((error: unknown) => {
            logger.error({
              updateId: update.update_id,
              error: error instanceof Error ? error.message : String(error),
            }, '❌ Error handling update');
          });
        }
      } catch (error: unknown) {
        if (!this.running) break;

        failures++;
        const backoffMs = Math.min(1000 * Math.pow(2, failures - 1), MAX_BACKOFF_MS);
        logger.warn({
          error: error instanceof Error ? error.message : String(error),
          failures,
          backoffMs,
        }, '⚠️ getUpdates failed, backing off');
        await new Promise(resolve => setTimeout(resolve, backoffMs));
      }
    }
  }
}

/**
 * Pending-Job Cache
 *
 * Holds converted voice messages between upload and the user's choice of
 * processing mode. Entries own a private work directory; evicting an entry
 * deletes it. Expiry is checked lazily on `take` and, optionally, by a
 * periodic sweep.
 */

import crypto from 'crypto';
import fs from 'fs/promises';
import { logger } from '../lib/logger';

export const JOB_TOKEN_LENGTH = 16;

export interface PendingJobArtifact {
    userId: number;
    chatId: number;
    sourceId: string;
    durationSeconds: number;
    /** Private directory holding both files; removed on eviction */
    workDir: string;
    originalPath: string;
    convertedPath: string;
    /** Status message that carries the mode keyboard */
    statusMessageId?: number;
}

export interface PendingJob extends PendingJobArtifact {
    token: string;
    createdAt: number;
}

export interface PendingJobCacheOptions {
    ttlMs: number;
    /** HMAC key for tokens; random per instance when omitted */
    secret?: string;
    now?: () => number;
}

export class PendingJobCache {
    private readonly entries = new Map<string, PendingJob>();
    /** Jobs currently being processed; their files stay until the lease ends */
    private readonly leased = new Set<PendingJob>();
    private readonly secret: string;
    private readonly ttlMs: number;
    private readonly now: () => number;
    private sweepTimer: NodeJS.Timeout | null = null;

    constructor(options: PendingJobCacheOptions) {
        this.ttlMs = options.ttlMs;
        this.secret = options.secret ?? crypto.randomBytes(32).toString('hex');
        this.now = options.now ?? Date.now;
    }

    /**
     * Short, URL-safe token for a (user, source) pair. Deterministic for this
     * cache instance and not guessable without its secret.
     */
    tokenFor(userId: number, sourceId: string): string {
        return crypto
            .createHmac('sha256', this.secret)
            .update(`${userId}:${sourceId}`)
            .digest('base64url')
            .substring(0, JOB_TOKEN_LENGTH);
    }

    /**
     * Store an artifact and return its token. Staging the same pair twice
     * replaces the earlier entry and releases its files.
     */
    async stage(artifact: PendingJobArtifact): Promise<string> {
        const token = this.tokenFor(artifact.userId, artifact.sourceId);
        const previous = this.entries.get(token);

        this.entries.set(token, { ...artifact, token, createdAt: this.now() });

        if (previous && previous.workDir !== artifact.workDir && !this.leased.has(previous)) {
            await this.releaseFiles(previous);
        }

        logger.debug({ token, userId: artifact.userId, durationSeconds: artifact.durationSeconds }, 'Pending job staged');
        return token;
    }

    /**
     * Look up a job without removing it. Expired entries are evicted and
     * reported as absent.
     */
    async take(token: string): Promise<PendingJob | undefined> {
        const job = this.entries.get(token);
        if (!job) {
            return undefined;
        }

        if (this.isExpired(job) && !this.leased.has(job)) {
            logger.info({ token, ageMs: this.now() - job.createdAt }, 'Pending job expired');
            await this.evict(token);
            return undefined;
        }

        return job;
    }

    /**
     * Mark a job as being processed. Returns false when it already is.
     */
    acquire(job: PendingJob): boolean {
        if (this.leased.has(job)) {
            return false;
        }
        this.leased.add(job);
        return true;
    }

    /**
     * End the lease on `job` and delete its files. The cache entry is
     * removed only if it still holds this job, so a re-staged submission
     * under the same token survives.
     */
    async complete(job: PendingJob): Promise<void> {
        this.leased.delete(job);

        const current = this.entries.get(job.token);
        if (current === job) {
            this.entries.delete(job.token);
        } else {
            logger.debug({ token: job.token }, 'Pending job was re-staged while processing');
            if (current?.workDir === job.workDir) {
                return;
            }
        }

        await this.releaseFiles(job);
    }

    /**
     * Remove the entry and delete its files. Absent tokens are a no-op.
     */
    async evict(token: string): Promise<void> {
        const job = this.entries.get(token);
        if (!job) {
            return;
        }

        this.entries.delete(token);
        this.leased.delete(job);
        await this.releaseFiles(job);
        logger.debug({ token }, 'Pending job evicted');
    }

    async sweepExpired(): Promise<number> {
        const expired = [...this.entries.values()].filter(job => this.isExpired(job) && !this.leased.has(job));
        for (const job of expired) {
            await this.evict(job.token);
        }

        if (expired.length > 0) {
            logger.info({ count: expired.length }, 'Expired pending jobs swept');
        }
        return expired.length;
    }

    startSweeper(intervalMs: number): void {
        if (this.sweepTimer) {
            return;
        }

        this.sweepTimer = setInterval(() => {
            this.sweepExpired().catch((error: unknown) => {
                logger.error({ error }, 'Pending job sweep failed');
            });
        }, intervalMs);
        this.sweepTimer.unref();
    }

    stop(): void {
        if (this.sweepTimer) {
            clearInterval(this.sweepTimer);
            this.sweepTimer = null;
        }
    }

    /**
     * Stop sweeping and release every entry
     */
    async dispose(): Promise<void> {
        this.stop();
        for (const token of [...this.entries.keys()]) {
            await this.evict(token);
        }
    }

    get size(): number {
        return this.entries.size;
    }

    private isExpired(job: PendingJob): boolean {
        return this.now() - job.createdAt > this.ttlMs;
    }

    private async releaseFiles(job: PendingJob): Promise<void> {
        try {
            await fs.rm(job.workDir, { recursive: true, force: true });
        } catch (error) {
            logger.error({
                token: job.token,
                workDir: job.workDir,
                error: error instanceof Error ? error.message : String(error),
            }, 'Failed to remove pending job files');
        }
    }
}

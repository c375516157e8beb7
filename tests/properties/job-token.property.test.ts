/**
 * Property-Based Tests for pending-job tokens
 *
 * - Tokens are deterministic per (user, source)
 * - Tokens are 16 URL-safe characters
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { JOB_TOKEN_LENGTH, PendingJobCache } from '../../src/services/pending-job-cache.service';

const propertyConfig = { numRuns: 200 };

describe('Job token properties', () => {
    const cache = new PendingJobCache({ ttlMs: 1000, secret: 'test-secret' });

    it('is deterministic for a user and source', () => {
        fc.assert(
            fc.property(fc.integer({ min: 1 }), fc.string({ minLength: 1 }), (userId, sourceId) => {
                expect(cache.tokenFor(userId, sourceId)).toBe(cache.tokenFor(userId, sourceId));
            }),
            propertyConfig
        );
    });

    it('fits in callback data as a short URL-safe string', () => {
        fc.assert(
            fc.property(fc.integer({ min: 1 }), fc.string(), (userId, sourceId) => {
                const token = cache.tokenFor(userId, sourceId);

                expect(token).toHaveLength(JOB_TOKEN_LENGTH);
                expect(token).toMatch(/^[A-Za-z0-9_-]+$/);
            }),
            propertyConfig
        );
    });
});

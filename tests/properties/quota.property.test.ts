/**
 * Property-Based Tests for the quota decision
 *
 * - Requests that fit the remaining budget are admitted
 * - Exhausted budgets deny with the exhausted reason, whatever is requested
 * - PRO accounts are always admitted
 * - Admitted requests report exactly the budget left afterwards
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { evaluateQuota } from '../../src/services/quota-policy';

const propertyConfig = { numRuns: 100 };

const EXHAUSTED_REASON = 'Daily limit exceeded (5 minutes). Upgrade to PRO for unlimited access.';

describe('Quota decision properties', () => {
    it('admits every request within the remaining budget', () => {
        fc.assert(
            fc.property(
                fc.integer({ min: 0, max: 299 }).chain(usage =>
                    fc.tuple(fc.constant(usage), fc.integer({ min: 0, max: 300 - usage }))
                ),
                ([dailyUsage, requestedSeconds]) => {
                    const decision = evaluateQuota({ isPro: false, dailyUsage, requestedSeconds, dailyLimitSeconds: 300 });

                    expect(decision.admitted).toBe(true);
                    expect(decision.remainingSeconds).toBe(300 - dailyUsage - requestedSeconds);
                }
            ),
            propertyConfig
        );
    });

    it('denies a zero-length request at exactly the budget', () => {
        expect(evaluateQuota({ isPro: false, dailyUsage: 300, requestedSeconds: 0, dailyLimitSeconds: 300 })).toEqual({
            admitted: false,
            reason: EXHAUSTED_REASON,
            remainingSeconds: 0,
        });
    });

    it('denies every request once the budget is exhausted', () => {
        fc.assert(
            fc.property(
                fc.integer({ min: 300, max: 100_000 }),
                fc.integer({ min: 0, max: 100_000 }),
                (dailyUsage, requestedSeconds) => {
                    const decision = evaluateQuota({ isPro: false, dailyUsage, requestedSeconds, dailyLimitSeconds: 300 });

                    expect(decision.admitted).toBe(false);
                    expect(decision.reason).toBe(EXHAUSTED_REASON);
                    expect(decision.remainingSeconds).toBe(0);
                }
            ),
            { ...propertyConfig, examples: [[300, 0], [300, 1]] }
        );
    });

    it('always admits PRO accounts', () => {
        fc.assert(
            fc.property(
                fc.integer({ min: 0, max: 1_000_000 }),
                fc.integer({ min: 0, max: 1_000_000 }),
                (dailyUsage, requestedSeconds) => {
                    const decision = evaluateQuota({ isPro: true, dailyUsage, requestedSeconds, dailyLimitSeconds: 300 });

                    expect(decision.admitted).toBe(true);
                    expect(decision.remainingSeconds).toBe('unlimited');
                }
            ),
            propertyConfig
        );
    });

    it('is deterministic', () => {
        fc.assert(
            fc.property(
                fc.boolean(),
                fc.integer({ min: 0, max: 1000 }),
                fc.integer({ min: 0, max: 1000 }),
                (isPro, dailyUsage, requestedSeconds) => {
                    const input = { isPro, dailyUsage, requestedSeconds, dailyLimitSeconds: 300 };
                    expect(evaluateQuota(input)).toEqual(evaluateQuota(input));
                }
            ),
            propertyConfig
        );
    });
});

// tests/unit/retry_policy.test.ts

import { ErrorFactory } from '../../src/core/errors/errorFactory';
import { RetryPolicy } from '../../src/core/retry/RetryPolicy';
import { PaymentClassifier } from '../support/classifiers';

describe('RetryPolicy', () => {
    it('should default to the standard policy', () => {
        const policy = new RetryPolicy();
        expect(policy.maxAttempts).toBe(3);
        expect(policy.baseDelayMs).toBe(100);
        expect(policy.maxDelayMs).toBe(30_000);
        expect(policy.backoffMultiplier).toBe(2);
        expect(policy.jitter).toBe(true);
    });

    it('should keep defaults for options passed as undefined', () => {
        const policy = new RetryPolicy({ maxAttempts: undefined, jitter: false });
        expect(policy.maxAttempts).toBe(3);
        expect(policy.baseDelayMs).toBe(100);
        expect(policy.jitter).toBe(false);
    });

    it('should provide presets', () => {
        expect(RetryPolicy.fast().maxDelayMs).toBe(1_000);
        expect(RetryPolicy.slow().maxAttempts).toBe(5);
        expect(RetryPolicy.network().baseDelayMs).toBe(250);
        expect(RetryPolicy.database().maxDelayMs).toBe(10_000);
    });

    it('should compute 0-indexed exponential delays without jitter', () => {
        const policy = RetryPolicy.standard().withJitter(false);
        expect(policy.calculateDelay(0)).toBe(100);
        expect(policy.calculateDelay(2)).toBe(400);
        expect(policy.calculateDelay(20)).toBe(30_000);
    });

    it('should honour fractional multipliers', () => {
        const policy = RetryPolicy.fast().withJitter(false);
        expect(policy.calculateDelay(1)).toBe(75);
        expect(policy.calculateDelay(2)).toBe(112);
        expect(policy.calculateDelay(10)).toBe(1_000);
    });

    it('should scale delays by the jitter sample', () => {
        const policy = RetryPolicy.standard();
        expect(policy.calculateDelay(1, () => 0)).toBe(150);
        expect(policy.calculateDelay(1, () => 0.5)).toBe(200);
        expect(policy.calculateDelay(1, () => Number.NaN)).toBe(150);
    });

    it('should keep builders non-mutating', () => {
        const base = RetryPolicy.standard();
        const tuned = base.withMaxAttempts(6).withBaseDelay(20).withMaxDelay(500).withBackoffMultiplier(3);

        expect(base.maxAttempts).toBe(3);
        expect(tuned.maxAttempts).toBe(6);
        expect(tuned.withJitter(false).calculateDelay(3)).toBe(500);
        expect(tuned.withJitter(false).calculateDelay(2)).toBe(180);
    });

    it('should reject invalid settings', () => {
        expect(() => new RetryPolicy({ maxAttempts: -1 })).toThrow();
        expect(() => new RetryPolicy({ backoffMultiplier: 0.5 })).toThrow();
    });

    it('should allow retries only below the attempt budget', () => {
        const policy = RetryPolicy.database();
        expect(policy.shouldRetry(0)).toBe(true);
        expect(policy.shouldRetry(2)).toBe(true);
        expect(policy.shouldRetry(3)).toBe(false);
    });

    describe('decide', () => {
        const policy = RetryPolicy.standard();
        const half = () => 0.5;

        it('should retry retriable errors within budget', () => {
            expect(policy.decide(ErrorFactory.network('timeout'), 0, half)).toEqual({ action: 'retry', delayMs: 100 });
            expect(policy.decide(ErrorFactory.database('select', 'busy'), 2, half)).toEqual({ action: 'retry', delayMs: 400 });
        });

        it('should fail fast on non-retriable errors', () => {
            expect(policy.decide(ErrorFactory.validation('age', 'must be positive'), 0))
                .toEqual({ action: 'fail', reason: 'non-retriable' });
        });

        it('should fail once the budget is spent', () => {
            expect(policy.decide(ErrorFactory.network('timeout'), 3)).toEqual({ action: 'fail', reason: 'exhausted' });
        });

        it('should consult custom classifiers', () => {
            const retriable = ErrorFactory.custom('Gateway busy', new PaymentClassifier(true));
            const permanent = ErrorFactory.custom('Card stolen', new PaymentClassifier(false));

            expect(policy.decide(retriable, 1, half)).toEqual({ action: 'retry', delayMs: 200 });
            expect(policy.decide(permanent, 1, half)).toEqual({ action: 'fail', reason: 'non-retriable' });
        });
    });
});

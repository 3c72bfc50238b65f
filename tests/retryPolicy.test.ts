import { describe, expect, it } from 'vitest';
import { RetryPolicy } from '../src/exchanges/retryPolicy';
import { AuthError, ProtocolError, RateLimitError, TransientError } from '../src/exchanges/errors';

describe('RetryPolicy', () => {
    const policy = new RetryPolicy();

    it('doubles the backoff up to the ceiling', () => {
        expect([0, 1, 2, 3, 4, 5].map(attempt => policy.backoff(attempt))).toEqual([500, 1000, 2000, 4000, 8000, 10000]);
    });

    it('retries transient failures a bounded number of times', () => {
        const error = new TransientError('HTTP 502');

        expect(policy.nextDelay(error, 0)).toBe(500);
        expect(policy.nextDelay(error, 2)).toBe(2000);
        expect(policy.nextDelay(error, 3)).toBeNull();
    });

    it('waits at least the exchange hint on rate limits', () => {
        expect(policy.nextDelay(new RateLimitError('429', 5000), 0)).toBe(5000);
        expect(policy.nextDelay(new RateLimitError('429', 100), 0)).toBe(500);
        expect(policy.nextDelay(new RateLimitError('429', 5000), 1)).toBeNull();
    });

    it('never retries auth or protocol failures', () => {
        expect(policy.nextDelay(new AuthError('bad key', 'invalid-credentials'), 0)).toBeNull();
        expect(policy.nextDelay(new AuthError('skew', 'clock-skew'), 0)).toBeNull();
        expect(policy.nextDelay(new ProtocolError('bad payload'), 0)).toBeNull();
    });

    it('honours configured limits', () => {
        const strict = new RetryPolicy({ maxTransientRetries: 0, maxRateLimitRetries: 2, baseDelayMs: 100, maxDelayMs: 250 });

        expect(strict.nextDelay(new TransientError('down'), 0)).toBeNull();
        expect(strict.nextDelay(new RateLimitError('429', 0), 1)).toBe(200);
        expect(strict.backoff(4)).toBe(250);
        expect(strict.defaultRetryAfterMs).toBe(100);
    });
});

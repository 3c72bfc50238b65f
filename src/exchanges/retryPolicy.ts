import { MonitorError, RateLimitError } from './errors';

export interface RetryOptions {
    maxTransientRetries: number;
    maxRateLimitRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
    maxTransientRetries: 3,
    maxRateLimitRetries: 1,
    baseDelayMs: 500,
    maxDelayMs: 10000
};

/**
 * Single place that decides whether a failed exchange call is retried and
 * how long to wait first. `attempt` counts retries already made (0 on the
 * first failure).
 */
export class RetryPolicy {
    constructor(private readonly options: RetryOptions = DEFAULT_RETRY_OPTIONS) {}

    public backoff(attempt: number): number {
        return Math.min(this.options.baseDelayMs * Math.pow(2, attempt), this.options.maxDelayMs);
    }

    public nextDelay(error: MonitorError, attempt: number): number | null {
        switch (error.kind) {
            case 'auth':
            case 'protocol':
                return null;
            case 'rate-limit': {
                if (attempt >= this.options.maxRateLimitRetries) return null;
                const hint = error instanceof RateLimitError ? error.retryAfterMs : 0;
                return Math.max(hint, this.backoff(attempt));
            }
            case 'transient':
                return attempt < this.options.maxTransientRetries ? this.backoff(attempt) : null;
        }
    }

    public get defaultRetryAfterMs(): number {
        return this.options.baseDelayMs;
    }
}

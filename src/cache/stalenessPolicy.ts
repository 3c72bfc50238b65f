import { MonitorError } from '../exchanges/errors';
import { DeepReadonly } from '../utils/freeze';
import { CacheStore } from './cacheStore';

/**
 * What a read hands back. When `stale` is true the value is the last good
 * one, `ageMs` old, and `error` says why it could not be refreshed.
 *
 * Callers must check `stale` before using the value for anything that
 * alerts or acts, such as liquidation warnings. Nothing here enforces that.
 */
export interface RefreshResult<T> {
    value: DeepReadonly<T>;
    stale: boolean;
    fetchedAt: number;
    ageMs: number;
    // Another caller's refresh of this key is still running.
    refreshing: boolean;
    error?: MonitorError;
}

export interface StalenessOptions {
    // Past this age a cached value is no longer served on failure.
    maxStaleAgeMs?: number;
}

export class StalenessPolicy {
    constructor(private readonly options: StalenessOptions = {}) {}

    /**
     * Falls back to the last good value for `key`, or rethrows `error`
     * unchanged when there is none worth serving.
     */
    public resolve<T>(store: CacheStore<T>, key: string, error: MonitorError, now: number): RefreshResult<T> {
        const prior = store.get(key);
        if (!prior) {
            throw error;
        }

        const ageMs = now - prior.fetchedAt;
        if (this.options.maxStaleAgeMs !== undefined && ageMs > this.options.maxStaleAgeMs) {
            console.warn(`Dropping ${key} fallback: ${Math.round(ageMs / 1000)}s old exceeds ${Math.round(this.options.maxStaleAgeMs / 1000)}s limit`);
            throw error;
        }

        const entry = store.markStale(key) ?? prior;
        console.warn(`Serving stale ${key} (${Math.round(ageMs / 1000)}s old) after ${error.kind} error: ${error.message}`);
        return {
            value: entry.value,
            stale: true,
            fetchedAt: entry.fetchedAt,
            ageMs,
            refreshing: false,
            error
        };
    }
}

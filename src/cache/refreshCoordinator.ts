import { MonitorError, SupersededRefreshError, toMonitorError } from '../exchanges/errors';
import { Clock, systemClock } from '../utils/clock';
import { DeepReadonly } from '../utils/freeze';
import { CacheEntry, CacheStats, CacheStore } from './cacheStore';
import { RefreshResult, StalenessPolicy } from './stalenessPolicy';

export type RefreshState = 'fresh' | 'expired-idle' | 'expired-in-flight';

// Receives the value currently cached for the key, if any.
export type Fetcher<T> = (previous: DeepReadonly<T> | undefined) => Promise<T>;

export interface KeyHealth {
    state: RefreshState;
    lastSuccessAt: number | null;
    consecutiveErrors: number;
    lastError: MonitorError | null;
}

interface Generation {
    epoch: number;
    version: number;
}

/**
 * Fetch-if-stale-else-return-cached for one dataset category, with at most
 * one outstanding fetch per key.
 *
 *   fresh             -> served from the store, no fetch
 *   expired-idle      -> caller starts a refresh and awaits it
 *   expired-in-flight -> caller gets the previous value at once if there is
 *                        one, else awaits the running refresh
 *
 * Invalidation moves a key back to expired-idle. A refresh that was running at
 * the time still completes but its result is not stored: its callers get the
 * entry of a later refresh if there is one, else a SupersededRefreshError.
 */
export class RefreshCoordinator<T> {
    private inFlight = new Map<string, Promise<CacheEntry<T>>>();
    private versions = new Map<string, number>();
    private epoch = 0;
    private lastSuccess = new Map<string, number>();
    private failures = new Map<string, { count: number; lastError: MonitorError }>();

    constructor(
        public readonly name: string,
        private readonly store: CacheStore<T>,
        private readonly policy: StalenessPolicy,
        private readonly clock: Clock = systemClock
    ) {}

    public getState(key: string): RefreshState {
        if (this.store.isFresh(key)) return 'fresh';
        return this.inFlight.has(key) ? 'expired-in-flight' : 'expired-idle';
    }

    public async getOrRefresh(key: string, fetcher: Fetcher<T>, ttlMs: number): Promise<RefreshResult<T>> {
        const cached = this.store.get(key);
        if (cached && this.store.isFresh(key)) {
            return this.toResult(cached, false);
        }

        const pending = this.inFlight.get(key);
        if (pending) {
            if (cached) {
                return { ...this.toResult(cached, true), stale: true, error: this.failures.get(key)?.lastError };
            }
            return this.settle(key, pending);
        }

        return this.settle(key, this.startRefresh(key, fetcher, ttlMs, cached?.value));
    }

    public peek(key: string): RefreshResult<T> | undefined {
        const cached = this.store.get(key);
        if (!cached) return undefined;
        const stale = cached.stale || !this.store.isFresh(key);
        return { ...this.toResult(cached, this.inFlight.has(key)), stale, error: stale ? this.failures.get(key)?.lastError : undefined };
    }

    public invalidate(key: string): void {
        this.versions.set(key, (this.versions.get(key) ?? 0) + 1);
        this.inFlight.delete(key);
        this.failures.delete(key);
        this.store.invalidate(key);
    }

    public invalidateAll(): void {
        this.epoch++;
        this.inFlight.clear();
        this.failures.clear();
        this.lastSuccess.clear();
        this.store.invalidateAll();
    }

    public health(key: string): KeyHealth {
        const failure = this.failures.get(key);
        return {
            state: this.getState(key),
            lastSuccessAt: this.lastSuccess.get(key) ?? null,
            consecutiveErrors: failure?.count ?? 0,
            lastError: failure?.lastError ?? null
        };
    }

    public stats(): CacheStats {
        return this.store.stats();
    }

    /**
     * Drops keys that have sat expired for longer than `graceMs` with no
     * refresh running, along with their health records.
     */
    public evictExpired(graceMs: number): number {
        let evicted = 0;
        for (const key of this.store.keys()) {
            const entry = this.store.get(key);
            if (!entry || this.inFlight.has(key)) continue;
            if (this.clock.now() - entry.fetchedAt > entry.ttlMs + graceMs) {
                this.store.invalidate(key);
                this.failures.delete(key);
                this.lastSuccess.delete(key);
                evicted++;
            }
        }
        return evicted;
    }

    public keys(): string[] {
        return [...new Set([...this.store.keys(), ...this.inFlight.keys(), ...this.failures.keys()])];
    }

    private currentGeneration(key: string): Generation {
        return { epoch: this.epoch, version: this.versions.get(key) ?? 0 };
    }

    private isCurrent(key: string, generation: Generation): boolean {
        const current = this.currentGeneration(key);
        return current.epoch === generation.epoch && current.version === generation.version;
    }

    private startRefresh(key: string, fetcher: Fetcher<T>, ttlMs: number, previous: DeepReadonly<T> | undefined): Promise<CacheEntry<T>> {
        const generation = this.currentGeneration(key);
        console.log(`Refreshing ${this.name} ${key}...`);

        const refresh: Promise<CacheEntry<T>> = Promise.resolve()
            .then(() => fetcher(previous))
            .then(value => {
                if (!this.isCurrent(key, generation)) {
                    // Anything stored now came from a refresh started after the invalidation.
                    const newer = this.store.get(key);
                    if (newer) return newer;
                    throw new SupersededRefreshError(`Refresh of ${key} was superseded by cache invalidation`);
                }
                this.failures.delete(key);
                this.lastSuccess.set(key, this.clock.now());
                return this.store.put(key, value, ttlMs);
            })
            .finally(() => {
                if (this.inFlight.get(key) === refresh) {
                    this.inFlight.delete(key);
                }
            });

        this.inFlight.set(key, refresh);
        return refresh;
    }

    private async settle(key: string, refresh: Promise<CacheEntry<T>>): Promise<RefreshResult<T>> {
        try {
            return this.toResult(await refresh, false);
        } catch (error) {
            const failure = toMonitorError(error);
            const previous = this.failures.get(key);
            if (!(failure instanceof SupersededRefreshError) && previous?.lastError !== failure) {
                this.failures.set(key, { count: (previous?.count ?? 0) + 1, lastError: failure });
            }
            return this.policy.resolve(this.store, key, failure, this.clock.now());
        }
    }

    private toResult(entry: CacheEntry<T>, refreshing: boolean): RefreshResult<T> {
        return {
            value: entry.value,
            stale: entry.stale,
            fetchedAt: entry.fetchedAt,
            ageMs: this.clock.now() - entry.fetchedAt,
            refreshing,
            error: undefined
        };
    }
}

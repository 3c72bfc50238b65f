import { Clock, systemClock } from '../utils/clock';
import { deepFreeze, DeepReadonly } from '../utils/freeze';

export interface CacheEntry<T> {
    readonly value: DeepReadonly<T>;
    readonly fetchedAt: number;
    readonly ttlMs: number;
    // Set while the value is served past its ttl because a refresh failed.
    readonly stale: boolean;
}

export interface CacheStats {
    totalEntries: number;
    validEntries: number;
    expiredEntries: number;
    staleEntries: number;
}

/**
 * Keyed store for one dataset category. Values are frozen on the way in and
 * entries are swapped whole, so a reader holds either the previous tuple or
 * the new one and can never mutate what the store holds.
 */
export class CacheStore<T> {
    private entries = new Map<string, CacheEntry<T>>();

    constructor(private readonly clock: Clock = systemClock) {}

    public get(key: string): CacheEntry<T> | undefined {
        return this.entries.get(key);
    }

    public put(key: string, value: T, ttlMs: number): CacheEntry<T> {
        const entry: CacheEntry<T> = Object.freeze({
            value: deepFreeze(value),
            fetchedAt: this.clock.now(),
            ttlMs,
            stale: false
        });
        this.entries.set(key, entry);
        return entry;
    }

    public isFresh(key: string): boolean {
        const entry = this.entries.get(key);
        return entry !== undefined && this.clock.now() - entry.fetchedAt < entry.ttlMs;
    }

    public ageOf(key: string): number | undefined {
        const entry = this.entries.get(key);
        return entry === undefined ? undefined : this.clock.now() - entry.fetchedAt;
    }

    public markStale(key: string): CacheEntry<T> | undefined {
        const entry = this.entries.get(key);
        if (!entry || entry.stale) return entry;
        const staleEntry: CacheEntry<T> = Object.freeze({ ...entry, stale: true });
        this.entries.set(key, staleEntry);
        return staleEntry;
    }

    public invalidate(key: string): boolean {
        return this.entries.delete(key);
    }

    public invalidateAll(): void {
        this.entries.clear();
    }

    public keys(): string[] {
        return [...this.entries.keys()];
    }

    public stats(): CacheStats {
        const now = this.clock.now();
        let expiredEntries = 0;
        let staleEntries = 0;
        for (const entry of this.entries.values()) {
            if (now - entry.fetchedAt >= entry.ttlMs) expiredEntries++;
            if (entry.stale) staleEntries++;
        }
        return {
            totalEntries: this.entries.size,
            validEntries: this.entries.size - expiredEntries,
            expiredEntries,
            staleEntries
        };
    }
}

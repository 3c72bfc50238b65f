import { Clock } from '../utils/clock';

interface WeightEntry {
    at: number;
    weight: number;
}

export interface WeightLimiterOptions {
    windowMs: number;
    weightLimit: number;
}

/**
 * Per-endpoint sliding-window request weight ledger. Each request is charged
 * against the window ending at the moment it is sent, so spend from up to
 * `windowMs` ago still counts.
 */
export class WeightLimiter {
    private ledgers = new Map<string, WeightEntry[]>();
    private cooldowns = new Map<string, number>();

    constructor(private readonly options: WeightLimiterOptions, private readonly clock: Clock) {}

    public usedWeight(endpoint: string): number {
        return this.prune(endpoint, this.clock.now()).reduce((sum, entry) => sum + entry.weight, 0);
    }

    /**
     * Milliseconds until `weight` more fits in the endpoint's window; 0 when it
     * fits now.
     */
    public delayFor(endpoint: string, weight: number): number {
        const now = this.clock.now();
        const entries = this.prune(endpoint, now);
        let used = entries.reduce((sum, entry) => sum + entry.weight, 0);
        if (used + weight <= this.options.weightLimit || entries.length === 0) return 0;

        for (const entry of entries) {
            used -= entry.weight;
            if (used + weight <= this.options.weightLimit) {
                return entry.at + this.options.windowMs - now;
            }
        }
        return 0;
    }

    /**
     * Waits until the request fits, then records it.
     */
    public async acquire(endpoint: string, weight: number): Promise<void> {
        let delay = this.delayFor(endpoint, weight);
        while (delay > 0) {
            console.warn(`Weight budget for ${endpoint} exhausted, delaying request by ${delay}ms`);
            await this.clock.sleep(delay);
            delay = this.delayFor(endpoint, weight);
        }
        const entries = this.ledgers.get(endpoint) ?? [];
        entries.push({ at: this.clock.now(), weight });
        this.ledgers.set(endpoint, entries);
    }

    public blockUntil(endpoint: string, until: number): void {
        this.cooldowns.set(endpoint, Math.max(until, this.cooldowns.get(endpoint) ?? 0));
    }

    // Remaining cooldown after a rate-limit response, 0 when none.
    public cooldownRemaining(endpoint: string): number {
        const until = this.cooldowns.get(endpoint);
        if (until === undefined) return 0;
        const remaining = until - this.clock.now();
        if (remaining <= 0) {
            this.cooldowns.delete(endpoint);
            return 0;
        }
        return remaining;
    }

    private prune(endpoint: string, now: number): WeightEntry[] {
        const entries = (this.ledgers.get(endpoint) ?? []).filter(entry => entry.at > now - this.options.windowMs);
        this.ledgers.set(endpoint, entries);
        return entries;
    }
}

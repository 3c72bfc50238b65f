import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { WeightLimiter } from '../src/exchanges/weightLimiter';
import { ManualClock } from './support/manualClock';

describe('WeightLimiter', () => {
    let clock: ManualClock;
    let limiter: WeightLimiter;

    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        clock = new ManualClock();
        limiter = new WeightLimiter({ windowMs: 1000, weightLimit: 10 }, clock);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('charges weight against a sliding window', async () => {
        await limiter.acquire('/fapi/v2/account', 6);

        expect(limiter.usedWeight('/fapi/v2/account')).toBe(6);
        expect(limiter.delayFor('/fapi/v2/account', 4)).toBe(0);
        expect(limiter.delayFor('/fapi/v2/account', 5)).toBe(1000);

        clock.advance(1000);
        expect(limiter.usedWeight('/fapi/v2/account')).toBe(0);
    });

    it('delays a request until enough weight has left the window', async () => {
        await limiter.acquire('/fapi/v2/account', 6);
        clock.advance(400);

        await limiter.acquire('/fapi/v2/account', 5);

        expect(clock.sleeps).toEqual([600]);
        expect(limiter.usedWeight('/fapi/v2/account')).toBe(5);
    });

    it('keeps a separate budget per endpoint', async () => {
        await limiter.acquire('/fapi/v1/income', 10);

        expect(limiter.delayFor('/fapi/v1/income', 1)).toBe(1000);
        expect(limiter.delayFor('/fapi/v2/account', 10)).toBe(0);
    });

    it('lets an oversized request through on an empty window', () => {
        expect(limiter.delayFor('/fapi/v1/income', 30)).toBe(0);
    });

    it('tracks cooldowns until they lapse', () => {
        limiter.blockUntil('/fapi/v2/account', clock.now() + 5000);
        limiter.blockUntil('/fapi/v2/account', clock.now() + 2000);

        expect(limiter.cooldownRemaining('/fapi/v2/account')).toBe(5000);
        expect(limiter.cooldownRemaining('/fapi/v1/income')).toBe(0);

        clock.advance(5000);
        expect(limiter.cooldownRemaining('/fapi/v2/account')).toBe(0);
    });
});

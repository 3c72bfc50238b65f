import { describe, expect, it } from 'vitest';
import { BINANCE_FUTURES_TESTNET_URL, BINANCE_FUTURES_URL, parseConfig, withCredentials } from '../src/config';
import { ConfigError } from '../src/exchanges/errors';
import { TEST_ENV } from './support/fixtures';

describe('parseConfig', () => {
    it('fills in defaults around the credentials', () => {
        const config = parseConfig(TEST_ENV);

        expect(config.credentials).toEqual({ apiKey: 'test-key', apiSecret: 'test-secret' });
        expect(config.useTestnet).toBe(false);
        expect(config.baseUrl).toBe(BINANCE_FUTURES_URL);
        expect(config.baseCurrency).toBe('USDT');
        expect(config.requestTimeoutSeconds).toBe(30);
        expect(config.recvWindowMs).toBe(5000);
        expect(config.ttl).toEqual({ accountMs: 30000, positionsMs: 30000, tradesMs: 60000, incomeMs: 300000 });
        expect(config.retry).toEqual({ maxTransientRetries: 3, maxRateLimitRetries: 1, baseDelayMs: 500, maxDelayMs: 10000 });
        expect(config.rateLimit).toEqual({ windowMs: 60000, weightLimit: 2400 });
        expect(config.marginRatioAlertThreshold).toBe(0.8);
        expect(config.leverageBuckets).toEqual([2, 5, 10, 20]);
        expect(config.trackedSymbols).toEqual([]);
        expect(config.tradeWindowSize).toBe(1000);
        expect(config.refreshIntervalSeconds).toBe(60);
        expect(config.port).toBe(8080);
    });

    it('reads overrides from the environment', () => {
        const config = parseConfig({
            ...TEST_ENV,
            USE_TESTNET: 'true',
            TRACKED_SYMBOLS: ' btcusdt, ethusdt ,',
            ACCOUNT_TTL_SECONDS: '5',
            LEVERAGE_BUCKETS: '3, 10, 50',
            MAX_TRANSIENT_RETRIES: '0'
        });

        expect(config.baseUrl).toBe(BINANCE_FUTURES_TESTNET_URL);
        expect(config.trackedSymbols).toEqual(['BTCUSDT', 'ETHUSDT']);
        expect(config.ttl.accountMs).toBe(5000);
        expect(config.leverageBuckets).toEqual([3, 10, 50]);
        expect(config.retry.maxTransientRetries).toBe(0);
    });

    it('freezes the whole tree', () => {
        const config = parseConfig(TEST_ENV);

        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.ttl)).toBe(true);
        expect(Object.isFrozen(config.leverageBuckets)).toBe(true);
    });

    it('requires credentials', () => {
        expect(() => parseConfig({ BINANCE_API_KEY: 'test-key' })).toThrow(ConfigError);
        expect(() => parseConfig({ BINANCE_API_KEY: 'test-key' })).toThrow(/BINANCE_API_SECRET/);
        expect(() => parseConfig({ BINANCE_API_KEY: '', BINANCE_API_SECRET: 'test-secret' })).toThrow('BINANCE_API_KEY: BINANCE_API_KEY is required');
    });

    it('rejects malformed values', () => {
        expect(() => parseConfig({ ...TEST_ENV, PORT: 'eighty' })).toThrow(/PORT/);
        expect(() => parseConfig({ ...TEST_ENV, USE_TESTNET: 'yes' })).toThrow(/USE_TESTNET/);
        expect(() => parseConfig({ ...TEST_ENV, LEVERAGE_BUCKETS: '10,5' })).toThrow('LEVERAGE_BUCKETS must be ascending');
        expect(() => parseConfig({ ...TEST_ENV, MARGIN_RATIO_ALERT_THRESHOLD: '1.5' })).toThrow(/MARGIN_RATIO_ALERT_THRESHOLD/);
    });

    it('rejects a retry ceiling below the base delay', () => {
        expect(() => parseConfig({ ...TEST_ENV, RETRY_BASE_DELAY_MS: '2000', RETRY_MAX_DELAY_MS: '1000' }))
            .toThrow('Invalid configuration: RETRY_MAX_DELAY_MS must not be below RETRY_BASE_DELAY_MS');
    });
});

describe('withCredentials', () => {
    it('returns a new frozen config and leaves the original alone', () => {
        const original = parseConfig({ ...TEST_ENV, TRACKED_SYMBOLS: 'BTCUSDT' });

        const rotated = withCredentials(original, { apiKey: 'test-key-2', apiSecret: 'test-secret-2' });

        expect(rotated.credentials).toEqual({ apiKey: 'test-key-2', apiSecret: 'test-secret-2' });
        expect(original.credentials.apiKey).toBe('test-key');
        expect(rotated.trackedSymbols).toEqual(['BTCUSDT']);
        expect(rotated.ttl).toEqual(original.ttl);
        expect(Object.isFrozen(rotated.credentials)).toBe(true);
    });
});

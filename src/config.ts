import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './exchanges/errors';
import { RetryOptions } from './exchanges/retryPolicy';
import { deepFreeze, DeepReadonly } from './utils/freeze';

export const BINANCE_FUTURES_URL = 'https://fapi.binance.com';
export const BINANCE_FUTURES_TESTNET_URL = 'https://testnet.binancefuture.com';

export interface Credentials {
    apiKey: string;
    apiSecret: string;
}

export interface CacheTtls {
    accountMs: number;
    positionsMs: number;
    tradesMs: number;
    incomeMs: number;
}

export type FrozenConfig = DeepReadonly<MonitorConfig>;

export interface MonitorConfig {
    credentials: Credentials;
    useTestnet: boolean;
    baseUrl: string;
    baseCurrency: string;
    requestTimeoutSeconds: number;
    recvWindowMs: number;
    ttl: CacheTtls;
    retry: RetryOptions;
    rateLimit: {
        windowMs: number;
        weightLimit: number;
    };
    marginRatioAlertThreshold: number;
    leverageBuckets: number[];
    trackedSymbols: string[];
    tradeWindowSize: number;
    refreshIntervalSeconds: number;
    port: number;
}

const booleanFlag = z
    .enum(['true', 'false', '1', '0', ''])
    .default('false')
    .transform(value => value === 'true' || value === '1');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const symbolList = z
    .string()
    .default('')
    .transform(value => value.split(',').map(symbol => symbol.trim().toUpperCase()).filter(symbol => symbol.length > 0));

const envSchema = z.object({
    BINANCE_API_KEY: z.string().min(1, 'BINANCE_API_KEY is required'),
    BINANCE_API_SECRET: z.string().min(1, 'BINANCE_API_SECRET is required'),
    USE_TESTNET: booleanFlag,
    BASE_CURRENCY: z.string().min(1).default('USDT'),
    REQUEST_TIMEOUT_SECONDS: positiveInt(30),
    RECV_WINDOW_MS: z.coerce.number().int().positive().max(60000).default(5000),
    ACCOUNT_TTL_SECONDS: positiveInt(30),
    POSITIONS_TTL_SECONDS: positiveInt(30),
    TRADES_TTL_SECONDS: positiveInt(60),
    INCOME_TTL_SECONDS: positiveInt(300),
    MAX_TRANSIENT_RETRIES: nonNegativeInt(3),
    MAX_RATE_LIMIT_RETRIES: nonNegativeInt(1),
    RETRY_BASE_DELAY_MS: positiveInt(500),
    RETRY_MAX_DELAY_MS: positiveInt(10000),
    RATE_LIMIT_WINDOW_MS: positiveInt(60000),
    RATE_LIMIT_WEIGHT: positiveInt(2400),
    MARGIN_RATIO_ALERT_THRESHOLD: z.coerce.number().positive().max(1).default(0.8),
    LEVERAGE_BUCKETS: z
        .string()
        .default('2,5,10,20')
        .transform(value => value.split(',').map(bound => Number(bound.trim())))
        .refine(bounds => bounds.every(bound => Number.isFinite(bound) && bound > 0), 'LEVERAGE_BUCKETS must be positive numbers')
        .refine(bounds => bounds.every((bound, i) => i === 0 || bound > bounds[i - 1]), 'LEVERAGE_BUCKETS must be ascending'),
    TRACKED_SYMBOLS: symbolList,
    TRADE_WINDOW_SIZE: positiveInt(1000),
    REFRESH_INTERVAL_SECONDS: positiveInt(60),
    PORT: positiveInt(8080)
});

/**
 * Builds the immutable configuration from an environment map. Throws
 * ConfigError listing every invalid variable.
 */
export function parseConfig(env: Record<string, string | undefined>): FrozenConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
    }
    const vars = parsed.data;

    if (vars.RETRY_MAX_DELAY_MS < vars.RETRY_BASE_DELAY_MS) {
        throw new ConfigError('Invalid configuration: RETRY_MAX_DELAY_MS must not be below RETRY_BASE_DELAY_MS');
    }

    return deepFreeze({
        credentials: {
            apiKey: vars.BINANCE_API_KEY,
            apiSecret: vars.BINANCE_API_SECRET
        },
        useTestnet: vars.USE_TESTNET,
        baseUrl: vars.USE_TESTNET ? BINANCE_FUTURES_TESTNET_URL : BINANCE_FUTURES_URL,
        baseCurrency: vars.BASE_CURRENCY,
        requestTimeoutSeconds: vars.REQUEST_TIMEOUT_SECONDS,
        recvWindowMs: vars.RECV_WINDOW_MS,
        ttl: {
            accountMs: vars.ACCOUNT_TTL_SECONDS * 1000,
            positionsMs: vars.POSITIONS_TTL_SECONDS * 1000,
            tradesMs: vars.TRADES_TTL_SECONDS * 1000,
            incomeMs: vars.INCOME_TTL_SECONDS * 1000
        },
        retry: {
            maxTransientRetries: vars.MAX_TRANSIENT_RETRIES,
            maxRateLimitRetries: vars.MAX_RATE_LIMIT_RETRIES,
            baseDelayMs: vars.RETRY_BASE_DELAY_MS,
            maxDelayMs: vars.RETRY_MAX_DELAY_MS
        },
        rateLimit: {
            windowMs: vars.RATE_LIMIT_WINDOW_MS,
            weightLimit: vars.RATE_LIMIT_WEIGHT
        },
        marginRatioAlertThreshold: vars.MARGIN_RATIO_ALERT_THRESHOLD,
        leverageBuckets: vars.LEVERAGE_BUCKETS,
        trackedSymbols: vars.TRACKED_SYMBOLS,
        tradeWindowSize: vars.TRADE_WINDOW_SIZE,
        refreshIntervalSeconds: vars.REFRESH_INTERVAL_SECONDS,
        port: vars.PORT
    });
}

/**
 * Same configuration under a different credential pair. Used on rotation;
 * the original object is left untouched.
 */
export function withCredentials(config: FrozenConfig, credentials: Credentials): FrozenConfig {
    return deepFreeze({
        ...config,
        credentials: { ...credentials },
        leverageBuckets: [...config.leverageBuckets],
        trackedSymbols: [...config.trackedSymbols]
    });
}

export function loadConfig(): FrozenConfig {
    dotenv.config();
    return parseConfig(process.env);
}

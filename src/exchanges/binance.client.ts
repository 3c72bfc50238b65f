import axios, { AxiosInstance, AxiosResponse } from 'axios';
import crypto from 'crypto';
import { z } from 'zod';
import { FrozenConfig } from '../config';
import { AccountSnapshot, Position } from '../models/position.model';
import { IncomeRecord, IncomeType, TimeRange, Trade } from '../models/history.model';
import { Clock, systemClock } from '../utils/clock';
import {
    AuthError,
    MonitorError,
    ProtocolError,
    RateLimitError,
    TransientError,
    toMonitorError
} from './errors';
import { RetryPolicy } from './retryPolicy';
import { WeightLimiter } from './weightLimiter';
import {
    accountSchema,
    errorBodySchema,
    incomeSchema,
    positionRiskSchema,
    serverTimeSchema,
    toAccountSnapshot,
    toIncomeRecords,
    toPositions,
    toTrades,
    userTradesSchema
} from './binance.schemas';

export const ENDPOINTS = {
    PING: '/fapi/v1/ping',
    TIME: '/fapi/v1/time',
    ACCOUNT: '/fapi/v2/account',
    POSITION_RISK: '/fapi/v2/positionRisk',
    USER_TRADES: '/fapi/v1/userTrades',
    INCOME: '/fapi/v1/income'
} as const;

// Request weights as published for the USDⓈ-M futures REST API.
const ENDPOINT_WEIGHTS: Record<string, number> = {
    [ENDPOINTS.PING]: 1,
    [ENDPOINTS.TIME]: 1,
    [ENDPOINTS.ACCOUNT]: 5,
    [ENDPOINTS.POSITION_RISK]: 5,
    [ENDPOINTS.USER_TRADES]: 5,
    [ENDPOINTS.INCOME]: 30
};

const AUTH_ERROR_CODES = new Set([-1002, -1022, -2014]);
const PERMISSION_ERROR_CODES = new Set([-2015]);
const TRANSIENT_ERROR_CODES = new Set([-1001, -1007]);
const TIMESTAMP_OUTSIDE_RECV_WINDOW = -1021;
const TOO_MANY_REQUESTS = -1003;

const INCOME_PAGE_SIZE = 1000;
const MAX_INCOME_PAGES = 10;
const MAX_TRADES_LIMIT = 1000;

export type RequestParams = Record<string, string | number | boolean | undefined>;

export interface BinanceClientOptions {
    clock?: Clock;
    // Tests hand in an instance built around an in-process adapter.
    http?: AxiosInstance;
}

/**
 * Signed access to the futures account endpoints. Owns request signing,
 * timestamp discipline, weight budgeting and the retry loop; everything above
 * it sees either a parsed payload or a typed MonitorError.
 */
export class BinanceClient {
    private readonly http: AxiosInstance;
    private readonly clock: Clock;
    private readonly retryPolicy: RetryPolicy;
    private readonly limiter: WeightLimiter;
    private timeOffset: number = 0;
    private lastTimestamp: number = 0;
    private needsTimeSync: boolean = false;
    private authFailure: AuthError | null = null;
    private lastUsedWeight: number | null = null;

    constructor(private readonly config: FrozenConfig, options: BinanceClientOptions = {}) {
        this.http = options.http ?? axios.create();
        this.clock = options.clock ?? systemClock;
        this.retryPolicy = new RetryPolicy({ ...config.retry });
        this.limiter = new WeightLimiter({ ...config.rateLimit }, this.clock);
    }

    public async initialize(): Promise<void> {
        await this.syncTime();
        console.log(`Initialized Binance futures client against ${this.config.baseUrl}${this.config.useTestnet ? ' (testnet)' : ''}`);
    }

    public get isAuthLocked(): boolean {
        return this.authFailure !== null;
    }

    public get usedWeight(): number | null {
        return this.lastUsedWeight;
    }

    public get clockOffsetMs(): number {
        return this.timeOffset;
    }

    public async syncTime(): Promise<void> {
        try {
            const payload = await this.send(ENDPOINTS.TIME, {}, false);
            const parsed = serverTimeSchema.safeParse(payload);
            if (!parsed.success) {
                throw new ProtocolError(`Unexpected ${ENDPOINTS.TIME} payload`, { endpoint: ENDPOINTS.TIME });
            }
            this.timeOffset = parsed.data.serverTime - this.clock.now();
            this.needsTimeSync = false;
        } catch (error) {
            console.error(`Error synchronizing time with Binance, keeping offset ${this.timeOffset}ms:`, error);
        }
    }

    /**
     * Issues a request with retries applied per the retry policy. Fails fast,
     * without touching the network, while credentials are known bad or the
     * endpoint is cooling down after a rate-limit response.
     */
    public async fetch(endpoint: string, params: RequestParams = {}, signed: boolean = true): Promise<unknown> {
        if (this.authFailure) throw this.authFailure;

        const cooldown = this.limiter.cooldownRemaining(endpoint);
        if (cooldown > 0) {
            throw new RateLimitError(`Binance API error: ${endpoint} is rate limited`, cooldown, { endpoint });
        }

        let attempt = 0;
        for (;;) {
            try {
                return await this.send(endpoint, params, signed);
            } catch (error) {
                const failure = toMonitorError(error, endpoint);
                if (failure instanceof AuthError && failure.reason !== 'clock-skew') {
                    this.authFailure = failure;
                    console.error(`Binance rejected credentials on ${endpoint}, halting requests until credentials are reconfigured: ${failure.message}`);
                }

                const delay = this.retryPolicy.nextDelay(failure, attempt);
                if (delay === null) throw failure;

                attempt++;
                console.warn(`Retrying ${endpoint} in ${delay}ms after ${failure.kind} error (retry ${attempt}): ${failure.message}`);
                await this.clock.sleep(delay);

                const remaining = this.limiter.cooldownRemaining(endpoint);
                if (remaining > 0) await this.clock.sleep(remaining);
            }
        }
    }

    public async ping(): Promise<void> {
        await this.fetch(ENDPOINTS.PING, {}, false);
    }

    public async getAccount(): Promise<AccountSnapshot> {
        const payload = await this.fetch(ENDPOINTS.ACCOUNT);
        return toAccountSnapshot(this.parse(ENDPOINTS.ACCOUNT, accountSchema, payload), this.clock.now());
    }

    public async getPositionRisk(): Promise<Position[]> {
        const payload = await this.fetch(ENDPOINTS.POSITION_RISK);
        return toPositions(this.parse(ENDPOINTS.POSITION_RISK, positionRiskSchema, payload), this.clock.now());
    }

    public async getUserTrades(symbol: string, limit: number): Promise<Trade[]> {
        const payload = await this.fetch(ENDPOINTS.USER_TRADES, {
            symbol,
            limit: Math.min(Math.max(1, Math.floor(limit)), MAX_TRADES_LIMIT)
        });
        return toTrades(this.parse(ENDPOINTS.USER_TRADES, userTradesSchema, payload));
    }

    /**
     * Income is paged forward by time; a full page means there may be more.
     * The next page starts at the last timestamp seen, so records sharing it
     * come back twice and are dropped by id.
     */
    public async getIncome(range: TimeRange, incomeType?: IncomeType): Promise<IncomeRecord[]> {
        const records: IncomeRecord[] = [];
        const seen = new Set<string>();
        let startTime = range.startTime;

        for (let page = 0; page < MAX_INCOME_PAGES; page++) {
            const payload = await this.fetch(ENDPOINTS.INCOME, {
                incomeType,
                startTime,
                endTime: range.endTime,
                limit: INCOME_PAGE_SIZE
            });
            const batch = toIncomeRecords(this.parse(ENDPOINTS.INCOME, incomeSchema, payload));

            for (const record of batch) {
                const key = `${record.transactionId}:${record.type}:${record.symbol}`;
                if (seen.has(key)) continue;
                seen.add(key);
                records.push(record);
            }

            if (batch.length < INCOME_PAGE_SIZE) break;
            const lastTime = batch[batch.length - 1].time;
            if (lastTime >= range.endTime) break;
            if (lastTime === startTime) {
                console.warn(`Income page at ${new Date(lastTime).toISOString()} is full of one timestamp, stopping`);
                break;
            }
            startTime = lastTime;
            if (page === MAX_INCOME_PAGES - 1) {
                console.warn(`Income history truncated after ${MAX_INCOME_PAGES} pages at ${new Date(lastTime).toISOString()}`);
            }
        }

        return records.sort((a, b) => a.time - b.time);
    }

    private parse<T extends z.ZodTypeAny>(endpoint: string, schema: T, payload: unknown): z.output<T> {
        const parsed = schema.safeParse(payload);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
            throw new ProtocolError(`Unexpected ${endpoint} payload${where}: ${issue ? issue.message : 'invalid'}`, { endpoint });
        }
        return parsed.data;
    }

    private nextTimestamp(): number {
        const timestamp = Math.max(this.clock.now() + this.timeOffset, this.lastTimestamp + 1);
        this.lastTimestamp = timestamp;
        return timestamp;
    }

    private generateSignature(queryString: string): string {
        return crypto
            .createHmac('sha256', this.config.credentials.apiSecret)
            .update(queryString)
            .digest('hex');
    }

    private buildQuery(params: RequestParams, signed: boolean): string {
        const entries: [string, string][] = [];
        for (const [key, value] of Object.entries(params)) {
            if (value !== undefined) entries.push([key, String(value)]);
        }
        if (!signed) return new URLSearchParams(entries).toString();

        entries.push(['timestamp', this.nextTimestamp().toString()]);
        entries.push(['recvWindow', this.config.recvWindowMs.toString()]);
        const queryString = new URLSearchParams(entries).toString();
        return `${queryString}&signature=${this.generateSignature(queryString)}`;
    }

    private async send(endpoint: string, params: RequestParams, signed: boolean): Promise<unknown> {
        await this.limiter.acquire(endpoint, ENDPOINT_WEIGHTS[endpoint] ?? 1);
        if (signed && this.needsTimeSync) {
            await this.syncTime();
        }

        const query = this.buildQuery(params, signed);
        const url = `${this.config.baseUrl}${endpoint}${query ? `?${query}` : ''}`;

        let response: AxiosResponse<unknown>;
        try {
            response = await this.http.get<unknown>(url, {
                headers: signed ? { 'X-MBX-APIKEY': this.config.credentials.apiKey } : {},
                timeout: this.config.requestTimeoutSeconds * 1000,
                validateStatus: () => true
            });
        } catch (error) {
            throw this.classifyTransportError(endpoint, error);
        }

        this.recordUsedWeight(response);
        if (response.status >= 200 && response.status < 300) {
            return response.data;
        }
        throw this.classifyResponse(endpoint, response);
    }

    private recordUsedWeight(response: AxiosResponse<unknown>): void {
        const used = Number(this.headerValue(response, 'x-mbx-used-weight-1m'));
        if (Number.isFinite(used) && used > 0) {
            this.lastUsedWeight = used;
        }
    }

    private headerValue(response: AxiosResponse<unknown>, name: string): string | undefined {
        const value: unknown = response.headers[name];
        if (typeof value === 'string') return value;
        if (typeof value === 'number') return value.toString();
        return undefined;
    }

    private classifyTransportError(endpoint: string, error: unknown): MonitorError {
        if (axios.isAxiosError(error)) {
            if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
                return new TransientError(`Request to ${endpoint} timed out after ${this.config.requestTimeoutSeconds}s`, { endpoint, cause: error });
            }
            return new TransientError(`Network error on ${endpoint}: ${error.message}`, { endpoint, cause: error });
        }
        return toMonitorError(error, endpoint);
    }

    private classifyResponse(endpoint: string, response: AxiosResponse<unknown>): MonitorError {
        const body = errorBodySchema.safeParse(response.data);
        const code = body.success ? body.data.code : undefined;
        const message = `Binance API error: ${body.success ? body.data.msg : `HTTP ${response.status}`}`;
        const details = { endpoint, status: response.status, code };

        if (response.status === 429 || response.status === 418 || code === TOO_MANY_REQUESTS) {
            const retryAfterMs = this.retryAfterMs(response);
            this.limiter.blockUntil(endpoint, this.clock.now() + retryAfterMs);
            return new RateLimitError(message, retryAfterMs, details);
        }
        if (code === TIMESTAMP_OUTSIDE_RECV_WINDOW) {
            this.needsTimeSync = true;
            return new AuthError(message, 'clock-skew', details);
        }
        if (code !== undefined && PERMISSION_ERROR_CODES.has(code)) {
            return new AuthError(message, 'permission-denied', details);
        }
        if (response.status === 401 || (code !== undefined && AUTH_ERROR_CODES.has(code))) {
            return new AuthError(message, 'invalid-credentials', details);
        }
        if (response.status >= 500 || response.status === 403 || (code !== undefined && TRANSIENT_ERROR_CODES.has(code))) {
            return new TransientError(message, details);
        }
        return new ProtocolError(message, details);
    }

    private retryAfterMs(response: AxiosResponse<unknown>): number {
        const header = this.headerValue(response, 'retry-after')?.trim();
        if (!header) return this.retryPolicy.defaultRetryAfterMs;
        const seconds = Number(header);
        return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : this.retryPolicy.defaultRetryAfterMs;
    }
}

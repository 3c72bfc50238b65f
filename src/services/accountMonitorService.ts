import { BinanceClient } from '../exchanges/binance.client';
import { Credentials, FrozenConfig, withCredentials } from '../config';
import { CacheStats, CacheStore } from '../cache/cacheStore';
import { KeyHealth, RefreshCoordinator } from '../cache/refreshCoordinator';
import { RefreshResult, StalenessPolicy, StalenessOptions } from '../cache/stalenessPolicy';
import { MonitorError, describeError, toMonitorError } from '../exchanges/errors';
import { AccountSnapshot, Position, PositionFilter } from '../models/position.model';
import { IncomeRecord, IncomeType, TimeRange, Trade, isWithinRange } from '../models/history.model';
import { DerivedMetrics, IncomeSummary, PerformanceMetrics, TradingStatistics } from '../models/metrics.model';
import { Clock, systemClock } from '../utils/clock';
import { DeepReadonly } from '../utils/freeze';
import {
    computePerformanceMetrics,
    computeTradingStatistics,
    deriveMetrics,
    summarizeIncome
} from './aggregator';

export interface FreshResult<D> {
    status: 'fresh';
    data: D;
    stale: false;
    fetchedAt: number;
    ageMs: number;
}

/**
 * Last good data, served because a refresh failed or is still running. Not to
 * be used to trigger alerts without telling the user it is stale.
 */
export interface StaleResult<D> {
    status: 'stale';
    data: D;
    stale: true;
    fetchedAt: number;
    ageMs: number;
    refreshing: boolean;
    reason?: string;
    error?: MonitorError;
}

export interface UnavailableResult {
    status: 'unavailable';
    stale: false;
    reason: string;
    error: MonitorError;
}

export type DatasetResult<D> = FreshResult<D> | StaleResult<D> | UnavailableResult;

export type AvailableResult<D> = FreshResult<D> | StaleResult<D>;

export type Dataset = 'account' | 'positions' | 'trades' | 'income';

export interface DatasetHealth extends Omit<KeyHealth, 'lastError'> {
    key: string;
    lastSuccess: string | null;
    lastErrorKind: MonitorError['kind'] | null;
    lastErrorMessage: string | null;
}

export interface HealthStatus {
    healthy: boolean;
    authLocked: boolean;
    usedWeight: number | null;
    clockOffsetMs: number;
    datasets: Record<Dataset, DatasetHealth[]>;
    cache: Record<Dataset, CacheStats>;
}

export interface AccountMonitorOptions {
    clock?: Clock;
    staleness?: StalenessOptions;
    createClient?: (config: FrozenConfig, clock: Clock) => BinanceClient;
}

const ACCOUNT_KEY = 'account';
const POSITIONS_KEY = 'positions';
const TRADES_FETCH_LIMIT = 1000;
const DEFAULT_RECENT_TRADES = 50;
// Unused history keys are dropped once they have been expired this many ttls.
const EVICTION_TTL_MULTIPLE = 10;

function tradesKey(symbol: string): string {
    return `trades:${symbol}`;
}

function incomeKey(range: TimeRange, incomeType?: IncomeType): string {
    return `income:${range.startTime}:${range.endTime}:${incomeType ?? 'ALL'}`;
}

/**
 * Appends newly fetched trades to the cached window. Records are never
 * rewritten: an id already present keeps its original record.
 */
export function mergeTradeWindow(previous: ReadonlyArray<Trade>, incoming: ReadonlyArray<Trade>, windowSize: number): Trade[] {
    const byId = new Map<number, Trade>();
    for (const trade of previous) byId.set(trade.id, trade);
    for (const trade of incoming) {
        if (!byId.has(trade.id)) byId.set(trade.id, trade);
    }
    const merged = [...byId.values()].sort((a, b) => a.id - b.id);
    return merged.length > windowSize ? merged.slice(merged.length - windowSize) : merged;
}

export function matchesFilter(position: DeepReadonly<Position>, filter: PositionFilter = {}): boolean {
    if (filter.symbol !== undefined && position.symbol !== filter.symbol) return false;
    if (filter.side !== undefined && position.side !== filter.side) return false;
    if (filter.marginMode !== undefined && position.marginMode !== filter.marginMode) return false;
    return true;
}

function fromRefresh<T>(result: RefreshResult<T>): AvailableResult<DeepReadonly<T>> {
    if (result.stale) {
        return {
            status: 'stale',
            data: result.value,
            stale: true,
            fetchedAt: result.fetchedAt,
            ageMs: result.ageMs,
            refreshing: result.refreshing,
            reason: result.error ? describeError(result.error) : undefined,
            error: result.error
        };
    }
    return { status: 'fresh', data: result.value, stale: false, fetchedAt: result.fetchedAt, ageMs: result.ageMs };
}

function unavailable(error: unknown): UnavailableResult {
    const failure = toMonitorError(error);
    return { status: 'unavailable', stale: false, reason: describeError(failure), error: failure };
}

export function mapResult<A, B>(result: DatasetResult<A>, map: (data: A) => B): DatasetResult<B> {
    if (result.status === 'unavailable') return result;
    return { ...result, data: map(result.data) };
}

/**
 * Joins several results into one. Unavailable if any input is; otherwise stale
 * if any input is, dated by the oldest input.
 */
export function combineResults<D>(results: ReadonlyArray<DatasetResult<unknown>>, data: D): DatasetResult<D> {
    const failed = results.find((result): result is UnavailableResult => result.status === 'unavailable');
    if (failed) return failed;
    return mergeAvailable(results.filter((result): result is AvailableResult<unknown> => result.status !== 'unavailable'), data);
}

function mergeAvailable<D>(results: ReadonlyArray<AvailableResult<unknown>>, data: D, partialFailure?: UnavailableResult): DatasetResult<D> {
    const oldest = results.reduce<AvailableResult<unknown> | undefined>(
        (acc, result) => (acc === undefined || result.fetchedAt < acc.fetchedAt ? result : acc),
        undefined
    );
    const fetchedAt = oldest ? oldest.fetchedAt : 0;
    const ageMs = oldest ? oldest.ageMs : 0;
    const staleInput = results.find((result): result is StaleResult<unknown> => result.status === 'stale');

    if (staleInput || partialFailure) {
        return {
            status: 'stale',
            data,
            stale: true,
            fetchedAt,
            ageMs,
            refreshing: results.some(result => result.status === 'stale' && result.refreshing),
            reason: partialFailure?.reason ?? staleInput?.reason,
            error: partialFailure?.error ?? staleInput?.error
        };
    }
    return { status: 'fresh', data, stale: false, fetchedAt, ageMs };
}

/**
 * Read-only view of one futures account. Every dataset is served through its
 * own refresh coordinator and ttl. Exchange failures never escape a read:
 * they come back as stale or unavailable results.
 */
export class AccountMonitorService {
    private config: FrozenConfig;
    private client: BinanceClient;
    private readonly clock: Clock;
    private readonly createClient: (config: FrozenConfig, clock: Clock) => BinanceClient;
    private readonly accounts: RefreshCoordinator<AccountSnapshot>;
    private readonly positions: RefreshCoordinator<Position[]>;
    private readonly trades: RefreshCoordinator<Trade[]>;
    private readonly income: RefreshCoordinator<IncomeRecord[]>;
    private refreshTimer: NodeJS.Timeout | null = null;
    private refreshRunning = false;

    constructor(config: FrozenConfig, options: AccountMonitorOptions = {}) {
        this.config = config;
        this.clock = options.clock ?? systemClock;
        this.createClient = options.createClient ?? ((cfg, clock) => new BinanceClient(cfg, { clock }));
        this.client = this.createClient(config, this.clock);

        const policy = new StalenessPolicy(options.staleness);
        this.accounts = new RefreshCoordinator('account', new CacheStore<AccountSnapshot>(this.clock), policy, this.clock);
        this.positions = new RefreshCoordinator('positions', new CacheStore<Position[]>(this.clock), policy, this.clock);
        this.trades = new RefreshCoordinator('trades', new CacheStore<Trade[]>(this.clock), policy, this.clock);
        this.income = new RefreshCoordinator('income', new CacheStore<IncomeRecord[]>(this.clock), policy, this.clock);
    }

    public get baseCurrency(): string {
        return this.config.baseCurrency;
    }

    public async initialize(): Promise<void> {
        await this.client.initialize();
    }

    public async getAccountSnapshot(): Promise<DatasetResult<DeepReadonly<AccountSnapshot>>> {
        try {
            const result = await this.accounts.getOrRefresh(ACCOUNT_KEY, () => this.client.getAccount(), this.config.ttl.accountMs);
            return fromRefresh(result);
        } catch (error) {
            return unavailable(error);
        }
    }

    public async getPositions(filter?: PositionFilter): Promise<DatasetResult<ReadonlyArray<DeepReadonly<Position>>>> {
        try {
            const result = await this.positions.getOrRefresh(POSITIONS_KEY, () => this.client.getPositionRisk(), this.config.ttl.positionsMs);
            return mapResult(fromRefresh(result), positions => positions.filter(position => matchesFilter(position, filter)));
        } catch (error) {
            return unavailable(error);
        }
    }

    /**
     * Newest first. Without a symbol, covers every symbol with an open position
     * plus the configured tracked symbols.
     */
    public async getRecentTrades(symbol?: string, limit: number = DEFAULT_RECENT_TRADES): Promise<DatasetResult<DeepReadonly<Trade>[]>> {
        const count = Math.max(0, Math.floor(limit));
        const symbols = symbol !== undefined ? [symbol] : await this.activeSymbols();
        if (!Array.isArray(symbols)) return symbols;
        if (symbols.length === 0) {
            return { status: 'fresh', data: [], stale: false, fetchedAt: this.clock.now(), ageMs: 0 };
        }

        const results = await Promise.all(symbols.map(sym => this.getTradeWindow(sym)));
        const available = results.filter((result): result is AvailableResult<ReadonlyArray<DeepReadonly<Trade>>> => result.status !== 'unavailable');
        const firstFailure = results.find((result): result is UnavailableResult => result.status === 'unavailable');
        if (available.length === 0 && firstFailure) return firstFailure;

        const merged = available
            .flatMap(result => [...result.data])
            .sort((a, b) => b.time - a.time || b.id - a.id)
            .slice(0, count);
        return mergeAvailable(available, merged, firstFailure);
    }

    public async getIncomeHistory(range: TimeRange, incomeType?: IncomeType): Promise<DatasetResult<ReadonlyArray<DeepReadonly<IncomeRecord>>>> {
        if (range.startTime > range.endTime) {
            throw new RangeError(`Invalid income range: startTime ${range.startTime} is after endTime ${range.endTime}`);
        }
        const fetchRange = this.alignIncomeRange(range);
        try {
            const result = await this.income.getOrRefresh(
                incomeKey(fetchRange, incomeType),
                () => this.client.getIncome(fetchRange, incomeType),
                this.config.ttl.incomeMs
            );
            return mapResult(fromRefresh(result), records => records.filter(record => isWithinRange(record.time, range)));
        } catch (error) {
            return unavailable(error);
        }
    }

    /**
     * Recomputed from the current snapshot and positions on every call.
     */
    public async getDerivedMetrics(): Promise<DatasetResult<DerivedMetrics>> {
        const [account, positions] = await Promise.all([this.getAccountSnapshot(), this.getPositions()]);
        if (account.status === 'unavailable') return account;
        if (positions.status === 'unavailable') return positions;

        const metrics = deriveMetrics(account.data, positions.data, {
            marginRatioAlertThreshold: this.config.marginRatioAlertThreshold,
            leverageBuckets: this.config.leverageBuckets,
            baseCurrency: this.config.baseCurrency
        });
        return combineResults([account, positions], metrics);
    }

    /**
     * Statistics over the cached trade window; trades older than the window
     * are not counted.
     */
    public async getTradingStatistics(range: TimeRange, symbol?: string): Promise<DatasetResult<TradingStatistics>> {
        const trades = await this.getRecentTrades(symbol, this.config.tradeWindowSize);
        return mapResult(trades, data => computeTradingStatistics(data, range, symbol));
    }

    public async getPerformanceMetrics(symbol?: string): Promise<DatasetResult<PerformanceMetrics>> {
        const trades = await this.getRecentTrades(symbol, this.config.tradeWindowSize);
        return mapResult(trades, data => computePerformanceMetrics(data));
    }

    public async getIncomeSummary(range: TimeRange): Promise<DatasetResult<IncomeSummary>> {
        const records = await this.getIncomeHistory(range);
        return mapResult(records, data => summarizeIncome(data, range));
    }

    /**
     * Swaps in a new credential pair: a fresh client on a copy of the
     * configuration, and every cached key dropped so nothing fetched under the
     * old identity is served under the new one.
     */
    public async rotateCredentials(credentials: Credentials): Promise<void> {
        this.config = withCredentials(this.config, credentials);
        this.client = this.createClient(this.config, this.clock);
        this.invalidate('all');
        console.log('Credentials rotated, all cached datasets invalidated');
        await this.client.initialize();
    }

    public invalidate(target: Dataset | 'all'): void {
        if (target === 'all' || target === 'account') this.accounts.invalidateAll();
        if (target === 'all' || target === 'positions') this.positions.invalidateAll();
        if (target === 'all' || target === 'trades') this.trades.invalidateAll();
        if (target === 'all' || target === 'income') this.income.invalidateAll();
    }

    public async testConnection(): Promise<boolean> {
        try {
            await this.client.ping();
            return true;
        } catch (error) {
            console.error('Binance connectivity check failed:', toMonitorError(error).message);
            return false;
        }
    }

    public getHealthStatus(): HealthStatus {
        const datasets: Record<Dataset, DatasetHealth[]> = {
            account: describeKeys(this.accounts),
            positions: describeKeys(this.positions),
            trades: describeKeys(this.trades),
            income: describeKeys(this.income)
        };
        const cache: Record<Dataset, CacheStats> = {
            account: this.accounts.stats(),
            positions: this.positions.stats(),
            trades: this.trades.stats(),
            income: this.income.stats()
        };
        const failing = Object.values(datasets).some(keys => keys.some(key => key.consecutiveErrors > 0));

        return {
            healthy: !this.client.isAuthLocked && !failing,
            authLocked: this.client.isAuthLocked,
            usedWeight: this.client.usedWeight,
            clockOffsetMs: this.client.clockOffsetMs,
            datasets,
            cache
        };
    }

    /**
     * Keeps the fast-moving datasets warm and logs a metrics summary every
     * `refreshIntervalSeconds`.
     */
    public startBackgroundRefresh(): void {
        if (this.refreshTimer) return;
        const tick = () => {
            this.refreshOnce().catch(error => {
                console.error('Background refresh failed:', error);
            });
        };
        this.refreshTimer = setInterval(tick, this.config.refreshIntervalSeconds * 1000);
        tick();
    }

    public stopBackgroundRefresh(): void {
        if (this.refreshTimer) {
            clearInterval(this.refreshTimer);
            this.refreshTimer = null;
        }
    }

    public async refreshOnce(): Promise<void> {
        if (this.refreshRunning) return;
        this.refreshRunning = true;
        try {
            const metrics = await this.getDerivedMetrics();
            logAccountMetrics(metrics);
            this.trades.evictExpired(this.config.ttl.tradesMs * EVICTION_TTL_MULTIPLE);
            this.income.evictExpired(this.config.ttl.incomeMs * EVICTION_TTL_MULTIPLE);
        } finally {
            this.refreshRunning = false;
        }
    }

    private async activeSymbols(): Promise<string[] | UnavailableResult> {
        const positions = await this.getPositions();
        if (positions.status === 'unavailable' && this.config.trackedSymbols.length === 0) {
            return positions;
        }
        const symbols = new Set<string>(this.config.trackedSymbols);
        if (positions.status !== 'unavailable') {
            for (const position of positions.data) symbols.add(position.symbol);
        }
        return [...symbols].sort();
    }

    private async getTradeWindow(symbol: string): Promise<DatasetResult<ReadonlyArray<DeepReadonly<Trade>>>> {
        try {
            const result = await this.trades.getOrRefresh(
                tradesKey(symbol),
                async previous => mergeTradeWindow(previous ?? [], await this.client.getUserTrades(symbol, TRADES_FETCH_LIMIT), this.config.tradeWindowSize),
                this.config.ttl.tradesMs
            );
            return fromRefresh(result);
        } catch (error) {
            return unavailable(error);
        }
    }

    // Widens both ends of the range to the ttl grid so rolling windows share a key.
    private alignIncomeRange(range: TimeRange): TimeRange {
        const step = this.config.ttl.incomeMs;
        return {
            startTime: Math.floor(range.startTime / step) * step,
            endTime: Math.ceil(range.endTime / step) * step
        };
    }
}

function describeKeys<T>(coordinator: RefreshCoordinator<T>): DatasetHealth[] {
    return coordinator.keys().map(key => {
        const { lastError, ...health } = coordinator.health(key);
        return {
            ...health,
            key,
            lastSuccess: health.lastSuccessAt !== null ? new Date(health.lastSuccessAt).toISOString() : null,
            lastErrorKind: lastError ? lastError.kind : null,
            lastErrorMessage: lastError ? describeError(lastError) : null
        };
    });
}

export function logAccountMetrics(result: DatasetResult<DerivedMetrics>): void {
    if (result.status === 'unavailable') {
        console.warn(`Account metrics unavailable: ${result.reason}`);
        return;
    }
    const metrics = result.data;
    const currency = metrics.baseCurrency;
    const freshness = result.status === 'stale' ? ` (stale, ${Math.round(result.ageMs / 1000)}s old)` : '';

    console.log(`\n========== ACCOUNT METRICS${freshness} ==========`);
    console.log(`• Total Equity: ${metrics.totalEquity.toFixed(2)} ${currency}`);
    console.log(`• Wallet Balance: ${metrics.walletBalance.toFixed(2)} ${currency}`);
    console.log(`• Unrealized PnL: ${metrics.unrealizedPnl.toFixed(2)} ${currency} (${metrics.pnlPercent.toFixed(2)}%)`);
    console.log(`• Margin Ratio: ${(metrics.marginRatio * 100).toFixed(2)}%${metrics.elevatedRisk ? ' (ELEVATED)' : ''}`);
    console.log(`• Effective Leverage: ${metrics.effectiveLeverage.toFixed(2)}x`);
    console.log(`• Open Positions: ${metrics.summary.longPositions} long / ${metrics.summary.shortPositions} short`);
    for (const position of metrics.positions) {
        console.log(`  - ${position.symbol} ${position.side} ${position.size} @ ${position.leverage}x: PnL ${position.unrealizedPnl.toFixed(2)} ${currency}, ROE ${position.roePercent.toFixed(2)}%, liq. distance ${position.liquidationDistancePercent.toFixed(2)}%, risk ${position.riskScore}`);
    }
    console.log('=====================================');
}

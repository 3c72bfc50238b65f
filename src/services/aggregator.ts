import { AccountSnapshot, Position, computeMarginRatio } from '../models/position.model';
import { IncomeRecord, TimeRange, Trade, isWithinRange } from '../models/history.model';
import {
    DerivedMetrics,
    IncomeSummary,
    LeverageRisk,
    PerformanceMetrics,
    PositionMetrics,
    PositionsSummary,
    SizeRisk,
    TradingStatistics,
    TradingTotals
} from '../models/metrics.model';

// Pure functions over already-fetched data. No I/O, no caching.

type PositionLike = Pick<Position, 'positionAmount' | 'entryPrice' | 'markPrice' | 'leverage' | 'unrealizedPnl'>;

export const DEFAULT_LEVERAGE_BUCKETS: readonly number[] = [2, 5, 10, 20];

const LEVERAGE_RISK_SCORES: Record<LeverageRisk, number> = { low: 1, medium: 2, high: 3, 'very-high': 4 };
const SIZE_RISK_SCORES: Record<SizeRisk, number> = { low: 1, medium: 2, high: 3 };
const HIGH_SIZE_NOTIONAL = 10000;
const MEDIUM_SIZE_NOTIONAL = 5000;
const TRADING_DAYS_PER_YEAR = 365;

export function computeTotalEquity(walletBalance: number, positions: ReadonlyArray<Pick<Position, 'unrealizedPnl'>>): number {
    return positions.reduce((sum, position) => sum + position.unrealizedPnl, walletBalance);
}

// Unrealized P&L against the wallet balance it was earned on, in percent.
export function computePnlPercent(unrealizedPnl: number, walletBalance: number): number {
    if (walletBalance <= 0) return 0;
    return (unrealizedPnl / walletBalance) * 100;
}

export function isElevatedRisk(marginRatio: number, threshold: number): boolean {
    return marginRatio > threshold;
}

export function computeNotional(position: Pick<Position, 'positionAmount' | 'markPrice'>): number {
    return Math.abs(position.positionAmount) * position.markPrice;
}

export function computePositionMargin(position: Pick<Position, 'positionAmount' | 'entryPrice' | 'leverage'>): number {
    if (position.leverage <= 0) return 0;
    return (position.entryPrice * Math.abs(position.positionAmount)) / position.leverage;
}

/**
 * Return on the initial margin, in percent. Unrealized P&L already carries
 * the direction of the position (a short gaining on a falling mark is
 * positive), so the sign follows the side without further adjustment.
 */
export function computePositionRoe(position: PositionLike): number {
    const margin = computePositionMargin(position);
    if (margin === 0) return 0;
    return (position.unrealizedPnl / margin) * 100;
}

export function computeLiquidationDistance(markPrice: number, liquidationPrice: number): number {
    if (liquidationPrice <= 0 || markPrice <= 0) return 0;
    return (Math.abs(markPrice - liquidationPrice) / markPrice) * 100;
}

export function classifyLeverage(leverage: number): LeverageRisk {
    if (leverage <= 2) return 'low';
    if (leverage <= 5) return 'medium';
    if (leverage <= 10) return 'high';
    return 'very-high';
}

export function classifyPositionSize(notional: number): SizeRisk {
    if (notional >= HIGH_SIZE_NOTIONAL) return 'high';
    if (notional >= MEDIUM_SIZE_NOTIONAL) return 'medium';
    return 'low';
}

export function computeRiskScore(leverageRisk: LeverageRisk, sizeRisk: SizeRisk): number {
    return LEVERAGE_RISK_SCORES[leverageRisk] + SIZE_RISK_SCORES[sizeRisk];
}

export function leverageBucketLabels(bounds: readonly number[] = DEFAULT_LEVERAGE_BUCKETS): string[] {
    const labels = bounds.map((bound, i) => `${i === 0 ? 1 : bounds[i - 1]}-${bound}x`);
    labels.push(`${bounds.length > 0 ? bounds[bounds.length - 1] : 1}x+`);
    return labels;
}

/**
 * Aggregate notional per leverage bucket. Upper bounds are inclusive; anything
 * above the last bound lands in the open-ended bucket. Every bucket is present
 * in the result, empty ones at 0.
 */
export function computeLeverageDistribution(
    positions: ReadonlyArray<Pick<Position, 'positionAmount' | 'markPrice' | 'leverage'>>,
    bounds: readonly number[] = DEFAULT_LEVERAGE_BUCKETS
): Record<string, number> {
    const labels = leverageBucketLabels(bounds);
    const distribution: Record<string, number> = {};
    for (const label of labels) distribution[label] = 0;

    for (const position of positions) {
        const index = bounds.findIndex(bound => position.leverage <= bound);
        const label = labels[index === -1 ? labels.length - 1 : index];
        distribution[label] += computeNotional(position);
    }
    return distribution;
}

export function summarizePositions(positions: ReadonlyArray<Position>): PositionsSummary {
    if (positions.length === 0) {
        return { longPositions: 0, shortPositions: 0, totalNotional: 0, totalUnrealizedPnl: 0, averageLeverage: 0 };
    }
    return {
        longPositions: positions.filter(position => position.side === 'LONG').length,
        shortPositions: positions.filter(position => position.side === 'SHORT').length,
        totalNotional: positions.reduce((sum, position) => sum + computeNotional(position), 0),
        totalUnrealizedPnl: positions.reduce((sum, position) => sum + position.unrealizedPnl, 0),
        averageLeverage: positions.reduce((sum, position) => sum + position.leverage, 0) / positions.length
    };
}

export function computePositionMetrics(position: Position): PositionMetrics {
    const notionalValue = computeNotional(position);
    const leverageRisk = classifyLeverage(position.leverage);
    const sizeRisk = classifyPositionSize(notionalValue);
    return {
        symbol: position.symbol,
        side: position.side,
        size: Math.abs(position.positionAmount),
        notionalValue,
        margin: computePositionMargin(position),
        roePercent: computePositionRoe(position),
        liquidationDistancePercent: computeLiquidationDistance(position.markPrice, position.liquidationPrice),
        leverage: position.leverage,
        leverageRisk,
        sizeRisk,
        riskScore: computeRiskScore(leverageRisk, sizeRisk),
        unrealizedPnl: position.unrealizedPnl,
        marginMode: position.marginMode
    };
}

export interface DeriveOptions {
    marginRatioAlertThreshold: number;
    leverageBuckets?: readonly number[];
    baseCurrency: string;
}

export function deriveMetrics(
    snapshot: Pick<AccountSnapshot, 'walletBalance' | 'maintenanceMargin' | 'marginBalance' | 'asOf'>,
    positions: ReadonlyArray<Position>,
    options: DeriveOptions
): DerivedMetrics {
    const totalEquity = computeTotalEquity(snapshot.walletBalance, positions);
    const summary = summarizePositions(positions);
    const marginRatio = computeMarginRatio(snapshot.maintenanceMargin, snapshot.marginBalance);

    return {
        totalEquity,
        walletBalance: snapshot.walletBalance,
        unrealizedPnl: summary.totalUnrealizedPnl,
        pnlPercent: computePnlPercent(summary.totalUnrealizedPnl, snapshot.walletBalance),
        marginRatio,
        elevatedRisk: isElevatedRisk(marginRatio, options.marginRatioAlertThreshold),
        effectiveLeverage: totalEquity > 0 ? summary.totalNotional / totalEquity : 0,
        positions: positions
            .map(computePositionMetrics)
            .sort((a, b) => Math.abs(b.unrealizedPnl) - Math.abs(a.unrealizedPnl)),
        summary,
        leverageDistribution: computeLeverageDistribution(positions, options.leverageBuckets),
        baseCurrency: options.baseCurrency,
        asOf: snapshot.asOf
    };
}

function emptyTotals(): TradingTotals {
    return { volume: 0, commission: 0, count: 0, realizedPnl: 0 };
}

function utcDay(time: number): string {
    return new Date(time).toISOString().slice(0, 10);
}

function addTrade(stats: TradingTotals, trade: Trade): void {
    stats.volume += trade.price * trade.quantity;
    stats.commission += trade.commission;
    stats.count += 1;
    stats.realizedPnl += trade.realizedPnl;
}

/**
 * Volume (price × quantity), commission, count and realized P&L over the
 * trades inside `range`, optionally for one symbol, broken down per symbol
 * and per UTC day. An empty window yields zeros.
 */
export function computeTradingStatistics(trades: ReadonlyArray<Trade>, range: TimeRange, symbol?: string): TradingStatistics {
    const totals = emptyTotals();
    const bySymbol: Record<string, TradingTotals> = {};
    const byDay: Record<string, TradingTotals> = {};
    let quantity = 0;

    for (const trade of trades) {
        if (!isWithinRange(trade.time, range)) continue;
        if (symbol !== undefined && trade.symbol !== symbol) continue;
        addTrade(totals, trade);
        addTrade(bySymbol[trade.symbol] ?? (bySymbol[trade.symbol] = emptyTotals()), trade);
        const day = utcDay(trade.time);
        addTrade(byDay[day] ?? (byDay[day] = emptyTotals()), trade);
        quantity += trade.quantity;
    }

    return {
        ...totals,
        averageTradeSize: totals.count > 0 ? quantity / totals.count : 0,
        bySymbol,
        byDay
    };
}

/**
 * Mean over sample standard deviation of per-trade realized P&L, scaled by
 * √365 as if each closing trade were one day's return. 0 with fewer than two
 * returns or no dispersion.
 */
export function computeSharpeRatio(returns: ReadonlyArray<number>): number {
    if (returns.length < 2) return 0;
    const mean = returns.reduce((sum, value) => sum + value, 0) / returns.length;
    const variance = returns.reduce((sum, value) => sum + (value - mean) ** 2, 0) / (returns.length - 1);
    const deviation = Math.sqrt(variance);
    if (deviation === 0) return 0;
    return (mean / deviation) * Math.sqrt(TRADING_DAYS_PER_YEAR);
}

/**
 * Win/loss profile over trades that closed something (non-zero realized P&L).
 * Profit factor is Infinity when there are wins and no losses.
 */
export function computePerformanceMetrics(trades: ReadonlyArray<Trade>): PerformanceMetrics {
    const closed = trades.map(trade => trade.realizedPnl).filter(pnl => pnl !== 0);
    const wins = closed.filter(pnl => pnl > 0);
    const losses = closed.filter(pnl => pnl < 0);
    const totalWins = wins.reduce((sum, pnl) => sum + pnl, 0);
    const totalLosses = Math.abs(losses.reduce((sum, pnl) => sum + pnl, 0));

    let profitFactor = 0;
    if (totalLosses > 0) profitFactor = totalWins / totalLosses;
    else if (totalWins > 0) profitFactor = Infinity;

    return {
        winRate: closed.length > 0 ? (wins.length / closed.length) * 100 : 0,
        profitFactor,
        averageWin: wins.length > 0 ? totalWins / wins.length : 0,
        averageLoss: losses.length > 0 ? -totalLosses / losses.length : 0,
        largestWin: wins.length > 0 ? Math.max(...wins) : 0,
        largestLoss: losses.length > 0 ? Math.min(...losses) : 0,
        closedTrades: closed.length,
        sharpeRatio: computeSharpeRatio(closed)
    };
}

export function summarizeIncome(records: ReadonlyArray<IncomeRecord>, range: TimeRange): IncomeSummary {
    const summary: IncomeSummary = { total: 0, byType: {}, byDay: {}, count: 0 };
    for (const record of records) {
        if (!isWithinRange(record.time, range)) continue;
        const day = utcDay(record.time);
        summary.total += record.amount;
        summary.byType[record.type] = (summary.byType[record.type] ?? 0) + record.amount;
        summary.byDay[day] = (summary.byDay[day] ?? 0) + record.amount;
        summary.count += 1;
    }
    return summary;
}

import type { MarginMode, PositionSide } from './position.model';

export type LeverageRisk = 'low' | 'medium' | 'high' | 'very-high';
export type SizeRisk = 'low' | 'medium' | 'high';

export interface PositionMetrics {
    symbol: string;
    side: PositionSide;
    size: number;
    notionalValue: number;
    margin: number;
    roePercent: number;
    liquidationDistancePercent: number;
    leverage: number;
    leverageRisk: LeverageRisk;
    sizeRisk: SizeRisk;
    // Leverage score (1-4) plus size score (1-3).
    riskScore: number;
    unrealizedPnl: number;
    marginMode: MarginMode;
}

export interface PositionsSummary {
    longPositions: number;
    shortPositions: number;
    totalNotional: number;
    totalUnrealizedPnl: number;
    averageLeverage: number;
}

// Recomputed from the snapshot and positions on every read, never cached.
export interface DerivedMetrics {
    totalEquity: number;
    walletBalance: number;
    unrealizedPnl: number;
    // Unrealized P&L as a percentage of the wallet balance.
    pnlPercent: number;
    marginRatio: number;
    elevatedRisk: boolean;
    // totalNotional / totalEquity
    effectiveLeverage: number;
    positions: PositionMetrics[];
    summary: PositionsSummary;
    leverageDistribution: Record<string, number>;
    baseCurrency: string;
    asOf: number;
}

export interface TradingTotals {
    volume: number;
    commission: number;
    count: number;
    realizedPnl: number;
}

export interface TradingStatistics extends TradingTotals {
    // Mean quantity per trade.
    averageTradeSize: number;
    bySymbol: Record<string, TradingTotals>;
    // Keyed by UTC date, YYYY-MM-DD.
    byDay: Record<string, TradingTotals>;
}

export interface PerformanceMetrics {
    winRate: number;
    profitFactor: number;
    averageWin: number;
    averageLoss: number;
    largestWin: number;
    largestLoss: number;
    closedTrades: number;
    sharpeRatio: number;
}

export interface IncomeSummary {
    total: number;
    byType: Record<string, number>;
    // Keyed by UTC date, YYYY-MM-DD.
    byDay: Record<string, number>;
    count: number;
}

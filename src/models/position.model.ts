export type PositionSide = 'LONG' | 'SHORT';
export type MarginMode = 'CROSS' | 'ISOLATED';

export interface Position {
    symbol: string;
    side: PositionSide;
    // Signed, as reported by the exchange: negative for shorts.
    positionAmount: number;
    entryPrice: number;
    markPrice: number;
    leverage: number;
    liquidationPrice: number;
    unrealizedPnl: number;
    marginMode: MarginMode;
    updatedAt: number;
}

export interface AssetBalance {
    asset: string;
    walletBalance: number;
    unrealizedPnl: number;
    marginBalance: number;
    availableBalance: number;
}

/**
 * Account-wide balances at `asOf`. Replaced wholesale on every refresh.
 */
export interface AccountSnapshot {
    walletBalance: number;
    availableBalance: number;
    unrealizedPnl: number;
    marginBalance: number;
    maintenanceMargin: number;
    initialMargin: number;
    // maintenanceMargin / marginBalance, as a fraction.
    marginRatio: number;
    assets: AssetBalance[];
    asOf: number;
}

/**
 * Maintenance margin over margin balance, as a fraction. 0 when there is no
 * margin balance to measure against.
 */
export function computeMarginRatio(maintenanceMargin: number, marginBalance: number): number {
    if (marginBalance <= 0) return 0;
    return maintenanceMargin / marginBalance;
}

export interface PositionFilter {
    symbol?: string;
    side?: PositionSide;
    marginMode?: MarginMode;
}

export type TradeSide = 'BUY' | 'SELL';

export interface Trade {
    // Exchange trade id, non-decreasing per symbol.
    id: number;
    orderId: number;
    symbol: string;
    side: TradeSide;
    price: number;
    quantity: number;
    quoteQuantity: number;
    commission: number;
    commissionAsset: string;
    realizedPnl: number;
    time: number;
}

export const INCOME_TYPES = [
    'TRANSFER',
    'WELCOME_BONUS',
    'REALIZED_PNL',
    'FUNDING_FEE',
    'COMMISSION',
    'INSURANCE_CLEAR',
    'REFERRAL_KICKBACK',
    'COMMISSION_REBATE',
    'API_REBATE',
    'CONTEST_REWARD',
    'CROSS_COLLATERAL_TRANSFER',
    'OPTIONS_PREMIUM_FEE',
    'OPTIONS_SETTLE_PROFIT',
    'INTERNAL_TRANSFER',
    'AUTO_EXCHANGE',
    'DELIVERED_SETTELMENT',
    'COIN_SWAP_DEPOSIT',
    'COIN_SWAP_WITHDRAW',
    'POSITION_LIMIT_INCREASE_FEE',
] as const;

export type IncomeType = typeof INCOME_TYPES[number];

export interface IncomeRecord {
    transactionId: number;
    // Empty for account-level income such as transfers.
    symbol: string;
    type: string;
    amount: number;
    asset: string;
    info: string;
    tradeId: string;
    time: number;
}

/**
 * Inclusive millisecond range.
 */
export interface TimeRange {
    startTime: number;
    endTime: number;
}

export function isWithinRange(time: number, range: TimeRange): boolean {
    return time >= range.startTime && time <= range.endTime;
}

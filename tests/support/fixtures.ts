import { parseConfig, FrozenConfig } from '../../src/config';
import { Position } from '../../src/models/position.model';
import { Trade } from '../../src/models/history.model';

export const TEST_ENV = {
    BINANCE_API_KEY: 'test-key',
    BINANCE_API_SECRET: 'test-secret'
};

export function testConfig(overrides: Record<string, string> = {}): FrozenConfig {
    return parseConfig({ ...TEST_ENV, ...overrides });
}

export function accountPayload(overrides: Record<string, unknown> = {}) {
    return {
        totalWalletBalance: '1000.00',
        totalUnrealizedProfit: '50.00',
        totalMarginBalance: '1050.00',
        totalMaintMargin: '21.00',
        totalInitialMargin: '300.00',
        availableBalance: '750.00',
        assets: [
            { asset: 'USDT', walletBalance: '1000.00', unrealizedProfit: '50.00', marginBalance: '1050.00', availableBalance: '750.00' },
            { asset: 'BNB', walletBalance: '0', unrealizedProfit: '0', marginBalance: '0', availableBalance: '0' }
        ],
        ...overrides
    };
}

export function positionRow(overrides: Record<string, unknown> = {}) {
    return {
        symbol: 'BTCUSDT',
        positionAmt: '0.500',
        entryPrice: '40000.0',
        markPrice: '40100.0',
        unRealizedProfit: '50.00',
        liquidationPrice: '36000.0',
        leverage: '10',
        marginType: 'cross',
        positionSide: 'BOTH',
        updateTime: 1699999990000,
        ...overrides
    };
}

export function tradeRow(id: number, overrides: Record<string, unknown> = {}) {
    return {
        symbol: 'BTCUSDT',
        id,
        orderId: id * 10,
        side: 'BUY',
        price: '40000',
        qty: '0.010',
        quoteQty: '400',
        commission: '0.16',
        commissionAsset: 'USDT',
        realizedPnl: '0',
        time: 1699999000000 + id * 1000,
        ...overrides
    };
}

export function incomeRow(tranId: number, time: number, overrides: Record<string, unknown> = {}) {
    return {
        symbol: 'BTCUSDT',
        incomeType: 'FUNDING_FEE',
        income: '-0.25',
        asset: 'USDT',
        info: 'FUNDING_FEE',
        time,
        tranId,
        tradeId: '',
        ...overrides
    };
}

export function position(overrides: Partial<Position> = {}): Position {
    return {
        symbol: 'BTCUSDT',
        side: 'LONG',
        positionAmount: 1,
        entryPrice: 100,
        markPrice: 100,
        leverage: 5,
        liquidationPrice: 0,
        unrealizedPnl: 0,
        marginMode: 'CROSS',
        updatedAt: 0,
        ...overrides
    };
}

export function trade(id: number, overrides: Partial<Trade> = {}): Trade {
    return {
        id,
        orderId: id,
        symbol: 'BTCUSDT',
        side: 'BUY',
        price: 100,
        quantity: 1,
        quoteQuantity: 100,
        commission: 0,
        commissionAsset: 'USDT',
        realizedPnl: 0,
        time: id * 1000,
        ...overrides
    };
}

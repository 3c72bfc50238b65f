import { z } from 'zod';
import { AccountSnapshot, MarginMode, Position, PositionSide, computeMarginRatio } from '../models/position.model';
import { IncomeRecord, Trade } from '../models/history.model';

// The exchange sends most numbers as decimal strings.
const decimal = z.coerce.number().finite();
const millis = z.coerce.number().int().nonnegative();

export const errorBodySchema = z.object({
    code: z.number(),
    msg: z.string()
});

export const serverTimeSchema = z.object({
    serverTime: millis
});

const accountAssetSchema = z.object({
    asset: z.string(),
    walletBalance: decimal,
    unrealizedProfit: decimal,
    marginBalance: decimal,
    availableBalance: decimal
});

export const accountSchema = z.object({
    totalWalletBalance: decimal,
    totalUnrealizedProfit: decimal,
    totalMarginBalance: decimal,
    totalMaintMargin: decimal,
    totalInitialMargin: decimal,
    availableBalance: decimal,
    assets: z.array(accountAssetSchema).default([])
});

export const positionRiskSchema = z.array(z.object({
    symbol: z.string(),
    positionAmt: decimal,
    entryPrice: decimal,
    markPrice: decimal,
    unRealizedProfit: decimal,
    liquidationPrice: decimal,
    leverage: decimal,
    marginType: z.string(),
    positionSide: z.enum(['BOTH', 'LONG', 'SHORT']).default('BOTH'),
    updateTime: millis.default(0)
}));

export const userTradesSchema = z.array(z.object({
    symbol: z.string(),
    id: z.number().int(),
    orderId: z.number().int(),
    side: z.enum(['BUY', 'SELL']),
    price: decimal,
    qty: decimal,
    quoteQty: decimal,
    commission: decimal,
    commissionAsset: z.string(),
    realizedPnl: decimal,
    time: millis
}));

export const incomeSchema = z.array(z.object({
    symbol: z.string().default(''),
    incomeType: z.string(),
    income: decimal,
    asset: z.string(),
    info: z.string().default(''),
    time: millis,
    tranId: z.coerce.number().int(),
    tradeId: z.union([z.string(), z.number()]).default('').transform(String)
}));

export function toAccountSnapshot(raw: z.infer<typeof accountSchema>, asOf: number): AccountSnapshot {
    return {
        walletBalance: raw.totalWalletBalance,
        availableBalance: raw.availableBalance,
        unrealizedPnl: raw.totalUnrealizedProfit,
        marginBalance: raw.totalMarginBalance,
        maintenanceMargin: raw.totalMaintMargin,
        initialMargin: raw.totalInitialMargin,
        marginRatio: computeMarginRatio(raw.totalMaintMargin, raw.totalMarginBalance),
        assets: raw.assets
            .filter(asset => asset.walletBalance !== 0 || asset.unrealizedProfit !== 0)
            .map(asset => ({
                asset: asset.asset,
                walletBalance: asset.walletBalance,
                unrealizedPnl: asset.unrealizedProfit,
                marginBalance: asset.marginBalance,
                availableBalance: asset.availableBalance
            })),
        asOf
    };
}

/**
 * Zero-size rows (symbols the account has touched but holds nothing in) are
 * dropped. In one-way mode the side comes from the sign of the amount.
 */
export function toPositions(raw: z.infer<typeof positionRiskSchema>, fallbackTime: number): Position[] {
    return raw
        .filter(pos => pos.positionAmt !== 0)
        .map(pos => {
            const side: PositionSide = pos.positionSide === 'BOTH'
                ? (pos.positionAmt > 0 ? 'LONG' : 'SHORT')
                : pos.positionSide;
            const marginMode: MarginMode = pos.marginType.toLowerCase() === 'isolated' ? 'ISOLATED' : 'CROSS';
            return {
                symbol: pos.symbol,
                side,
                positionAmount: pos.positionAmt,
                entryPrice: pos.entryPrice,
                markPrice: pos.markPrice,
                leverage: pos.leverage,
                liquidationPrice: pos.liquidationPrice,
                unrealizedPnl: pos.unRealizedProfit,
                marginMode,
                updatedAt: pos.updateTime > 0 ? pos.updateTime : fallbackTime
            };
        });
}

export function toTrades(raw: z.infer<typeof userTradesSchema>): Trade[] {
    return raw.map(trade => ({
        id: trade.id,
        orderId: trade.orderId,
        symbol: trade.symbol,
        side: trade.side,
        price: trade.price,
        quantity: trade.qty,
        quoteQuantity: trade.quoteQty,
        commission: trade.commission,
        commissionAsset: trade.commissionAsset,
        realizedPnl: trade.realizedPnl,
        time: trade.time
    }));
}

export function toIncomeRecords(raw: z.infer<typeof incomeSchema>): IncomeRecord[] {
    return raw.map(record => ({
        transactionId: record.tranId,
        symbol: record.symbol,
        type: record.incomeType,
        amount: record.income,
        asset: record.asset,
        info: record.info,
        tradeId: record.tradeId,
        time: record.time
    }));
}

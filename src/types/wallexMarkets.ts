import { z } from 'zod';
import { NumericOrEmptySchema, envelope } from './wallexBase.js';

// percentage split of recent trades, e.g. { "SELL": 51, "BUY": 49 }
export const DirectionSchema = z.object({
    SELL: z.number(),
    BUY: z.number()
});
export type Direction = z.infer<typeof DirectionSchema>;

/**
 * 24h and 7d market statistics. Prices and volumes arrive as number strings,
 * percentage changes as numbers (or "-" when there were no trades).
 */
export const StatsSchema = z.object({
    bidPrice: z.string().nullish(),
    askPrice: z.string().nullish(),
    '24h_ch': NumericOrEmptySchema,
    '7d_ch': NumericOrEmptySchema,
    '24h_volume': z.string().nullish(),
    '7d_volume': z.string().nullish(),
    '24h_quoteVolume': z.string().nullish(),
    '24h_highPrice': z.string().nullish(),
    '24h_lowPrice': z.string().nullish(),
    lastPrice: z.string().nullish(),
    lastQty: z.string().nullish(),
    lastTradeSide: z.string().nullish(),
    bidVolume: z.string().nullish(),
    askVolume: z.string().nullish(),
    bidCount: z.number().nullish(),
    askCount: z.number().nullish(),
    direction: DirectionSchema.nullish()
}).passthrough();
export type Stats = z.infer<typeof StatsSchema>;

export const SymbolInfoSchema = z.object({
    symbol: z.string(),
    baseAsset: z.string(),
    baseAssetPrecision: z.number().optional(),
    quoteAsset: z.string(),
    quotePrecision: z.number().optional(),
    faName: z.string().optional(),
    faBaseAsset: z.string().optional(),
    faQuoteAsset: z.string().optional(),
    stepSize: z.number().optional(),
    tickSize: z.number().optional(),
    minQty: NumericOrEmptySchema,
    minNotional: NumericOrEmptySchema,
    stats: StatsSchema.optional(),
    createdAt: z.string().optional()
}).passthrough();
export type SymbolInfo = z.infer<typeof SymbolInfoSchema>;

export const MarketInformationSchema = envelope(z.object({
    symbols: z.record(SymbolInfoSchema)
}).passthrough());
export type MarketInformation = z.infer<typeof MarketInformationSchema>;

// one price level; Wallex sends price/quantity as numbers and sum as a number string
export const OrderLevelSchema = z.object({
    price: z.coerce.number(),
    quantity: z.coerce.number(),
    sum: z.coerce.string()
});
export type OrderLevel = z.infer<typeof OrderLevelSchema>;

export const OrderBookSchema = z.object({
    ask: z.array(OrderLevelSchema),
    bid: z.array(OrderLevelSchema)
});
export type OrderBook = z.infer<typeof OrderBookSchema>;

export const DepthSchema = envelope(OrderBookSchema);
export type Depth = z.infer<typeof DepthSchema>;

export const AllDepthsSchema = envelope(z.record(OrderBookSchema));
export type AllDepths = z.infer<typeof AllDepthsSchema>;

export const TradeSchema = z.object({
    symbol: z.string(),
    quantity: z.string(),
    price: z.string(),
    sum: z.string(),
    isBuyOrder: z.boolean(),
    timestamp: z.string()
});
export type Trade = z.infer<typeof TradeSchema>;

export const TradesSchema = envelope(z.object({
    latestTrades: z.array(TradeSchema)
}));
export type Trades = z.infer<typeof TradesSchema>;

import { z } from 'zod';
import { OrderSideSchema, OrderTypeSchema, envelope, isRecord } from './wallexBase.js';

export const BalanceSchema = z.object({
    asset: z.string(),
    faName: z.string().optional(),
    fiat: z.boolean().optional(),
    value: z.string(),
    locked: z.string()
});
export type Balance = z.infer<typeof BalanceSchema>;

export const BalancesSchema = z.object({
    balances: z.record(BalanceSchema)
});
export type Balances = z.infer<typeof BalancesSchema>;

// balances have been seen under both `result` and `results`
export const WalletsSchema = z.preprocess(
    (raw) => (isRecord(raw) && raw.result === undefined && raw.results !== undefined
        ? { ...raw, result: raw.results }
        : raw),
    envelope(BalancesSchema)
);
export type Wallets = z.infer<typeof WalletsSchema>;

/**
 * A user order as returned by create-order, open-orders and order-status.
 * Prices, quantities and sums are number strings.
 */
export const BaseOrderSchema = z.object({
    symbol: z.string(),
    type: z.string(),
    side: z.string(),
    price: z.string().nullish(),
    origQty: z.string(),
    origSum: z.string().nullish(),
    executedPrice: z.string().nullish(),
    executedQty: z.string(),
    executedSum: z.string().nullish(),
    executedPercent: z.coerce.number(),
    status: z.string(),
    active: z.boolean(),
    clientOrderId: z.string(),
    created_at: z.string().optional()
}).passthrough();
export type BaseOrder = z.infer<typeof BaseOrderSchema>;

export const BaseOrderResponseSchema = envelope(BaseOrderSchema);
export type BaseOrderResponse = z.infer<typeof BaseOrderResponseSchema>;

export const CreateOrderParamsSchema = z.object({
    symbol: z.string().min(1),
    type: OrderTypeSchema,
    side: OrderSideSchema,
    price: z.string().min(1).optional(),
    quantity: z.string().min(1),
    clientOrderId: z.string().min(1).max(64).optional()
}).refine((v) => v.type === 'MARKET' || v.price !== undefined, {
    message: 'price is required for LIMIT orders',
    path: ['price']
});
export type CreateOrderParams = z.infer<typeof CreateOrderParamsSchema>;

export const OpenOrdersResponseSchema = envelope(z.object({
    orders: z.array(BaseOrderSchema)
}));
export type OpenOrdersResponse = z.infer<typeof OpenOrdersResponseSchema>;

export const CancelOrderSchema = z.object({
    symbol: z.string(),
    type: z.string(),
    side: z.string(),
    clientOrderId: z.string(),
    price: z.string().nullish(),
    origQty: z.string(),
    origSum: z.string().nullish(),
    executedSum: z.string().nullish(),
    executedQty: z.string(),
    executedPrice: z.string().nullish(),
    sum: z.string().nullish(),
    fee: z.string().nullish(),
    executedPercent: z.coerce.number().optional(),
    status: z.string(),
    active: z.boolean(),
    fills: z.array(z.unknown()).default([]),
    transactTime: z.number().optional(),
    created_at: z.string().optional(),
    updated_at: z.string().optional()
}).passthrough();
export type CancelOrder = z.infer<typeof CancelOrderSchema>;

export const CancelOrderResponseSchema = envelope(CancelOrderSchema);
export type CancelOrderResponse = z.infer<typeof CancelOrderResponseSchema>;

// both filters optional; empty ones are left out of the query string
export const UserTradesParamsSchema = z.object({
    symbol: z.string().optional(),
    side: OrderSideSchema.optional()
});
export type UserTradesParams = z.infer<typeof UserTradesParamsSchema>;

export const UserTradeSchema = z.object({
    symbol: z.string(),
    quantity: z.string(),
    price: z.string(),
    sum: z.string(),
    fee: z.string(),
    feeCoefficient: z.string(),
    feeAsset: z.string(),
    isBuyer: z.boolean(),
    timestamp: z.string()
});
export type UserTrade = z.infer<typeof UserTradeSchema>;

export const UserTradesResponseSchema = envelope(z.object({
    accountLatestTrades: z.array(UserTradeSchema)
}));
export type UserTradesResponse = z.infer<typeof UserTradesResponseSchema>;

import { z } from 'zod';

/**
 * Number field that Wallex sometimes sends as a number string or as "-".
 * Numbers and numeric strings parse; anything else becomes 0.
 */
export const NumericOrEmptySchema = z.unknown().transform((v): number => {
    if (typeof v === 'number' && Number.isFinite(v)) return v;
    if (typeof v === 'string' && v.trim() !== '' && v !== '-') {
        const parsed = Number(v);
        return Number.isFinite(parsed) ? parsed : 0;
    }
    return 0;
});
export type NumericOrEmpty = z.infer<typeof NumericOrEmptySchema>;

/** Success envelope shared by every endpoint: `{ success, message?, result }`. */
export function envelope<T extends z.ZodTypeAny>(result: T) {
    return z.object({
        success: z.boolean(),
        message: z.string().nullish(),
        result
    }).passthrough();
}

export const BaseResponseSchema = envelope(z.unknown());
export type BaseResponse = z.infer<typeof BaseResponseSchema>;

// fields decode independently: a mistyped field is dropped, the rest survive.
// code is a 16-bit integer on the wire
export const ErrorResponseSchema = z.object({
    message: z.string().optional().catch(undefined),
    success: z.boolean().optional().catch(undefined),
    code: z.number().int().max(32767).optional().catch(undefined)
});
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

export const OrderSideSchema = z.enum(['BUY', 'SELL']);
export type OrderSide = z.infer<typeof OrderSideSchema>;

export const OrderTypeSchema = z.enum(['LIMIT', 'MARKET']);
export type OrderType = z.infer<typeof OrderTypeSchema>;

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

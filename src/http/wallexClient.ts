/**
 * WALLEX HTTP CLIENT
 *
 * Thin typed wrapper around the Wallex REST API.
 * - Public market data: markets, order books, recent trades
 * - Account endpoints (X-API-Key): balances, orders, private trades
 *
 * Every call performs exactly one request. Non-2xx responses become ApiError,
 * anything that stops a response from being classified becomes TransportError.
 * Success payloads are validated with Zod schemas.
 */

import createDebug from 'debug';
import { z } from 'zod';
import { toUrlParams } from '../lib/urlParams.js';
import { ApiError, ConfigurationError, TransportError, WallexError, normalizeErrorResponse } from './errors.js';
import { AllDepthsSchema, DepthSchema, MarketInformationSchema, TradesSchema } from '../types/wallexMarkets.js';
import type { AllDepths, Depth, MarketInformation, Trades } from '../types/wallexMarkets.js';
import {
    BaseOrderResponseSchema,
    CancelOrderResponseSchema,
    CreateOrderParamsSchema,
    OpenOrdersResponseSchema,
    UserTradesParamsSchema,
    UserTradesResponseSchema,
    WalletsSchema
} from '../types/wallexAccount.js';
import type {
    BaseOrderResponse,
    CancelOrderResponse,
    CreateOrderParams,
    OpenOrdersResponse,
    UserTradesParams,
    UserTradesResponse,
    Wallets
} from '../types/wallexAccount.js';

const log = createDebug('wallex:http');

export const BASE_URL = 'https://api.wallex.ir';
export const API_KEY_HEADER = 'X-API-Key';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';
export type ApiVersion = 'v1' | 'v2' | (string & {});

/** Anything shaped like the global fetch. */
export type Transport = (request: Request) => Promise<Response>;

type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export type ClientOptions = {
    baseUrl?: string;
    /** Replaces each endpoint's own version segment when set. */
    version?: string;
    transport?: Transport;
    /** Per-request timeout in ms; 0 disables it. */
    timeoutMs?: number;
    apiKey?: string;
};

const QUERY_METHODS: ReadonlySet<HttpMethod> = new Set(['GET', 'DELETE']);

export class WallexClient {
    readonly baseUrl: string;
    readonly version?: string;
    private readonly transport: Transport;
    private readonly timeoutMs: number;
    private readonly apiKey: string;

    constructor(opts: ClientOptions = {}) {
        this.baseUrl = (opts.baseUrl || BASE_URL).replace(/\/+$/, '');
        this.version = opts.version || undefined;
        this.transport = opts.transport ?? ((req) => fetch(req));
        this.timeoutMs = opts.timeoutMs ?? 0;
        this.apiKey = opts.apiKey ?? '';
    }

    createApiUri(endpoint: string, version: ApiVersion): string {
        return `${this.baseUrl}/${this.version ?? version}${endpoint}`;
    }

    request<T>(method: HttpMethod, url: string, auth: boolean, body: unknown, schema: ResponseSchema<T>): Promise<T>;
    request(method: HttpMethod, url: string, auth: boolean, body?: unknown): Promise<void>;
    async request<T>(method: HttpMethod, url: string, auth: boolean, body?: unknown, schema?: ResponseSchema<T>): Promise<T | void> {
        let target = url;
        let payload: string | undefined;

        if (QUERY_METHODS.has(method) && body !== undefined && body !== null) {
            let query: string;
            try {
                query = toUrlParams(body);
            } catch (e) {
                throw new TransportError('failed to convert parameters to URL params', 'preparing parameters', e);
            }
            if (query) target += (target.includes('?') ? '&' : '?') + query;
        }

        if (!QUERY_METHODS.has(method) && body !== undefined && body !== null) {
            try {
                payload = JSON.stringify(body);
            } catch (e) {
                throw new TransportError('failed to serialize request body', 'preparing body', e);
            }
        }

        const headers: Record<string, string> = {
            'Content-Type': 'application/json',
            'Accept': 'application/json'
        };

        if (auth) {
            if (!this.apiKey) throw new ConfigurationError('API key is required for authenticated endpoints');
            headers[API_KEY_HEADER] = this.apiKey;
        }

        let req: Request;
        try {
            req = new Request(target, {
                method,
                headers,
                body: payload,
                signal: this.timeoutMs > 0 ? AbortSignal.timeout(this.timeoutMs) : undefined
            });
        } catch (e) {
            throw new TransportError('failed to create request', 'creating request', e);
        }

        log('%s %s auth=%s', method, target, auth);

        let res: Response;
        try {
            res = await this.transport(req);
        } catch (e) {
            throw new TransportError('failed to send request', 'sending request', e);
        }

        let text: string;
        try {
            text = await res.text();
        } catch (e) {
            throw new TransportError('failed to read response body', 'reading response', e);
        }

        log('%s %s -> %d (%d bytes)', method, target, res.status, text.length);

        if (res.status < 200 || res.status > 299) {
            const apiErr = new ApiError(normalizeErrorResponse(res.status, text));
            log('api error %d: %s %O', apiErr.statusCode, apiErr.message, apiErr.fields);
            throw apiErr;
        }

        if (!schema) return;

        let json: unknown;
        try {
            json = JSON.parse(text);
        } catch (e) {
            throw new TransportError('failed to decode response', 'parsing response', e);
        }
        const parsed = schema.safeParse(json);
        if (!parsed.success) {
            throw new TransportError('response did not match the expected shape', 'parsing response', parsed.error);
        }
        return parsed.data;
    }

    apiRequest<T>(method: HttpMethod, endpoint: string, version: ApiVersion, auth: boolean, body: unknown, schema: ResponseSchema<T>): Promise<T>;
    apiRequest(method: HttpMethod, endpoint: string, version: ApiVersion, auth: boolean, body?: unknown): Promise<void>;
    async apiRequest<T>(method: HttpMethod, endpoint: string, version: ApiVersion, auth: boolean, body?: unknown, schema?: ResponseSchema<T>): Promise<T | void> {
        const url = this.createApiUri(endpoint, version);
        if (schema) return this.request(method, url, auth, body, schema);
        return this.request(method, url, auth, body);
    }

    /** GET /v1/markets: metadata and 24h/7d stats for every symbol. */
    async getMarketsInfo(): Promise<MarketInformation> {
        return this.apiRequest('GET', '/markets', 'v1', false, undefined, MarketInformationSchema);
    }

    /** GET /v1/depth?symbol= */
    async getOrderBook(symbol: string): Promise<Depth> {
        return this.apiRequest('GET', '/depth', 'v1', false, { symbol }, DepthSchema);
    }

    /** GET /v2/depth/all: order books keyed by symbol. */
    async getAllOrderBooks(): Promise<AllDepths> {
        return this.apiRequest('GET', '/depth/all', 'v2', false, undefined, AllDepthsSchema);
    }

    async getRecentTrades(symbol: string): Promise<Trades> {
        return this.apiRequest('GET', '/trades', 'v1', false, { symbol }, TradesSchema);
    }

    async getWallets(): Promise<Wallets> {
        return this.apiRequest('GET', '/account/balances', 'v1', true, undefined, WalletsSchema);
    }

    /**
     * POST /v1/account/orders
     *
     * `price` is required for LIMIT orders. Params are checked before the
     * request is built; a rejected order never reaches the network.
     */
    async createOrder(params: CreateOrderParams): Promise<BaseOrderResponse> {
        const checked = CreateOrderParamsSchema.safeParse(params);
        if (!checked.success) {
            throw new TransportError('invalid order parameters', 'preparing body', checked.error);
        }
        return this.apiRequest('POST', '/account/orders', 'v1', true, checked.data, BaseOrderResponseSchema);
    }

    /** DELETE /v1/account/orders?clientOrderId= */
    async cancelOrder(clientOrderId: string): Promise<CancelOrderResponse> {
        if (!clientOrderId) throw new WallexError('client order id is required for cancelling an order');
        return this.apiRequest('DELETE', '/account/orders', 'v1', true, { clientOrderId }, CancelOrderResponseSchema);
    }

    /** Open orders, optionally narrowed to one symbol. */
    async getOpenOrders(symbol?: string): Promise<OpenOrdersResponse> {
        return this.apiRequest('GET', '/account/openOrders', 'v1', true, { symbol }, OpenOrdersResponseSchema);
    }

    async getOrderStatus(clientOrderId: string): Promise<BaseOrderResponse> {
        if (!clientOrderId) throw new WallexError('client order id is required for getting order status');
        return this.apiRequest('GET', `/account/orders/${encodeURIComponent(clientOrderId)}`, 'v1', true, undefined, BaseOrderResponseSchema);
    }

    async getUserTrades(params: UserTradesParams = {}): Promise<UserTradesResponse> {
        const checked = UserTradesParamsSchema.safeParse(params);
        if (!checked.success) {
            throw new TransportError('invalid trade history filters', 'preparing parameters', checked.error);
        }
        return this.apiRequest('GET', '/account/trades', 'v1', true, checked.data, UserTradesResponseSchema);
    }
}

/**
 * CLIENT ERRORS
 *
 * Every failure raised by the client belongs to exactly one family:
 * - TransportError: no classified server outcome (encoding, network, body read, decode)
 * - ApiError: the server answered with a non-2xx status
 * - ConfigurationError: the call cannot be attempted with the current configuration
 *
 * ApiError instances are built by normalizeErrorResponse, which accepts any of
 * the error shapes Wallex is known to return:
 *
 *   { "success": false, "code": 1201, "message": "invalid API key format", "result": {} }
 *   { "detail": "missing required parameter" }
 *   { "message": "something went wrong" }
 *   { ...undocumented fields... }
 */

import { rawMember } from '../lib/rawJson.js';
import { ErrorResponseSchema, isRecord } from '../types/wallexBase.js';

export class WallexError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'WallexError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export type TransportStage =
    | 'preparing parameters'
    | 'preparing body'
    | 'creating request'
    | 'sending request'
    | 'reading response'
    | 'parsing response';

export class TransportError extends WallexError {
    constructor(message: string, readonly stage: TransportStage, cause: unknown) {
        super(`${message} (${stage}): ${describeCause(cause)}`, { cause });
        this.name = 'TransportError';
    }
}

export class ConfigurationError extends WallexError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export type ErrorFields = Readonly<Record<string, readonly string[]>>;

export interface NormalizedError {
    readonly statusCode: number;
    readonly message: string;
    readonly success: boolean;
    readonly code?: number;
    /** Raw `result` fragment or `detail` text, left uninterpreted. */
    readonly result?: string;
    readonly fields: ErrorFields;
}

export class ApiError extends WallexError implements NormalizedError {
    readonly statusCode: number;
    readonly success: boolean;
    readonly code?: number;
    readonly result?: string;
    readonly fields: ErrorFields;

    constructor(normalized: NormalizedError) {
        super(normalized.message);
        this.name = 'ApiError';
        this.statusCode = normalized.statusCode;
        this.success = normalized.success;
        this.code = normalized.code;
        this.result = normalized.result;
        this.fields = normalized.fields;
    }

    toJSON(): NormalizedError {
        return {
            statusCode: this.statusCode,
            message: this.message,
            success: this.success,
            code: this.code,
            result: this.result,
            fields: this.fields
        };
    }
}

type FieldValue =
    | { kind: 'text'; value: string }
    | { kind: 'list'; items: unknown[] }
    | { kind: 'scalar'; value: unknown };

function classify(value: unknown): FieldValue {
    if (typeof value === 'string') return { kind: 'text', value };
    if (Array.isArray(value)) return { kind: 'list', items: value };
    return { kind: 'scalar', value };
}

export function renderValue(value: unknown): string {
    if (typeof value === 'string') return value;
    if (value === null) return 'null';
    if (typeof value === 'object') return JSON.stringify(value);
    return String(value);
}

function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

export function normalizeErrorResponse(statusCode: number, body: string | Uint8Array): NormalizedError {
    const text = typeof body === 'string' ? body : new TextDecoder().decode(body);
    const payload = parseJson(text);
    const fields = new Map<string, string[]>();
    let message = '';
    let success = false;
    let code: number | undefined;
    let result: string | undefined;

    // documented envelope first; each field decodes on its own
    const envelope = ErrorResponseSchema.safeParse(payload);
    if (envelope.success) {
        const base = envelope.data;
        if (base.success !== undefined) success = base.success;
        if (base.code !== undefined && base.code > 0) {
            code = base.code;
            fields.set('code', [String(base.code)]);
        }
        if (base.message) {
            message = base.message;
            fields.set('message', [base.message]);
        }
        if (isRecord(payload) && Object.hasOwn(payload, 'result')) {
            result = rawMember(text, 'result');
        }
    }

    // then every top-level key, whatever its shape
    if (isRecord(payload)) {
        for (const [key, raw] of Object.entries(payload)) {
            const value = classify(raw);
            switch (value.kind) {
                case 'text':
                    fields.set(key, [value.value]);
                    if (key === 'detail') {
                        result = value.value;
                        if (!message) message = value.value;
                    }
                    break;
                case 'list':
                    fields.set(key, value.items.map(renderValue));
                    break;
                case 'scalar':
                    fields.set(key, [renderValue(value.value)]);
                    break;
            }
        }
    }

    if (!message) message = `API error (status ${statusCode})`;

    const frozen = new Map<string, readonly string[]>();
    for (const [key, values] of fields) frozen.set(key, Object.freeze(values));

    return Object.freeze({
        statusCode,
        message,
        success,
        code,
        result,
        fields: Object.freeze(Object.fromEntries(frozen))
    });
}

function describeCause(cause: unknown): string {
    if (cause instanceof Error) return cause.message;
    return renderValue(cause);
}

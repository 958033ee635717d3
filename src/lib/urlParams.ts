import { isRecord } from '../types/wallexBase.js';

type QueryScalar = string | number | boolean | bigint;

function isScalar(value: unknown): value is QueryScalar {
    return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint';
}

function isOmitted(value: unknown): boolean {
    return value === undefined || value === null || value === '';
}

/**
 * Flattens a flat request object into a query string (without the leading `?`).
 * Keys keep their own names and order; empty values are skipped and arrays
 * repeat the key. Nested objects are rejected.
 */
export function toUrlParams(payload: unknown): string {
    if (!isRecord(payload)) {
        throw new TypeError(`expected a plain object, got ${Array.isArray(payload) ? 'array' : typeof payload}`);
    }
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(payload)) {
        if (isOmitted(value)) continue;
        if (isScalar(value)) {
            params.append(key, String(value));
            continue;
        }
        if (Array.isArray(value)) {
            for (const item of value) {
                if (isOmitted(item)) continue;
                if (!isScalar(item)) throw new TypeError(`unsupported value in array field "${key}"`);
                params.append(key, String(item));
            }
            continue;
        }
        throw new TypeError(`unsupported value for field "${key}": ${typeof value}`);
    }
    return params.toString();
}

import { describe, it, expect } from 'vitest';
import { toUrlParams } from './urlParams.js';

describe('toUrlParams', () => {
    it('keeps field names and order', () => {
        expect(toUrlParams({ symbol: 'BTCUSDT', side: 'SELL', limit: 20, active: true })).toBe('symbol=BTCUSDT&side=SELL&limit=20&active=true');
    });

    it('skips empty values', () => {
        expect(toUrlParams({ symbol: '', side: undefined, note: null, page: 0 })).toBe('page=0');
        expect(toUrlParams({})).toBe('');
    });

    it('repeats the key for arrays', () => {
        expect(toUrlParams({ symbols: ['BTCUSDT', 'ETHUSDT'] })).toBe('symbols=BTCUSDT&symbols=ETHUSDT');
    });

    it('escapes values', () => {
        expect(toUrlParams({ clientOrderId: 'a b&c' })).toBe('clientOrderId=a+b%26c');
    });

    it('rejects nested objects and non-objects', () => {
        expect(() => toUrlParams({ filter: { side: 'BUY' } })).toThrow(TypeError);
        expect(() => toUrlParams({ list: [{ a: 1 }] })).toThrow(TypeError);
        expect(() => toUrlParams(['a'])).toThrow('expected a plain object, got array');
        expect(() => toUrlParams('symbol=BTC')).toThrow('expected a plain object, got string');
    });
});

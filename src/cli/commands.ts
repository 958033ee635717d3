import { ApiError, TransportError, WallexError } from '../http/errors.js';
import type { WallexClient } from '../http/wallexClient.js';

export type CommandHandler = (client: WallexClient, args: string[]) => Promise<unknown>;

function requireArg(args: string[], name: string): string {
    const v = args[0];
    if (!v) throw new WallexError(`missing argument <${name}>`);
    return v;
}

export const commands: Record<string, CommandHandler> = {
    'markets': async (c) => (await c.getMarketsInfo()).result,
    'depth': async (c, a) => (await c.getOrderBook(requireArg(a, 'SYMBOL').toUpperCase())).result,
    'depth-all': async (c) => (await c.getAllOrderBooks()).result,
    'trades': async (c, a) => (await c.getRecentTrades(requireArg(a, 'SYMBOL').toUpperCase())).result,
    'balances': async (c) => (await c.getWallets()).result,
    'open-orders': async (c, a) => (await c.getOpenOrders(a[0]?.toUpperCase())).result,
    'order-status': async (c, a) => (await c.getOrderStatus(requireArg(a, 'ID'))).result,
    'my-trades': async (c, a) => (await c.getUserTrades({ symbol: a[0]?.toUpperCase() })).result
};

export function formatError(err: unknown): string {
    if (err instanceof ApiError) {
        const lines = [`API error ${err.statusCode}: ${err.message}`];
        for (const [k, v] of Object.entries(err.fields)) lines.push(`  ${k}: ${v.join(', ')}`);
        return lines.join('\n');
    }
    if (err instanceof TransportError) return `request failed while ${err.stage}: ${err.message}`;
    if (err instanceof Error) return err.message;
    return String(err);
}

export function findCommand(name: string | undefined): CommandHandler | undefined {
    if (!name || !Object.hasOwn(commands, name)) return undefined;
    return commands[name];
}

#!/usr/bin/env node
/**
 * WALLEX CLI
 *
 * Usage: node dist/cli/wallex.js <command> [args]
 *
 *   markets                 all market metadata
 *   depth <SYMBOL>          order book for one market
 *   depth-all               order books for every market
 *   trades <SYMBOL>         recent public trades
 *   balances                account balances (needs WALLEX_API_KEY)
 *   open-orders [SYMBOL]    open orders
 *   order-status <ID>       one order by client order id
 *   my-trades [SYMBOL]      private trade history
 *
 * Prints the `result` of the response as JSON.
 */

import 'dotenv/config';
import createDebug from 'debug';
import { loadConfig } from '../config/index.js';
import { WallexClient } from '../http/wallexClient.js';
import { commands, findCommand, formatError } from './commands.js';

const log = createDebug('wallex:cli');

async function main(argv: string[]): Promise<number> {
    const [name, ...args] = argv;
    const handler = findCommand(name);
    if (!handler) {
        console.error(`usage: wallex <${Object.keys(commands).join('|')}> [args]`);
        return 2;
    }
    const client = new WallexClient(loadConfig());
    log('running %s %o', name, args);
    const result = await handler(client, args);
    console.log(JSON.stringify(result, null, 2));
    return 0;
}

main(process.argv.slice(2))
    .then((code) => { process.exitCode = code; })
    .catch((err: unknown) => {
        console.error(formatError(err));
        process.exitCode = 1;
    });

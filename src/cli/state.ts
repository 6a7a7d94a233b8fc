import { Exchange } from '../pool/Exchange.js';
import { isPoolError } from '../pool/errors.js';
import { storage } from '../storage/Storage.js';
import cli from '../utils/cli.js';

export function loadExchange(): Exchange {
    const exchange = new Exchange();
    const data = storage.loadState();
    if (data) exchange.loadFromData(data);
    return exchange;
}

/**
 * Print the failure and exit non-zero
 */
function fail(error: unknown): never {
    const message = error instanceof Error ? error.message : 'Unknown error';
    const title = isPoolError(error) ? `${cli.sym.error} ${error.code}` : undefined;
    console.log('');
    console.log(cli.errorBox(message, title));
    console.log('');
    process.exit(1);
}

/**
 * Run one read-only command against the persisted exchange
 */
export function readExchange(action: (exchange: Exchange) => void): void {
    try {
        action(loadExchange());
    } catch (error) {
        fail(error);
    }
}

/**
 * Run one command against the persisted exchange; state is written back
 * only when loading and the action both succeed.
 */
export function withExchange(action: (exchange: Exchange) => void): void {
    try {
        const exchange = loadExchange();
        action(exchange);
        storage.saveState(exchange.toJSON());
    } catch (error) {
        fail(error);
    }
}

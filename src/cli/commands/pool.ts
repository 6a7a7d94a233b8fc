/**
 * Pool CLI Commands
 */

import { Command } from 'commander';
import { config } from '../../config.js';
import { quote } from '../../pool/pricing.js';
import { parseAmount } from '../../utils/math.js';
import cli, { sym, c } from '../../utils/cli.js';
import { readExchange, withExchange } from '../state.js';

const BASE = config.pool.base.symbol;
const TOKEN = config.pool.token.symbol;
const SHARES = config.pool.shares.symbol;

type SwapSide = 'base' | 'token';

function parseSide(value: string): SwapSide {
    const side = value.toLowerCase();
    if (side === 'base' || side === BASE.toLowerCase()) return 'base';
    if (side === 'token' || side === TOKEN.toLowerCase()) return 'token';
    throw new Error(`Unknown asset "${value}". Use ${BASE} or ${TOKEN}`);
}

export const poolCommand = new Command('pool')
    .description('Liquidity pool operations');

// INFO command
poolCommand
    .command('info')
    .description('Show reserves, share supply and spot price')
    .action(() => {
        readExchange(exchange => {
            const info = exchange.getPoolInfo();

            console.log('');
            if (!info.initialized) {
                console.log(cli.warningBox(
                    `Use ${c.primary('cpx pool add')} to bootstrap the pool`,
                    `${sym.warning} Pool Empty`
                ));
                console.log('');
                return;
            }

            console.log(cli.infoBox(cli.rows([
                [`Reserve ${BASE}`, info.baseReserve.toString()],
                [`Reserve ${TOKEN}`, info.tokenReserve.toString()],
                [`Total ${SHARES}`, info.totalShares.toString()],
                [`Price ${TOKEN}`, `${info.priceTokenInBase} ${BASE}`],
                [`Price ${BASE}`, `${info.priceBaseInToken} ${TOKEN}`],
            ]), `${sym.gem} Liquidity Pool`));
            console.log('');
        });
    });

// QUOTE command
poolCommand
    .command('quote')
    .description('Quote a swap against the current reserves, or against explicit reserves')
    .requiredOption('--from <asset>', `Asset to sell (${BASE} or ${TOKEN})`)
    .requiredOption('--amount <integer>', 'Amount to sell')
    .option('--in-reserve <integer>', 'Input reserve (defaults to the pool)')
    .option('--out-reserve <integer>', 'Output reserve (defaults to the pool)')
    .action((options: { from: string; amount: string; inReserve?: string; outReserve?: string }) => {
        readExchange(exchange => {
            const side = parseSide(options.from);
            const amount = parseAmount(options.amount);
            const info = exchange.getPoolInfo();
            const inputReserve = options.inReserve !== undefined
                ? parseAmount(options.inReserve, 'Input reserve')
                : side === 'base' ? info.baseReserve : info.tokenReserve;
            const outputReserve = options.outReserve !== undefined
                ? parseAmount(options.outReserve, 'Output reserve')
                : side === 'base' ? info.tokenReserve : info.baseReserve;

            const amountOut = quote(amount, inputReserve, outputReserve);
            const [assetIn, assetOut] = side === 'base' ? [BASE, TOKEN] : [TOKEN, BASE];

            console.log('');
            console.log(cli.infoBox(cli.rows([
                ['In', `${amount} ${assetIn}`],
                ['Out', `${amountOut} ${assetOut}`],
                ['Reserves', `${inputReserve} / ${outputReserve}`],
            ]), `${sym.lightning} Swap Quote`));
            console.log('');
        });
    });

// ADD command
poolCommand
    .command('add')
    .description('Deposit base currency and tokens for LP shares')
    .requiredOption('--address <address>', 'Depositor address')
    .requiredOption('--base <integer>', `${BASE} to deposit`)
    .requiredOption('--tokens <integer>', `Maximum ${TOKEN} to deposit`)
    .action((options: { address: string; base: string; tokens: string }) => {
        withExchange(exchange => {
            const base = parseAmount(options.base, BASE);
            const offered = parseAmount(options.tokens, TOKEN);
            const tokensBefore = exchange.token.balanceOf(options.address);

            const minted = exchange.addLiquidity(options.address, base, offered);
            const tokensPulled = tokensBefore - exchange.token.balanceOf(options.address);

            console.log('');
            console.log(cli.successBox(cli.rows([
                ['Added', `${base} ${BASE} + ${tokensPulled} ${TOKEN}`],
                ['Minted', `${minted} ${SHARES}`],
            ]), `${sym.plus} Liquidity Added`));
            console.log('');
        });
    });

// REMOVE command
poolCommand
    .command('remove')
    .description('Burn LP shares for a proportional cut of both reserves')
    .requiredOption('--address <address>', 'Share holder address')
    .requiredOption('--shares <integer>', `${SHARES} to burn`)
    .action((options: { address: string; shares: string }) => {
        withExchange(exchange => {
            const shares = parseAmount(options.shares, SHARES);
            const result = exchange.removeLiquidity(options.address, shares);

            console.log('');
            console.log(cli.successBox(cli.rows([
                ['Burned', `${shares} ${SHARES}`],
                ['Received', `${result.baseOut} ${BASE} + ${result.tokenOut} ${TOKEN}`],
            ]), `${sym.minus} Liquidity Removed`));
            console.log('');
        });
    });

// SWAP command
poolCommand
    .command('swap')
    .description('Sell one asset for the other')
    .requiredOption('--address <address>', 'Trader address')
    .requiredOption('--from <asset>', `Asset to sell (${BASE} or ${TOKEN})`)
    .requiredOption('--amount <integer>', 'Amount to sell')
    .option('--min-out <integer>', 'Minimum amount to receive', '0')
    .action((options: { address: string; from: string; amount: string; minOut: string }) => {
        withExchange(exchange => {
            const side = parseSide(options.from);
            const amount = parseAmount(options.amount);
            const minOut = parseAmount(options.minOut, 'Minimum out');

            const amountOut = side === 'base'
                ? exchange.swapBaseForToken(options.address, amount, minOut)
                : exchange.swapTokenForBase(options.address, amount, minOut);
            const [assetIn, assetOut] = side === 'base' ? [BASE, TOKEN] : [TOKEN, BASE];

            console.log('');
            console.log(cli.successBox(cli.rows([
                ['In', `${amount} ${assetIn}`],
                ['Out', `${amountOut} ${assetOut}`],
            ]), `${sym.lightning} Swap Successful`));
            console.log('');
        });
    });

/**
 * Account CLI Commands: test funds, allowances, balances
 */

import { Command } from 'commander';
import { config } from '../../config.js';
import { storage } from '../../storage/Storage.js';
import { parseAmount } from '../../utils/math.js';
import cli, { sym } from '../../utils/cli.js';
import { Exchange } from '../../pool/Exchange.js';
import { readExchange, withExchange } from '../state.js';

const BASE = config.pool.base.symbol;
const TOKEN = config.pool.token.symbol;
const SHARES = config.pool.shares.symbol;

export const initCommand = new Command('init')
    .description('Create an empty pool state file')
    .option('--force', 'Overwrite existing state')
    .action((options: { force?: boolean }) => {
        if (storage.hasState() && !options.force) {
            console.log('');
            console.log(cli.warningBox(
                `State already exists at ${storage.getStatePath()}\nPass --force to start over`,
                `${sym.warning} Already Initialized`
            ));
            console.log('');
            return;
        }

        storage.saveState(new Exchange().toJSON());
        console.log('');
        console.log(cli.successBox(`State written to ${storage.getStatePath()}`, `${sym.success} Initialized`));
        console.log('');
    });

export const faucetCommand = new Command('faucet')
    .description('Credit test balances to an address')
    .requiredOption('--address <address>', 'Recipient address')
    .option('--base <integer>', `${BASE} to credit`, '0')
    .option('--tokens <integer>', `${TOKEN} to credit`, '0')
    .action((options: { address: string; base: string; tokens: string }) => {
        withExchange(exchange => {
            const base = parseAmount(options.base, BASE);
            const tokens = parseAmount(options.tokens, TOKEN);
            exchange.faucet(options.address, base, tokens);

            console.log('');
            console.log(cli.successBox(cli.rows([
                ['Address', options.address],
                ['Credited', `${base} ${BASE} + ${tokens} ${TOKEN}`],
            ]), `${sym.drop} Faucet`));
            console.log('');
        });
    });

export const approveCommand = new Command('approve')
    .description(`Allow the pool to pull ${TOKEN} from an address`)
    .requiredOption('--address <address>', 'Token owner')
    .requiredOption('--amount <integer>', 'Allowance')
    .action((options: { address: string; amount: string }) => {
        withExchange(exchange => {
            const amount = parseAmount(options.amount);
            exchange.approvePool(options.address, amount);

            console.log('');
            console.log(cli.successBox(`${options.address} allows the pool ${amount} ${TOKEN}`, `${sym.success} Approved`));
            console.log('');
        });
    });

export const balanceCommand = new Command('balance')
    .description('Show balances of an address')
    .requiredOption('--address <address>', 'Address to inspect')
    .action((options: { address: string }) => {
        readExchange(exchange => {
            const balances = exchange.getBalances(options.address);

            console.log('');
            console.log(cli.infoBox(cli.rows([
                [BASE, balances.base.toString()],
                [TOKEN, balances.token.toString()],
                [SHARES, balances.shares.toString()],
                ['Pool allowance', balances.allowance.toString()],
            ]), `${sym.info} ${options.address}`));
            console.log('');
        });
    });

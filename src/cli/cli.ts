#!/usr/bin/env node
/**
 * cpx - local constant-product exchange
 */

import { Command } from 'commander';
import { config } from '../config.js';
import { approveCommand, balanceCommand, faucetCommand, initCommand } from './commands/account.js';
import { poolCommand } from './commands/pool.js';

const program = new Command();

program
    .name('cpx')
    .description(`Constant-product exchange: ${config.pool.token.symbol} / ${config.pool.base.symbol}`)
    .version(config.version);

program.addCommand(initCommand);
program.addCommand(faucetCommand);
program.addCommand(approveCommand);
program.addCommand(balanceCommand);
program.addCommand(poolCommand);

program.parse();

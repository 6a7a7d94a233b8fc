/**
 * Exchange - wires the ledgers, the execution host and the pool.
 *
 * Every state-changing method here is one atomic host call.
 */

import { config } from '../config.js';
import { ExecutionHost } from '../host/ExecutionHost.js';
import { NativeLedger } from '../ledger/NativeLedger.js';
import { TokenLedger } from '../ledger/TokenLedger.js';
import type { LedgerState, RecipientHook } from '../ledger/types.js';
import { logger } from '../utils/logger.js';
import { ExchangePool } from './ExchangePool.js';
import type { AddLiquidityPreview, PoolInfo, RemoveLiquidityResult } from './ExchangePool.js';
import { quote } from './pricing.js';

const log = logger.child('Exchange');

export interface ExchangeState {
    native: LedgerState;
    token: LedgerState;
    shares: LedgerState;
}

export interface AccountBalances {
    base: bigint;
    token: bigint;
    shares: bigint;
    allowance: bigint;  // token allowance granted to the pool
}

export class Exchange {
    readonly native: NativeLedger;
    readonly token: TokenLedger;
    readonly shares: TokenLedger;
    readonly host: ExecutionHost;
    readonly pool: ExchangePool;

    constructor(poolAddress: string = config.pool.address) {
        this.native = new NativeLedger(config.pool.base.symbol);
        this.token = new TokenLedger(config.pool.token);
        this.shares = new TokenLedger(config.pool.shares);

        this.host = new ExecutionHost(this.native);
        this.host.register(this.token);
        this.host.register(this.shares);

        this.pool = new ExchangePool({
            address: poolAddress,
            token: this.token,
            shares: this.shares,
            native: this.native,
        });
    }

    // ========== POOL OPERATIONS ==========

    getReserve(): bigint {
        return this.pool.getReserve();
    }

    addLiquidity(sender: string, baseCurrencySent: bigint, tokenAmountOffered: bigint): bigint {
        return this.host.execute(sender, this.pool.address, baseCurrencySent,
            ctx => this.pool.addLiquidity(ctx, tokenAmountOffered));
    }

    removeLiquidity(sender: string, shareAmount: bigint): RemoveLiquidityResult {
        return this.host.execute(sender, this.pool.address, 0n,
            ctx => this.pool.removeLiquidity(ctx, shareAmount));
    }

    quote(inputAmount: bigint, inputReserve: bigint, outputReserve: bigint): bigint {
        return quote(inputAmount, inputReserve, outputReserve);
    }

    swapBaseForToken(sender: string, baseCurrencySent: bigint, minTokensOut: bigint): bigint {
        return this.host.execute(sender, this.pool.address, baseCurrencySent,
            ctx => this.pool.swapBaseForToken(ctx, minTokensOut));
    }

    swapTokenForBase(sender: string, tokensSold: bigint, minBaseOut: bigint): bigint {
        return this.host.execute(sender, this.pool.address, 0n,
            ctx => this.pool.swapTokenForBase(ctx, tokensSold, minBaseOut));
    }

    // ========== READ-ONLY ==========

    previewAddLiquidity(baseAmount: bigint): AddLiquidityPreview {
        return this.pool.previewAddLiquidity(baseAmount);
    }

    previewRemoveLiquidity(shareAmount: bigint): RemoveLiquidityResult {
        return this.pool.previewRemoveLiquidity(shareAmount);
    }

    getPoolInfo(): PoolInfo {
        return this.pool.getPoolInfo();
    }

    getBalances(address: string): AccountBalances {
        return {
            base: this.native.balanceOf(address),
            token: this.token.balanceOf(address),
            shares: this.shares.balanceOf(address),
            allowance: this.token.allowance(address, this.pool.address),
        };
    }

    // ========== ACCOUNTS ==========

    /**
     * Credit test balances of both assets (local networks only)
     */
    faucet(address: string, baseAmount: bigint, tokenAmount: bigint): void {
        if (baseAmount > 0n) this.native.credit(address, baseAmount);
        if (tokenAmount > 0n) this.token.mint(address, tokenAmount);
        log.info(`Faucet: ${baseAmount} ${this.native.symbol} + ${tokenAmount} ${this.token.symbol} -> ${address}`);
    }

    /**
     * Let the pool pull up to `amount` tokens from `owner`
     */
    approvePool(owner: string, amount: bigint): void {
        this.token.approve(owner, this.pool.address, amount);
    }

    onReceive(address: string, hook: RecipientHook): void {
        this.native.onReceive(address, hook);
    }

    // ========== SERIALIZATION ==========

    toJSON(): ExchangeState {
        return {
            native: this.native.toJSON(),
            token: this.token.toJSON(),
            shares: this.shares.toJSON(),
        };
    }

    loadFromData(data: ExchangeState): void {
        this.native.loadFromData(data.native);
        this.token.loadFromData(data.token);
        this.shares.loadFromData(data.shares);
        log.info(`State loaded: ${this.pool.getBaseReserve()} base, ${this.pool.getReserve()} token, ${this.pool.totalShares()} shares`);
    }
}

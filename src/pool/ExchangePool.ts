/**
 * Exchange Pool - Constant Product AMM (token / base currency)
 *
 * RESERVES ARE DERIVED, NOT STORED:
 * - base reserve  = base-currency balance of the pool address
 * - token reserve = token balance of the pool address
 *
 * ROUNDING:
 * - every division truncates, and every truncation favours the pool
 *
 * ORDERING:
 * - shares are burned and tokens moved before base currency is pushed,
 *   so recipient code running during the push sees settled state
 *
 * Handlers expect to run inside ExecutionHost.execute(): call value is
 * already credited to the pool, and a throw rolls everything back.
 */

import type { CallContext } from '../host/ExecutionHost.js';
import type { FungibleLedger, ShareLedger, ValueLedger } from '../ledger/types.js';
import { formatRatio, SafeMath } from '../utils/math.js';
import { logger } from '../utils/logger.js';
import { InsufficientTokenOfferError, InvalidAmountError, SlippageExceededError } from './errors.js';
import { quote } from './pricing.js';

const log = logger.child('Pool');

// ========== INTERFACES ==========

export interface ExchangePoolDeps {
    address: string;
    token: FungibleLedger;
    shares: ShareLedger;
    native: ValueLedger;
}

export interface RemoveLiquidityResult {
    baseOut: bigint;
    tokenOut: bigint;
}

export interface AddLiquidityPreview {
    /** null while the pool is empty: the first depositor picks the ratio */
    requiredTokenAmount: bigint | null;
    sharesMinted: bigint;
}

export interface PoolInfo {
    initialized: boolean;
    baseReserve: bigint;
    tokenReserve: bigint;
    totalShares: bigint;
    priceTokenInBase: string;  // base per 1 token, display only
    priceBaseInToken: string;  // tokens per 1 base, display only
}

// ========== EXCHANGE POOL ==========

export class ExchangePool {
    readonly address: string;
    private readonly token: FungibleLedger;
    private readonly shares: ShareLedger;
    private readonly native: ValueLedger;

    constructor(deps: ExchangePoolDeps) {
        this.address = deps.address;
        this.token = deps.token;
        this.shares = deps.shares;
        this.native = deps.native;
    }

    // ========== RESERVES ==========

    getReserve(): bigint {
        return this.token.balanceOf(this.address);
    }

    getBaseReserve(): bigint {
        return this.native.balanceOf(this.address);
    }

    totalShares(): bigint {
        return this.shares.totalSupply();
    }

    shareBalanceOf(address: string): bigint {
        return this.shares.balanceOf(address);
    }

    isInitialized(): boolean {
        return this.getReserve() > 0n;
    }

    // ========== LIQUIDITY ==========

    /**
     * Deposit `ctx.value` base currency plus tokens at the current ratio.
     * Returns the number of shares minted to the caller.
     */
    addLiquidity(ctx: CallContext, tokenAmountOffered: bigint): bigint {
        if (ctx.value <= 0n) {
            throw new InvalidAmountError('Base currency sent', ctx.value);
        }

        const tokenReserve = this.getReserve();

        if (tokenReserve === 0n) {
            if (tokenAmountOffered <= 0n) {
                throw new InvalidAmountError('Token amount offered', tokenAmountOffered);
            }

            this.token.checkAndPull(this.address, ctx.sender, this.address, tokenAmountOffered);
            const minted = ctx.value;
            this.shares.mint(ctx.sender, minted);

            log.info(`Pool bootstrapped by ${ctx.sender}: ${ctx.value} base + ${tokenAmountOffered} token = ${minted} shares`);
            return minted;
        }

        const baseReserveBefore = SafeMath.sub(this.getBaseReserve(), ctx.value);
        const requiredTokenAmount = SafeMath.mulDiv(ctx.value, tokenReserve, baseReserveBefore);

        if (tokenAmountOffered < requiredTokenAmount) {
            throw new InsufficientTokenOfferError(tokenAmountOffered, requiredTokenAmount);
        }

        this.token.checkAndPull(this.address, ctx.sender, this.address, requiredTokenAmount);
        const minted = SafeMath.mulDiv(this.totalShares(), ctx.value, baseReserveBefore);
        this.shares.mint(ctx.sender, minted);

        log.info(`Liquidity added by ${ctx.sender}: ${ctx.value} base + ${requiredTokenAmount} token = ${minted} shares`);
        return minted;
    }

    removeLiquidity(ctx: CallContext, shareAmount: bigint): RemoveLiquidityResult {
        if (shareAmount <= 0n) {
            throw new InvalidAmountError('Share amount', shareAmount);
        }

        const { baseOut, tokenOut } = this.previewRemoveLiquidity(shareAmount);

        this.shares.burn(ctx.sender, shareAmount);
        this.token.transfer(this.address, ctx.sender, tokenOut);
        this.native.send(this.address, ctx.sender, baseOut);

        log.info(`Liquidity removed by ${ctx.sender}: ${shareAmount} shares -> ${baseOut} base + ${tokenOut} token`);
        return { baseOut, tokenOut };
    }

    // ========== SWAPS ==========

    swapBaseForToken(ctx: CallContext, minTokensOut: bigint): bigint {
        if (ctx.value <= 0n) {
            throw new InvalidAmountError('Base currency sent', ctx.value);
        }

        const tokenReserveBefore = this.getReserve();
        const baseReserveBefore = SafeMath.sub(this.getBaseReserve(), ctx.value);
        const tokensOut = quote(ctx.value, baseReserveBefore, tokenReserveBefore);

        if (tokensOut < minTokensOut) {
            throw new SlippageExceededError(tokensOut, minTokensOut);
        }

        this.token.transfer(this.address, ctx.sender, tokensOut);

        log.info(`Swap by ${ctx.sender}: ${ctx.value} base -> ${tokensOut} token`);
        return tokensOut;
    }

    swapTokenForBase(ctx: CallContext, tokensSold: bigint, minBaseOut: bigint): bigint {
        if (tokensSold <= 0n) {
            throw new InvalidAmountError('Tokens sold', tokensSold);
        }

        const baseOut = quote(tokensSold, this.getReserve(), this.getBaseReserve());

        if (baseOut < minBaseOut) {
            throw new SlippageExceededError(baseOut, minBaseOut);
        }

        this.token.checkAndPull(this.address, ctx.sender, this.address, tokensSold);
        this.native.send(this.address, ctx.sender, baseOut);

        log.info(`Swap by ${ctx.sender}: ${tokensSold} token -> ${baseOut} base`);
        return baseOut;
    }

    // ========== PREVIEWS (read-only) ==========

    previewAddLiquidity(baseAmount: bigint): AddLiquidityPreview {
        if (baseAmount <= 0n) {
            throw new InvalidAmountError('Base amount', baseAmount);
        }

        const tokenReserve = this.getReserve();
        if (tokenReserve === 0n) {
            return { requiredTokenAmount: null, sharesMinted: baseAmount };
        }

        const baseReserve = this.getBaseReserve();
        return {
            requiredTokenAmount: SafeMath.mulDiv(baseAmount, tokenReserve, baseReserve),
            sharesMinted: SafeMath.mulDiv(this.totalShares(), baseAmount, baseReserve),
        };
    }

    previewRemoveLiquidity(shareAmount: bigint): RemoveLiquidityResult {
        const totalShares = this.totalShares();
        return {
            baseOut: SafeMath.mulDiv(this.getBaseReserve(), shareAmount, totalShares),
            tokenOut: SafeMath.mulDiv(this.getReserve(), shareAmount, totalShares),
        };
    }

    previewSwapBaseForToken(baseIn: bigint): bigint {
        return quote(baseIn, this.getBaseReserve(), this.getReserve());
    }

    previewSwapTokenForBase(tokensIn: bigint): bigint {
        return quote(tokensIn, this.getReserve(), this.getBaseReserve());
    }

    // ========== INFO ==========

    getPoolInfo(): PoolInfo {
        const baseReserve = this.getBaseReserve();
        const tokenReserve = this.getReserve();
        return {
            initialized: tokenReserve > 0n,
            baseReserve,
            tokenReserve,
            totalShares: this.totalShares(),
            priceTokenInBase: formatRatio(baseReserve, tokenReserve),
            priceBaseInToken: formatRatio(tokenReserve, baseReserve),
        };
    }
}

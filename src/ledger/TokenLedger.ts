/**
 * In-memory divisible token ledger.
 *
 * Balances, allowances and supply as bigint. Serves as the traded token's
 * ledger and, with the pool as its only minter, as the LP-share ledger.
 */

import { InvalidAmountError, TransferFailedError } from '../pool/errors.js';
import { logger } from '../utils/logger.js';
import type { FungibleLedger, Journaled, LedgerState, ShareLedger } from './types.js';

const log = logger.child('Token');

export interface TokenMetadata {
    name: string;
    symbol: string;
}

interface TokenSnapshot {
    supply: bigint;
    balances: Map<string, bigint>;
    allowances: Map<string, Map<string, bigint>>;
}

export class TokenLedger implements FungibleLedger, ShareLedger, Journaled<TokenSnapshot> {
    readonly name: string;
    readonly symbol: string;
    private supply: bigint = 0n;
    private balances: Map<string, bigint> = new Map();
    // owner -> spender -> remaining allowance
    private allowances: Map<string, Map<string, bigint>> = new Map();

    constructor(metadata: TokenMetadata) {
        this.name = metadata.name;
        this.symbol = metadata.symbol;
    }

    // ========== QUERIES ==========

    balanceOf(address: string): bigint {
        return this.balances.get(address) ?? 0n;
    }

    totalSupply(): bigint {
        return this.supply;
    }

    allowance(owner: string, spender: string): bigint {
        return this.allowances.get(owner)?.get(spender) ?? 0n;
    }

    holders(): number {
        return this.balances.size;
    }

    // ========== TRANSFERS ==========

    transfer(from: string, to: string, amount: bigint): void {
        this.requireNonNegative(amount);
        this.move(from, to, amount);
    }

    approve(owner: string, spender: string, amount: bigint): void {
        this.requireNonNegative(amount);
        let spenders = this.allowances.get(owner);
        if (!spenders) {
            spenders = new Map();
            this.allowances.set(owner, spenders);
        }
        if (amount === 0n) {
            spenders.delete(spender);
            if (spenders.size === 0) this.allowances.delete(owner);
        } else {
            spenders.set(spender, amount);
        }
        log.debug(`${this.symbol} approve: ${owner} -> ${spender} = ${amount}`);
    }

    transferFrom(spender: string, from: string, to: string, amount: bigint): void {
        this.checkAndPull(spender, from, to, amount);
    }

    checkAndPull(spender: string, from: string, to: string, amount: bigint): void {
        this.requireNonNegative(amount);
        const allowed = this.allowance(from, spender);
        if (allowed < amount) {
            throw new TransferFailedError(`${this.symbol} allowance ${allowed} below ${amount}`);
        }
        const balance = this.balanceOf(from);
        if (balance < amount) {
            throw new TransferFailedError(`${this.symbol} balance ${balance} below ${amount}`);
        }

        this.approve(from, spender, allowed - amount);
        this.move(from, to, amount);
    }

    // ========== SUPPLY ==========

    mint(to: string, amount: bigint): void {
        this.requireNonNegative(amount);
        this.supply += amount;
        this.setBalance(to, this.balanceOf(to) + amount);
        log.debug(`${this.symbol} mint: ${amount} -> ${to}`);
    }

    burn(from: string, amount: bigint): void {
        this.requireNonNegative(amount);
        const balance = this.balanceOf(from);
        if (balance < amount) {
            throw new TransferFailedError(`${this.symbol} burn of ${amount} exceeds balance ${balance}`);
        }
        this.setBalance(from, balance - amount);
        this.supply -= amount;
        log.debug(`${this.symbol} burn: ${amount} <- ${from}`);
    }

    // ========== JOURNAL ==========

    snapshot(): TokenSnapshot {
        return {
            supply: this.supply,
            balances: new Map(this.balances),
            allowances: new Map(
                Array.from(this.allowances.entries()).map(([owner, spenders]) => [owner, new Map(spenders)])
            ),
        };
    }

    restore(state: TokenSnapshot): void {
        this.supply = state.supply;
        this.balances = new Map(state.balances);
        this.allowances = new Map(
            Array.from(state.allowances.entries()).map(([owner, spenders]) => [owner, new Map(spenders)])
        );
    }

    // ========== SERIALIZATION ==========

    toJSON(): LedgerState {
        return {
            totalSupply: this.supply.toString(),
            balances: Object.fromEntries(
                Array.from(this.balances.entries()).map(([k, v]) => [k, v.toString()])
            ),
            allowances: Object.fromEntries(
                Array.from(this.allowances.entries()).map(([owner, spenders]) => [
                    owner,
                    Object.fromEntries(Array.from(spenders.entries()).map(([k, v]) => [k, v.toString()])),
                ])
            ),
        };
    }

    loadFromData(data: LedgerState): void {
        this.supply = BigInt(data.totalSupply);
        this.balances = new Map(
            Object.entries(data.balances).map(([k, v]) => [k, BigInt(v)])
        );
        this.allowances = new Map(
            Object.entries(data.allowances).map(([owner, spenders]) => [
                owner,
                new Map(Object.entries(spenders).map(([k, v]) => [k, BigInt(v)])),
            ])
        );
        log.debug(`${this.symbol} loaded: ${this.balances.size} holders, supply ${this.supply}`);
    }

    // ========== INTERNALS ==========

    private move(from: string, to: string, amount: bigint): void {
        const balance = this.balanceOf(from);
        if (balance < amount) {
            throw new TransferFailedError(`${this.symbol} balance ${balance} below ${amount}`);
        }
        if (from === to || amount === 0n) return;
        this.setBalance(from, balance - amount);
        this.setBalance(to, this.balanceOf(to) + amount);
    }

    private setBalance(address: string, amount: bigint): void {
        if (amount === 0n) {
            this.balances.delete(address);
        } else {
            this.balances.set(address, amount);
        }
    }

    private requireNonNegative(amount: bigint): void {
        if (amount < 0n) {
            throw new InvalidAmountError(`${this.symbol} amount`, amount, 'must not be negative');
        }
    }
}

/**
 * Native base-currency ledger.
 *
 * Value pushed with send() lands first, then the recipient's hook runs.
 * Hooks are how recipient code (including re-entrant callers) executes
 * in process; they are code, not state, and are not journaled.
 */

import { InvalidAmountError, TransferFailedError } from '../pool/errors.js';
import { logger } from '../utils/logger.js';
import type { Journaled, LedgerState, RecipientHook, ValueLedger } from './types.js';

const log = logger.child('Native');

interface NativeSnapshot {
    supply: bigint;
    balances: Map<string, bigint>;
}

export class NativeLedger implements ValueLedger, Journaled<NativeSnapshot> {
    readonly symbol: string;
    private supply: bigint = 0n;
    private balances: Map<string, bigint> = new Map();
    private hooks: Map<string, RecipientHook> = new Map();

    constructor(symbol: string) {
        this.symbol = symbol;
    }

    balanceOf(address: string): bigint {
        return this.balances.get(address) ?? 0n;
    }

    totalSupply(): bigint {
        return this.supply;
    }

    /**
     * Create base currency out of nothing (genesis allocation, faucet)
     */
    credit(address: string, amount: bigint): void {
        if (amount <= 0n) {
            throw new InvalidAmountError('Credit amount', amount);
        }
        this.supply += amount;
        this.balances.set(address, this.balanceOf(address) + amount);
        log.debug(`credit: ${amount} ${this.symbol} -> ${address}`);
    }

    /**
     * Move value without running the recipient's hook.
     * Used by the execution host to attach call value.
     */
    move(from: string, to: string, amount: bigint): void {
        if (amount < 0n) {
            throw new InvalidAmountError(`${this.symbol} amount`, amount, 'must not be negative');
        }
        const balance = this.balanceOf(from);
        if (balance < amount) {
            throw new TransferFailedError(`${this.symbol} balance of ${from} is ${balance}, needs ${amount}`);
        }
        if (from === to || amount === 0n) return;

        this.setBalance(from, balance - amount);
        this.setBalance(to, this.balanceOf(to) + amount);
    }

    send(from: string, to: string, amount: bigint): void {
        this.move(from, to, amount);

        const hook = this.hooks.get(to);
        if (!hook) return;

        try {
            hook(from, amount);
        } catch (error) {
            const reason = error instanceof Error ? error.message : 'Unknown error';
            log.warn(`Recipient ${to} rejected ${amount} ${this.symbol}: ${reason}`);
            throw new TransferFailedError(`recipient ${to} rejected value: ${reason}`);
        }
    }

    onReceive(address: string, hook: RecipientHook): void {
        this.hooks.set(address, hook);
    }

    clearHook(address: string): void {
        this.hooks.delete(address);
    }

    // ========== JOURNAL ==========

    snapshot(): NativeSnapshot {
        return { supply: this.supply, balances: new Map(this.balances) };
    }

    restore(state: NativeSnapshot): void {
        this.supply = state.supply;
        this.balances = new Map(state.balances);
    }

    // ========== SERIALIZATION ==========

    toJSON(): LedgerState {
        return {
            totalSupply: this.supply.toString(),
            balances: Object.fromEntries(
                Array.from(this.balances.entries()).map(([k, v]) => [k, v.toString()])
            ),
            allowances: {},
        };
    }

    loadFromData(data: LedgerState): void {
        this.supply = BigInt(data.totalSupply);
        this.balances = new Map(
            Object.entries(data.balances).map(([k, v]) => [k, BigInt(v)])
        );
    }

    private setBalance(address: string, amount: bigint): void {
        if (amount === 0n) {
            this.balances.delete(address);
        } else {
            this.balances.set(address, amount);
        }
    }
}

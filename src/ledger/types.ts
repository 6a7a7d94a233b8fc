/**
 * Ledger interfaces consumed by the pool.
 *
 * All mutating methods throw TransferFailedError when the ledger declines;
 * none of them report failure through a return value.
 */

export interface FungibleLedger {
    balanceOf(address: string): bigint;
    transfer(from: string, to: string, amount: bigint): void;
    /**
     * Move `amount` from `from` to `to` on behalf of `spender`, consuming
     * allowance. Allowance and balance are checked before anything moves.
     */
    checkAndPull(spender: string, from: string, to: string, amount: bigint): void;
}

export interface ShareLedger {
    mint(to: string, amount: bigint): void;
    burn(from: string, amount: bigint): void;
    balanceOf(address: string): bigint;
    totalSupply(): bigint;
}

export interface ValueLedger {
    balanceOf(address: string): bigint;
    /** Credits `to`, then runs the recipient's hook. A throwing hook fails the send. */
    send(from: string, to: string, amount: bigint): void;
}

/** Ledger whose full state can be captured and put back */
export interface Journaled<S> {
    snapshot(): S;
    restore(state: S): void;
}

/** JSON form of a ledger; amounts as decimal strings */
export interface LedgerState {
    totalSupply: string;
    balances: Record<string, string>;
    allowances: Record<string, Record<string, string>>;
}

export type RecipientHook = (from: string, amount: bigint) => void;

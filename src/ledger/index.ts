/**
 * Ledger Module Exports
 */

export { TokenLedger } from './TokenLedger.js';
export type { TokenMetadata } from './TokenLedger.js';
export { NativeLedger } from './NativeLedger.js';
export type {
    FungibleLedger,
    ShareLedger,
    ValueLedger,
    Journaled,
    LedgerState,
    RecipientHook,
} from './types.js';

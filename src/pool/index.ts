/**
 * Pool Module Exports
 */

export { ExchangePool } from './ExchangePool.js';
export type {
    ExchangePoolDeps,
    RemoveLiquidityResult,
    AddLiquidityPreview,
    PoolInfo,
} from './ExchangePool.js';

export { Exchange } from './Exchange.js';
export type { ExchangeState, AccountBalances } from './Exchange.js';

export { quote, FEE_NUMERATOR, FEE_DENOMINATOR } from './pricing.js';

export {
    PoolError,
    InvalidReservesError,
    InsufficientTokenOfferError,
    SlippageExceededError,
    InvalidAmountError,
    TransferFailedError,
    DivideByZeroError,
    UnderflowError,
    isPoolError,
} from './errors.js';
export type { PoolErrorCode } from './errors.js';

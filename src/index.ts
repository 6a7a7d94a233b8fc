/**
 * Constant-product exchange between one token and a native base currency,
 * with LP-share accounting.
 *
 * @example
 * ```typescript
 * import { Exchange } from 'cp-exchange';
 *
 * const exchange = new Exchange();
 * exchange.faucet('alice', 10_000n, 50_000n);
 * exchange.approvePool('alice', 50_000n);
 *
 * const shares = exchange.addLiquidity('alice', 1_000n, 5_000n);
 * const tokensOut = exchange.swapBaseForToken('alice', 100n, 0n);
 * ```
 */

export * from './pool/index.js';
export * from './ledger/index.js';
export { ExecutionHost } from './host/ExecutionHost.js';
export type { CallContext } from './host/ExecutionHost.js';
export { Storage, storage, isExchangeState } from './storage/Storage.js';
export { SafeMath, parseAmount, formatRatio } from './utils/math.js';
export { config } from './config.js';
export type { Config } from './config.js';

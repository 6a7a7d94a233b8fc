/**
 * Constant-product pricing: x * y = k
 * Fee: 1%, taken from the input side.
 */

import { InvalidAmountError, InvalidReservesError } from './errors.js';

export const FEE_NUMERATOR = 99n;      // input kept after fee
export const FEE_DENOMINATOR = 100n;

/**
 * Output amount for `inputAmount` sold into a pool holding `inputReserve`
 * of the input asset and `outputReserve` of the output asset.
 *
 * Rounds down, so the pool never pays out more than the curve allows.
 */
export function quote(inputAmount: bigint, inputReserve: bigint, outputReserve: bigint): bigint {
    if (inputReserve <= 0n || outputReserve <= 0n) {
        throw new InvalidReservesError(inputReserve, outputReserve);
    }
    if (inputAmount < 0n) {
        throw new InvalidAmountError('Input amount', inputAmount, 'must not be negative');
    }

    const inputAmountWithFee = inputAmount * FEE_NUMERATOR;
    const numerator = inputAmountWithFee * outputReserve;
    const denominator = inputReserve * FEE_DENOMINATOR + inputAmountWithFee;

    return numerator / denominator;
}

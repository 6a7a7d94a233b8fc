/**
 * Unsigned integer arithmetic over bigint.
 * bigint cannot overflow; the guards here are for underflow and zero divisors.
 */

import { DivideByZeroError, InvalidAmountError, UnderflowError } from '../pool/errors.js';

export const SafeMath = {
    sub(a: bigint, b: bigint): bigint {
        if (b > a) throw new UnderflowError(a, b);
        return a - b;
    },

    /** Truncating division */
    div(a: bigint, b: bigint): bigint {
        if (b === 0n) throw new DivideByZeroError();
        return a / b;
    },

    /** a * b / c, truncating */
    mulDiv(a: bigint, b: bigint, c: bigint): bigint {
        return SafeMath.div(a * b, c);
    },
};

const INTEGER_PATTERN = /^\d+$/;

/**
 * Parse a non-negative integer amount from user input (CLI flags, JSON).
 */
export function parseAmount(value: string, what: string = 'Amount'): bigint {
    const trimmed = value.trim().replace(/_/g, '');
    if (!INTEGER_PATTERN.test(trimmed)) {
        throw new InvalidAmountError(what, JSON.stringify(value), 'must be a non-negative integer');
    }
    return BigInt(trimmed);
}

/**
 * Ratio of two integers as a decimal string, for display only.
 */
export function formatRatio(numerator: bigint, denominator: bigint, decimals: number = 6): string {
    if (denominator === 0n) return '0';
    const scale = 10n ** BigInt(decimals);
    const scaled = (numerator * scale) / denominator;
    const whole = scaled / scale;
    const fraction = (scaled % scale).toString().padStart(decimals, '0');
    return decimals > 0 ? `${whole}.${fraction}` : whole.toString();
}

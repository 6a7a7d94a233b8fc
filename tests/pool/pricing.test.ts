import { describe, it, expect } from 'vitest';
import { quote } from '../../src/pool/pricing.js';
import { InvalidAmountError, InvalidReservesError } from '../../src/pool/errors.js';

describe('quote', () => {
    it('applies the 1% input fee and rounds down', () => {
        // 9900 * 1000 / (100000 + 9900) = 90.08...
        expect(quote(100n, 1000n, 1000n)).toBe(90n);
    });
    it('prices a large trade against a balanced pool', () => {
        // 99000 * 1000 / 199000 = 497.48...
        expect(quote(1000n, 1000n, 1000n)).toBe(497n);
    });
    it('never pays out the whole output reserve', () => {
        expect(quote(10n ** 30n, 1000n, 1000n)).toBe(999n);
    });
    it('returns zero for zero input', () => {
        expect(quote(0n, 1000n, 1000n)).toBe(0n);
    });
    it('rejects an empty input reserve', () => {
        expect(() => quote(100n, 0n, 1000n)).toThrow(InvalidReservesError);
    });
    it('rejects an empty output reserve', () => {
        expect(() => quote(100n, 1000n, 0n)).toThrow(InvalidReservesError);
    });
    it('rejects negative input', () => {
        expect(() => quote(-1n, 1000n, 1000n)).toThrow(InvalidAmountError);
    });
    it('carries the error code', () => {
        try {
            quote(1n, 0n, 0n);
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(InvalidReservesError);
            if (error instanceof InvalidReservesError) {
                expect(error.code).toBe('INVALID_RESERVES');
            }
        }
    });
});

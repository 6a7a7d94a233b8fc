import { describe, it, expect, beforeEach } from 'vitest';
import { Exchange } from '../../src/pool/Exchange.js';
import { TransferFailedError } from '../../src/pool/errors.js';

const FUNDS = 1_000_000n;

describe('Reentrancy', () => {
    let exchange: Exchange;

    beforeEach(() => {
        exchange = new Exchange('POOL');
        exchange.faucet('mallory', FUNDS, FUNDS);
        exchange.approvePool('mallory', FUNDS);
        exchange.addLiquidity('mallory', 1000n, 5000n);
    });

    it('removeLiquidity burns shares and moves tokens before pushing value', () => {
        const observed: Array<{ totalShares: bigint; tokenReserve: bigint; baseReserve: bigint }> = [];
        exchange.onReceive('mallory', () => {
            observed.push({
                totalShares: exchange.pool.totalShares(),
                tokenReserve: exchange.getReserve(),
                baseReserve: exchange.pool.getBaseReserve(),
            });
        });

        exchange.removeLiquidity('mallory', 400n);

        expect(observed).toEqual([{ totalShares: 600n, tokenReserve: 3000n, baseReserve: 600n }]);
    });

    it('a re-entrant withdrawal is paid only its proportional share', () => {
        let reentered = false;
        exchange.onReceive('mallory', () => {
            if (reentered) return;
            reentered = true;
            exchange.removeLiquidity('mallory', 300n);
        });

        exchange.removeLiquidity('mallory', 400n);

        expect(exchange.pool.getBaseReserve()).toBe(300n);
        expect(exchange.getReserve()).toBe(1500n);
        expect(exchange.pool.totalShares()).toBe(300n);
        expect(exchange.native.balanceOf('mallory')).toBe(FUNDS - 1000n + 700n);
        expect(exchange.token.balanceOf('mallory')).toBe(FUNDS - 5000n + 3500n);
    });

    it('a recipient that rejects value reverts the whole withdrawal', () => {
        exchange.onReceive('mallory', () => {
            throw new Error('reject');
        });

        expect(() => exchange.removeLiquidity('mallory', 400n)).toThrow(TransferFailedError);
        expect(exchange.pool.totalShares()).toBe(1000n);
        expect(exchange.pool.shareBalanceOf('mallory')).toBe(1000n);
        expect(exchange.getReserve()).toBe(5000n);
        expect(exchange.pool.getBaseReserve()).toBe(1000n);
        expect(exchange.native.balanceOf('mallory')).toBe(FUNDS - 1000n);
        expect(exchange.token.balanceOf('mallory')).toBe(FUNDS - 5000n);
    });

    it('swapTokenForBase pulls tokens before pushing value', () => {
        const observed: bigint[] = [];
        exchange.onReceive('mallory', () => {
            observed.push(exchange.getReserve(), exchange.pool.getBaseReserve());
        });

        const out = exchange.swapTokenForBase('mallory', 500n, 0n);

        expect(out).toBe(90n);
        expect(observed).toEqual([5500n, 910n]);
    });
});

import { describe, it, expect, beforeEach } from 'vitest';
import { ExecutionHost } from '../../src/host/ExecutionHost.js';
import { NativeLedger } from '../../src/ledger/NativeLedger.js';
import { TokenLedger } from '../../src/ledger/TokenLedger.js';
import { TransferFailedError } from '../../src/pool/errors.js';

describe('ExecutionHost', () => {
    let native: NativeLedger;
    let token: TokenLedger;
    let host: ExecutionHost;

    beforeEach(() => {
        native = new NativeLedger('ETH');
        token = new TokenLedger({ name: 'Test Token', symbol: 'TST' });
        host = new ExecutionHost(native);
        host.register(token);
        native.credit('alice', 100n);
        token.mint('alice', 100n);
    });

    it('credits call value before the handler runs', () => {
        const seen = host.execute('alice', 'pool', 40n, ctx => {
            expect(ctx).toEqual({ sender: 'alice', value: 40n });
            return native.balanceOf('pool');
        });
        expect(seen).toBe(40n);
        expect(native.balanceOf('alice')).toBe(60n);
    });

    it('rolls back every registered ledger when the handler throws', () => {
        expect(() => host.execute('alice', 'pool', 40n, () => {
            token.transfer('alice', 'pool', 70n);
            throw new Error('revert');
        })).toThrow('revert');

        expect(native.balanceOf('alice')).toBe(100n);
        expect(native.balanceOf('pool')).toBe(0n);
        expect(token.balanceOf('alice')).toBe(100n);
        expect(token.balanceOf('pool')).toBe(0n);
    });

    it('fails before the handler when the sender cannot pay', () => {
        let ran = false;
        expect(() => host.execute('bob', 'pool', 1n, () => {
            ran = true;
        })).toThrow(TransferFailedError);
        expect(ran).toBe(false);
    });

    it('a caught inner failure rolls back only the inner call', () => {
        host.execute('alice', 'pool', 10n, () => {
            token.transfer('alice', 'pool', 5n);
            try {
                host.execute('alice', 'pool', 20n, () => {
                    token.transfer('alice', 'pool', 50n);
                    throw new Error('inner');
                });
            } catch (error) {
                expect(error).toBeInstanceOf(Error);
            }
        });

        expect(native.balanceOf('pool')).toBe(10n);
        expect(token.balanceOf('pool')).toBe(5n);
    });

    it('tracks call depth', () => {
        const depths: number[] = [];
        host.execute('alice', 'pool', 0n, () => {
            depths.push(host.getDepth());
            host.execute('alice', 'pool', 0n, () => {
                depths.push(host.getDepth());
            });
        });
        expect(depths).toEqual([1, 2]);
        expect(host.getDepth()).toBe(0);
    });
});

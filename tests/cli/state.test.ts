import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';

// config reads POOL_DATA_DIR at import time, so modules are loaded after it is set
const dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cpx-cli-'));
process.env.POOL_DATA_DIR = dataDir;

type StateModule = typeof import('../../src/cli/state.js');
type StorageModule = typeof import('../../src/storage/Storage.js');
type PoolModule = typeof import('../../src/cli/commands/pool.js');

describe('CLI state handling', () => {
    let state: StateModule;
    let storageModule: StorageModule;
    let pool: PoolModule;
    let output: string[];

    beforeAll(async () => {
        state = await import('../../src/cli/state.js');
        storageModule = await import('../../src/storage/Storage.js');
        pool = await import('../../src/cli/commands/pool.js');
    });

    afterAll(() => {
        fs.rmSync(dataDir, { recursive: true, force: true });
    });

    beforeEach(() => {
        output = [];
        vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
            throw new Error(`exit ${code}`);
        });
        vi.spyOn(console, 'log').mockImplementation((line?: unknown) => {
            output.push(String(line));
        });
    });

    afterEach(() => {
        vi.restoreAllMocks();
        storageModule.storage.deleteState();
    });

    it('leaves a malformed state file untouched', () => {
        const ledger = { totalSupply: '1000', balances: { alice: '1000' }, allowances: {} };
        const contents = JSON.stringify({
            native: { totalSupply: '0', balances: { alice: '1.5' }, allowances: {} },
            token: ledger,
            shares: ledger,
        });
        const statePath = storageModule.storage.getStatePath();
        fs.writeFileSync(statePath, contents);

        expect(() => state.withExchange(exchange => exchange.faucet('bob', 1n, 0n))).toThrow('exit 1');
        expect(fs.readFileSync(statePath, 'utf-8')).toBe(contents);
        expect(output.join('\n')).toContain('Malformed state file');
    });

    it('saves state after a successful action', () => {
        state.withExchange(exchange => exchange.faucet('bob', 5n, 7n));

        const balances = state.loadExchange().getBalances('bob');
        expect(balances.base).toBe(5n);
        expect(balances.token).toBe(7n);
    });

    it('quote does not write a state file', () => {
        pool.poolCommand.parse(
            ['quote', '--from', 'ETH', '--amount', '100', '--in-reserve', '1000', '--out-reserve', '1000'],
            { from: 'user' }
        );

        expect(output.join('\n')).toContain('90 CDT');
        expect(storageModule.storage.hasState()).toBe(false);
    });
});

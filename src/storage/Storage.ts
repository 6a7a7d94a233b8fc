import fs from 'fs';
import path from 'path';
import { config } from '../config.js';
import type { LedgerState } from '../ledger/types.js';
import type { ExchangeState } from '../pool/Exchange.js';
import { logger } from '../utils/logger.js';

const log = logger.child('Storage');

function isAmountRecord(value: unknown): value is Record<string, string> {
    if (typeof value !== 'object' || value === null) return false;
    return Object.values(value).every(v => typeof v === 'string' && /^\d+$/.test(v));
}

function isLedgerState(value: unknown): value is LedgerState {
    if (typeof value !== 'object' || value === null) return false;
    if (!('totalSupply' in value) || !('balances' in value) || !('allowances' in value)) return false;
    const { totalSupply, balances, allowances } = value;
    return typeof totalSupply === 'string'
        && /^\d+$/.test(totalSupply)
        && isAmountRecord(balances)
        && typeof allowances === 'object'
        && allowances !== null
        && Object.values(allowances).every(isAmountRecord);
}

export function isExchangeState(value: unknown): value is ExchangeState {
    if (typeof value !== 'object' || value === null) return false;
    if (!('native' in value) || !('token' in value) || !('shares' in value)) return false;
    return isLedgerState(value.native) && isLedgerState(value.token) && isLedgerState(value.shares);
}

export class Storage {
    private dataDir: string;
    private statePath: string;

    constructor(dataDir: string = config.storage.dataDir) {
        this.dataDir = dataDir;
        this.statePath = path.join(this.dataDir, config.storage.stateFile);
    }

    private ensureDirectories(): void {
        if (!fs.existsSync(this.dataDir)) {
            fs.mkdirSync(this.dataDir, { recursive: true });
        }
    }

    getStatePath(): string {
        return this.statePath;
    }

    hasState(): boolean {
        return fs.existsSync(this.statePath);
    }

    saveState(data: ExchangeState): void {
        this.ensureDirectories();
        fs.writeFileSync(this.statePath, JSON.stringify(data, null, 2));
        log.debug(`State saved to ${this.statePath}`);
    }

    /**
     * Returns null only when no state file exists. An unreadable or
     * malformed file throws, so callers never mistake it for an empty pool.
     */
    loadState(): ExchangeState | null {
        if (!fs.existsSync(this.statePath)) {
            return null;
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(fs.readFileSync(this.statePath, 'utf-8'));
        } catch (error) {
            const reason = error instanceof Error ? error.message : 'Unknown error';
            log.error(`Failed to load state: ${reason}`);
            throw new Error(`Cannot read state file ${this.statePath}: ${reason}`);
        }

        if (!isExchangeState(parsed)) {
            log.error(`Malformed state file: ${this.statePath}`);
            throw new Error(`Malformed state file ${this.statePath}`);
        }
        return parsed;
    }

    deleteState(): boolean {
        if (fs.existsSync(this.statePath)) {
            fs.unlinkSync(this.statePath);
            return true;
        }
        return false;
    }
}

export const storage = new Storage();

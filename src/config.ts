import type { LogLevel } from './utils/logger.js';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function readLogLevel(value: string | undefined): LogLevel {
    const level = LOG_LEVELS.find(l => l === value?.toLowerCase());
    return level ?? 'info';
}

// Fixed identifiers for the single pool this package runs
const POOL_CONFIG = {
    address: 'POOL_TOKEN_BASE',
    token: {
        name: 'Crypto Dev Token',
        symbol: 'CDT',
    },
    base: {
        symbol: 'ETH',
    },
    shares: {
        name: 'Crypto Dev LP',
        symbol: 'CDLP',
    },
};

export const config = {
    log: {
        level: readLogLevel(process.env.LOG_LEVEL),
    },
    pool: POOL_CONFIG,
    storage: {
        dataDir: process.env.POOL_DATA_DIR || './data',
        stateFile: 'pool-state.json',
    },
    version: '1.0.0',
};
export type Config = typeof config;

import { config } from '../config.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
type EmitLevel = Exclude<LogLevel, 'silent'>;

const colors = {
    reset: '\x1b[0m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    cyan: '\x1b[36m',
};

const levelColors: Record<EmitLevel, string> = {
    debug: colors.dim,
    info: colors.green,
    warn: colors.yellow,
    error: colors.red,
};

const levelRank: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

class Logger {
    private context: string;
    private level: LogLevel;

    constructor(context: string = 'App', level: LogLevel = config.log.level) {
        this.context = context;
        this.level = level;
    }

    private log(level: EmitLevel, message: string, ...args: unknown[]): void {
        if (levelRank[level] < levelRank[this.level]) return;

        const timestamp = new Date().toISOString();
        const color = levelColors[level];
        const line = `${colors.dim}${timestamp}${colors.reset} ${color}[${level.toUpperCase()}]${colors.reset} ${colors.cyan}[${this.context}]${colors.reset} ${message}`;

        if (level === 'error') {
            console.error(line, ...args);
        } else {
            console.log(line, ...args);
        }
    }

    debug(message: string, ...args: unknown[]): void {
        this.log('debug', message, ...args);
    }

    info(message: string, ...args: unknown[]): void {
        this.log('info', message, ...args);
    }

    warn(message: string, ...args: unknown[]): void {
        this.log('warn', message, ...args);
    }

    error(message: string, ...args: unknown[]): void {
        this.log('error', message, ...args);
    }

    child(context: string): Logger {
        return new Logger(`${this.context}:${context}`, this.level);
    }

    getLevel(): LogLevel {
        return this.level;
    }
}

export const logger = new Logger('Exchange');
export { Logger };

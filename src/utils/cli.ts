/**
 * CLI Formatting Utility
 *
 * Output helpers built on chalk, boxen, figures and log-symbols.
 */

import chalk from 'chalk';
import boxen, { type Options as BoxenOptions } from 'boxen';
import figures from 'figures';
import logSymbols from 'log-symbols';

// ==================== SYMBOLS ====================

export const sym = {
    success: logSymbols.success,
    error: logSymbols.error,
    warning: logSymbols.warning,
    info: logSymbols.info,

    arrow: figures.arrowRight,
    pointer: figures.pointer,
    bullet: figures.bullet,

    // These have no ASCII fallback
    drop: '💧',
    lightning: '⚡',
    gem: '💎',
    plus: '➕',
    minus: '➖',
};

// ==================== COLORS ====================

export const c = {
    primary: chalk.cyan,
    success: chalk.green,
    error: chalk.red,
    warning: chalk.yellow,
    info: chalk.blue,

    bold: chalk.bold,
    dim: chalk.dim,

    heading: chalk.bold.cyan,
    label: chalk.gray,
    value: chalk.white,
    highlight: chalk.bold.yellow,
};

// ==================== BOXES ====================

const defaultBoxStyle: BoxenOptions = {
    padding: 1,
    borderStyle: 'round',
    borderColor: 'cyan',
};

export function successBox(content: string, title?: string): string {
    return boxen(content, {
        ...defaultBoxStyle,
        borderColor: 'green',
        title: title || `${sym.success} Success`,
        titleAlignment: 'center',
    });
}

export function errorBox(content: string, title?: string): string {
    return boxen(content, {
        ...defaultBoxStyle,
        borderColor: 'red',
        title: title || `${sym.error} Error`,
        titleAlignment: 'center',
    });
}

export function warningBox(content: string, title?: string): string {
    return boxen(content, {
        ...defaultBoxStyle,
        borderColor: 'yellow',
        title: title || `${sym.warning} Warning`,
        titleAlignment: 'center',
    });
}

export function infoBox(content: string, title?: string): string {
    return boxen(content, {
        ...defaultBoxStyle,
        borderColor: 'blue',
        title: title || `${sym.info} Info`,
        titleAlignment: 'center',
    });
}

/**
 * Aligned "label: value" lines for box bodies
 */
export function rows(entries: Array<[string, string]>): string {
    const width = Math.max(...entries.map(([label]) => label.length)) + 1;
    return entries
        .map(([label, value]) => `${c.label(`${label}:`.padEnd(width + 1))}${c.value(value)}`)
        .join('\n');
}

export default {
    sym,
    c,
    successBox,
    errorBox,
    warningBox,
    infoBox,
    rows,
};

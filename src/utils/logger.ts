/**
 * @fileoverview Console-backed logger with a bracketed module prefix.
 * @module utils/logger
 * @version 1.0.0
 */

import type { Logger } from './interfaces';

/**
 * Create a logger that writes `[Prefix] message` lines to the console.
 * Debug output is off unless `debugEnabled` is set.
 */
export function createConsoleLogger(prefix: string, debugEnabled = false): Logger {
    const tag = `[${prefix}]`;
    return {
        debug: (message: string, ...args: unknown[]): void => {
            if (!debugEnabled) return;
            console.debug(`${tag} ${message}`, ...args);
        },
        info: (message: string, ...args: unknown[]): void => {
            console.info(`${tag} ${message}`, ...args);
        },
        warn: (message: string, ...args: unknown[]): void => {
            console.warn(`${tag} ${message}`, ...args);
        },
        error: (message: string, ...args: unknown[]): void => {
            console.error(`${tag} ${message}`, ...args);
        },
    };
}

/**
 * Logger that discards everything. Handy for tests and embedded hosts.
 */
export const silentLogger: Logger = {
    debug: (): void => undefined,
    info: (): void => undefined,
    warn: (): void => undefined,
    error: (): void => undefined,
};

/**
 * Stderr logger.
 *
 * stdout carries the MCP protocol and CLI output, so every diagnostic line
 * goes to stderr as `[LEVEL] timestamp message`.
 */

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warning', 'error'];

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warning: 2,
    error: 3,
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

export function getLogLevel(): LogLevel {
    return threshold;
}

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

function formatArg(arg: unknown): string {
    if (typeof arg === 'string') return arg;
    if (arg instanceof Error) return arg.stack ?? arg.message;
    try {
        return JSON.stringify(arg);
    } catch {
        return String(arg);
    }
}

/** Write one line to stderr when `level` meets the current threshold. */
export function logToStderr(level: LogLevel, message: string, ...args: unknown[]): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
    const parts = [message, ...args.map(formatArg)].join(' ');
    process.stderr.write(`[${level.toUpperCase()}] ${new Date().toISOString()} ${parts}\n`);
}

export const logger = {
    debug: (message: string, ...args: unknown[]) => logToStderr('debug', message, ...args),
    info: (message: string, ...args: unknown[]) => logToStderr('info', message, ...args),
    warning: (message: string, ...args: unknown[]) => logToStderr('warning', message, ...args),
    error: (message: string, ...args: unknown[]) => logToStderr('error', message, ...args),
};

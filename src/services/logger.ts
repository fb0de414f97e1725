export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface Logger {
    debug(message: string, ...meta: unknown[]): void;
    info(message: string, ...meta: unknown[]): void;
    warn(message: string, ...meta: unknown[]): void;
    error(message: string, ...meta: unknown[]): void;
}

const noop = () => { };

export const silentLogger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop
};

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

/**
 * Console-backed logger. Messages below `level` are dropped; each line is
 * prefixed, e.g. `[SmhiForecast] Fetching forecast ...`.
 */
export function createConsoleLogger(prefix = '[SmhiForecast]', level: LogLevel = 'info'): Logger {
    const threshold = LOG_LEVELS.indexOf(level);
    const enabled = (target: LogLevel) => LOG_LEVELS.indexOf(target) >= threshold;

    return {
        debug: (message, ...meta) => {
            if (enabled('debug')) console.debug(`${prefix} ${message}`, ...meta);
        },
        info: (message, ...meta) => {
            if (enabled('info')) console.log(`${prefix} ${message}`, ...meta);
        },
        warn: (message, ...meta) => {
            if (enabled('warn')) console.warn(`${prefix} ${message}`, ...meta);
        },
        error: (message, ...meta) => {
            if (enabled('error')) console.error(`${prefix} ${message}`, ...meta);
        }
    };
}

/**
 * Centralized logger using Pino
 *
 * - development: pretty output through pino-pretty
 * - production: JSON lines on stdout
 * - test: silent unless LOG_LEVEL says otherwise
 */
import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

const env = process.env.NODE_ENV;
const isDev = env !== 'production' && env !== 'test';

function defaultLevel(): string {
    if (env === 'test') return 'silent';
    return isDev ? 'debug' : 'info';
}

const options: LoggerOptions = {
    level: process.env.LOG_LEVEL || defaultLevel(),
    formatters: isDev ? {} : {
        level: (label: string) => ({ level: label }),
    },
};

// Create the logger instance
const logger: Logger = isDev
    ? pino({
        ...options,
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
            },
        },
    })
    : pino(options);

// Create child loggers for different modules
export const engineLogger: Logger = logger.child({ module: 'engine' });
export const lotsLogger: Logger = logger.child({ module: 'lots' });
export const ledgerLogger: Logger = logger.child({ module: 'ledger' });
export const storageLogger: Logger = logger.child({ module: 'storage' });

// Export the base logger as default
export default logger;

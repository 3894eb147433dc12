/**
 * Centralized logger using Pino
 * Structured logging with one child logger per module
 */
import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import type { Request, Response, NextFunction } from 'express';

const nodeEnv = process.env.NODE_ENV;
const isDev = nodeEnv !== 'production' && nodeEnv !== 'test';

/**
 * Level resolution: LOG_LEVEL wins, tests are silent, dev is debug.
 */
function resolveLevel(): string {
    if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
    if (nodeEnv === 'test' || process.env.VITEST) return 'silent';
    return isDev ? 'debug' : 'info';
}

const options: LoggerOptions = {
    level: resolveLevel(),
    formatters: isDev ? {} : {
        level: (label: string) => ({ level: label }),
    },
};

// Pretty output for humans in dev, JSON lines everywhere else
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
export const erpLogger: Logger = logger.child({ module: 'erp' });
export const reconciliationLogger: Logger = logger.child({ module: 'reconciliation' });
export const inboxLogger: Logger = logger.child({ module: 'inbox' });
export const auditLogger: Logger = logger.child({ module: 'audit' });
export const httpLogger: Logger = logger.child({ module: 'http' });
export const lockLogger: Logger = logger.child({ module: 'lock' });

// Export the base logger as default
export default logger;

// Request logging middleware
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const start = Date.now();

    res.on('finish', () => {
        const duration = Date.now() - start;
        const logData = {
            method: req.method,
            url: req.url,
            status: res.statusCode,
            duration: `${duration}ms`,
        };

        if (res.statusCode >= 500) {
            httpLogger.error(logData, 'Request error');
        } else if (res.statusCode >= 400) {
            httpLogger.warn(logData, 'Request warning');
        } else if (duration > 1000) {
            httpLogger.warn(logData, 'Slow request');
        } else {
            httpLogger.debug(logData, 'Request completed');
        }
    });

    next();
}

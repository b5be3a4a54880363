/**
 * Centralized logger using Pino
 * Replaces scattered console.log statements with structured logging
 */
import pino from 'pino';
import type { Logger } from 'pino';
import type { Request, Response, NextFunction } from 'express';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const isDev = nodeEnv === 'development';
const isTest = nodeEnv === 'test';

/** Requests slower than this are logged at warn level */
const SLOW_REQUEST_MS = 1000;

function resolveLevel(): string {
    if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
    if (isTest) return 'silent';
    return isDev ? 'debug' : 'info';
}

// Pretty output in development, JSON lines on stdout everywhere else
const logger: Logger = isDev
    ? pino({
        level: resolveLevel(),
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
            },
        },
    })
    : pino({
        level: resolveLevel(),
        formatters: {
            level: (label: string) => ({ level: label }),
        },
    });

// Create child loggers for different modules
export const storeLogger: Logger = logger.child({ module: 'store' });
export const catalogLogger: Logger = logger.child({ module: 'catalog' });
export const teamLogger: Logger = logger.child({ module: 'teams' });
export const orderLogger: Logger = logger.child({ module: 'orders' });
export const paymentLogger: Logger = logger.child({ module: 'payments' });
export const httpLogger: Logger = logger.child({ module: 'http' });

// Export the base logger as default
export default logger;

// Request logging middleware
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const start = Date.now();

    res.on('finish', () => {
        const duration = Date.now() - start;
        const logData = {
            method: req.method,
            url: req.originalUrl,
            status: res.statusCode,
            duration: `${duration}ms`,
        };

        if (res.statusCode >= 500) {
            httpLogger.error(logData, 'Request error');
        } else if (res.statusCode >= 400) {
            httpLogger.warn(logData, 'Request warning');
        } else if (duration > SLOW_REQUEST_MS) {
            httpLogger.warn(logData, 'Slow request');
        } else {
            httpLogger.debug(logData, 'Request completed');
        }
    });

    next();
}
